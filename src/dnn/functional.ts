/**
 * High-level constructors that assemble a complete accelerated subgraph
 * (contiguity, shape arithmetic, descriptor, output buffer, operator) from
 * convolution or pooling arguments.
 */

import { ConfigurationError } from "../core/errors";
import { convOutputShape } from "../core/shape";
import { call, type Value } from "../graph/value";
import { requireConvOutput, requireTensor } from "../ops/checks";
import {
  add,
  allocEmpty,
  contiguous,
  dimshuffle,
  flip,
  intDiv,
  mul,
  scalarConstant,
  shapeI,
  shapeOf,
  sub,
  type ConvDirectionHint,
} from "../ops/generic";
import type { ForwardAlgorithm } from "./algorithms";
import type { DnnContext } from "./availability";
import { convForward, convGradInputs, convGradWeights } from "./conv";
import {
  convDescriptor,
  poolDescriptor,
  type BorderModeInput,
  type ConvMode,
  type PoolModeInput,
} from "./descriptors";
import { DnnPool } from "./pool";

export type ConvLowering = "forward" | "grad_weights" | "grad_inputs";

export type DnnConvOptions = {
  borderMode?: BorderModeInput;
  subsample?: readonly number[];
  convMode?: ConvMode;
  directionHint?: ConvDirectionHint | null;
  algo?: ForwardAlgorithm;
  /** @deprecated Use `algo`. */
  workmem?: ForwardAlgorithm;
};

function isUnitStride(subsample: readonly number[]): boolean {
  return subsample.every((s) => s === 1);
}

/**
 * Which of the three equivalent lowerings `dnnConv` builds:
 * - "valid", unit stride, hint "bprop weights": weight-gradient operator
 *   over batch/channel-swapped operands;
 * - "full", unit stride, hint other than "forward!": input-gradient
 *   operator, the adjoint of a valid convolution;
 * - otherwise the forward operator.
 */
export function chooseConvLowering(
  borderMode: BorderModeInput,
  subsample: readonly number[],
  directionHint: ConvDirectionHint | null | undefined,
): ConvLowering {
  if (borderMode === "valid" && isUnitStride(subsample) && directionHint === "bprop weights") {
    return "grad_weights";
  }
  if (borderMode === "full" && isUnitStride(subsample) && directionHint !== "forward!") {
    return "grad_inputs";
  }
  return "forward";
}

function i64(n: number): Value {
  return scalarConstant(n, "i64");
}

function swapBatchChannel(rank: number): number[] {
  const order = [1, 0];
  for (let axis = 2; axis < rank; axis++) order.push(axis);
  return order;
}

function spatialAxes(rank: number): number[] {
  const axes: number[] = [];
  for (let axis = 2; axis < rank; axis++) axes.push(axis);
  return axes;
}

/**
 * Accelerated convolution of `[b, c, ...]` images with `[k, c, ...]`
 * kernels. Every lowering computes the same tensor.
 */
export function dnnConv(
  ctx: DnnContext,
  img: Value,
  kern: Value,
  options: DnnConvOptions = {},
): Value {
  const imgType = requireTensor(img, "image");
  const rank = imgType.rank;
  const nd = rank - 2;
  const borderMode = options.borderMode ?? "valid";
  const subsample = options.subsample ?? Array.from({ length: nd }, () => 1);
  const convMode = options.convMode ?? "conv";
  const dtype = imgType.dtype;

  let algo = options.algo;
  if (options.workmem !== undefined) {
    if (algo !== undefined) {
      throw new ConfigurationError("cannot pass both algo and workmem; workmem is a deprecated alias of algo");
    }
    console.warn("[dnn] workmem is deprecated, use algo instead");
    algo = options.workmem;
  }

  const kernShape = kern.type.kind === "tensor" ? kern.type.shape : undefined;
  const padding = typeof borderMode === "number" ? subsample.map(() => borderMode) : borderMode;
  if (
    imgType.shape &&
    kernShape?.length === rank &&
    subsample.length === nd &&
    (typeof padding === "string" || padding.length === nd)
  ) {
    const outShape = convOutputShape(imgType.shape, kernShape, padding, subsample);
    requireConvOutput(outShape, imgType.shape, kernShape, borderMode, subsample);
  }

  const ones = Array.from({ length: nd }, () => 1);
  const swap = swapBatchChannel(rank);

  switch (chooseConvLowering(borderMode, subsample, options.directionHint)) {
    case "grad_weights": {
      const imgT = contiguous(dimshuffle(img, swap));
      const kernFlipped = convMode === "conv" ? flip(kern, spatialAxes(rank)) : kern;
      const kernT = contiguous(dimshuffle(kernFlipped, swap));
      const dims = [shapeI(kernT, 1), shapeI(imgT, 1)];
      for (let axis = 2; axis < rank; axis++) {
        dims.push(add(sub(shapeI(imgT, axis), shapeI(kernT, axis)), i64(1)));
      }
      const out = allocEmpty(dtype, dims);
      const desc = convDescriptor(ctx, shapeOf(out), {
        borderMode: "valid",
        subsample: ones,
        convMode: "cross",
      });
      const result = convGradWeights(ctx, imgT, kernT, out, desc);
      return dimshuffle(result, swap);
    }

    case "grad_inputs": {
      const imgC = contiguous(img);
      const kernT = contiguous(dimshuffle(kern, swap));
      const dims = [shapeI(imgC, 0), shapeI(kernT, 1)];
      for (let axis = 2; axis < rank; axis++) {
        dims.push(sub(add(shapeI(imgC, axis), shapeI(kernT, axis)), i64(1)));
      }
      const out = allocEmpty(dtype, dims);
      const desc = convDescriptor(ctx, shapeOf(kernT), {
        borderMode: "valid",
        subsample: ones,
        convMode: convMode === "conv" ? "cross" : "conv",
      });
      return convGradInputs(ctx, kernT, imgC, out, desc);
    }

    case "forward": {
      const imgC = contiguous(img);
      const kernC = contiguous(kern);
      const desc = convDescriptor(ctx, shapeOf(kernC), { borderMode, subsample, convMode });
      const dims = [shapeI(imgC, 0), shapeI(kernC, 0)];
      for (let i = 0; i < nd; i++) {
        const axis = i + 2;
        const k = shapeI(kernC, axis);
        let pad: Value;
        if (borderMode === "full") pad = sub(k, i64(1));
        else if (borderMode === "valid") pad = i64(0);
        else if (typeof borderMode === "number") pad = i64(borderMode);
        else pad = i64(borderMode[i]);
        const span = sub(add(shapeI(imgC, axis), mul(i64(2), pad)), k);
        dims.push(add(intDiv(span, i64(subsample[i])), i64(1)));
      }
      const out = allocEmpty(dtype, dims);
      return convForward(ctx, imgC, kernC, out, desc, { algo });
    }
  }
}

export type DnnPoolOptions = {
  ws: readonly number[];
  stride?: readonly number[];
  mode?: PoolModeInput;
  pad?: readonly number[];
};

/** Accelerated pooling; matches generic pooling with `ignoreBorder`. */
export function dnnPool(ctx: DnnContext, img: Value, options: DnnPoolOptions): Value {
  const imgC = contiguous(img);
  const desc = poolDescriptor(ctx, options);
  return call(new DnnPool(), imgC, desc);
}

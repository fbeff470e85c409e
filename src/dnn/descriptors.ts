import { ConfigurationError, GraphStructureError } from "../core/errors";
import { resolvePadding, type Padding } from "../core/shape";
import type { Operator } from "../graph/operator";
import {
  CONV_DESCRIPTOR_TYPE,
  POOL_DESCRIPTOR_TYPE,
} from "../graph/types";
import { call, type OutputSpec, type Value } from "../graph/value";
import type { PoolMode } from "../ops/generic";
import { expectArity, requireTensor } from "../ops/checks";
import { ND_DESCRIPTOR_VERSION, type DnnContext } from "./availability";

export type ConvMode = "conv" | "cross";

/** An integer pad broadcast to every spatial dim, a pad tuple, or a named mode. */
export type BorderModeInput = number | readonly number[] | "valid" | "full";

export type ConvDescriptorParams = {
  borderMode: BorderModeInput;
  subsample?: readonly number[];
  convMode?: ConvMode;
};

export type NativeConvParams = {
  nbDims: number;
  /** full = 0, valid = 1, explicit pads = 2 */
  borderMode: 0 | 1 | 2;
  pads: readonly [number, number, number];
  strides: readonly [number, number, number];
  convMode: "CUDNN_CONVOLUTION" | "CUDNN_CROSS_CORRELATION";
};

function isNonNegativeInt(n: number): boolean {
  return Number.isInteger(n) && n >= 0;
}

function isPositiveInt(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

function padTo3(values: readonly number[]): [number, number, number] {
  return [values[0] ?? 0, values[1] ?? 0, values[2] ?? 0];
}

function checkSpatialRank(what: string, nd: number): void {
  if (nd !== 2 && nd !== 3) {
    throw new ConfigurationError(
      `${what} must describe 2 or 3 spatial dims, got ${nd}`,
    );
  }
}

/**
 * Builds a convolution descriptor from a kernel-shape vector. The native
 * handle is materialized per execution, so the node never constant-folds.
 */
export class ConvDescriptorBuilder implements Operator {
  readonly kind = "dnn_conv_desc";
  readonly constantFoldable = false;
  readonly borderMode: Padding;
  readonly subsample: readonly number[];
  readonly convMode: ConvMode;
  readonly props: {
    readonly borderMode: Padding;
    readonly subsample: readonly number[];
    readonly convMode: ConvMode;
  };

  constructor(ctx: DnnContext, params: ConvDescriptorParams) {
    const subsample = (params.subsample ?? [1, 1]).slice();
    const convMode = params.convMode ?? "conv";
    checkSpatialRank("subsample", subsample.length);
    if (!subsample.every(isPositiveInt)) {
      throw new ConfigurationError(
        `subsample must be positive integers, got [${subsample.join(",")}]`,
      );
    }

    let borderMode: Padding;
    const raw = params.borderMode;
    if (typeof raw === "number") {
      borderMode = subsample.map(() => raw);
    } else if (typeof raw === "string") {
      if (raw !== "valid" && raw !== "full") {
        throw new ConfigurationError(
          `invalid borderMode "${raw}"; expected "valid", "full", an integer or an integer tuple`,
        );
      }
      borderMode = raw;
    } else {
      borderMode = raw.slice();
    }
    if (typeof borderMode !== "string") {
      if (borderMode.length !== subsample.length) {
        throw new ConfigurationError(
          `borderMode has ${borderMode.length} entries but subsample has ${subsample.length}`,
        );
      }
      if (!borderMode.every(isNonNegativeInt)) {
        throw new ConfigurationError(
          `borderMode pads must be non-negative integers, got [${borderMode.join(",")}]`,
        );
      }
    }
    if (convMode !== "conv" && convMode !== "cross") {
      throw new ConfigurationError(
        `convMode must be "conv" or "cross", got "${String(convMode)}"`,
      );
    }
    if (subsample.length === 3) {
      ctx.gate.requireVersion("3-d convolution descriptors", ND_DESCRIPTOR_VERSION);
    }

    this.borderMode = borderMode;
    this.subsample = subsample;
    this.convMode = convMode;
    this.props = { borderMode, subsample, convMode };
  }

  get nbDims(): number {
    return this.subsample.length;
  }

  /** Explicit per-dim padding for a kernel with the given spatial extent. */
  padsFor(kernelSpatial: readonly number[]): number[] {
    return resolvePadding(this.borderMode, kernelSpatial);
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 1);
    const shape = requireTensor(inputs[0], "kernel shape");
    if (shape.rank !== 1 || shape.dtype !== "i64") {
      throw new GraphStructureError(
        "kernel shape must be a 1-d i64 tensor",
      );
    }
    const length = shape.shape?.[0];
    if (length !== undefined && length !== this.nbDims + 2) {
      throw new GraphStructureError(
        `kernel shape has ${length} entries; a ${this.nbDims}-d descriptor needs ${this.nbDims + 2}`,
      );
    }
    return [{ type: CONV_DESCRIPTOR_TYPE }];
  }

  nativeParams(): NativeConvParams {
    const mode = this.borderMode;
    return {
      nbDims: this.nbDims,
      borderMode: mode === "full" ? 0 : mode === "valid" ? 1 : 2,
      pads: typeof mode === "string" ? [0, 0, 0] : padTo3(mode),
      strides: padTo3(this.subsample),
      convMode: this.convMode === "conv" ? "CUDNN_CONVOLUTION" : "CUDNN_CROSS_CORRELATION",
    };
  }
}

export type PoolModeInput = PoolMode | "average";

export type PoolDescriptorParams = {
  ws: readonly number[];
  stride?: readonly number[];
  mode?: PoolModeInput;
  pad?: readonly number[];
};

export type NativePoolParams = {
  nbDims: number;
  mode:
    | "CUDNN_POOLING_MAX"
    | "CUDNN_POOLING_AVERAGE_COUNT_INCLUDE_PADDING"
    | "CUDNN_POOLING_AVERAGE_COUNT_EXCLUDE_PADDING";
  window: readonly number[];
  pad: readonly number[];
  stride: readonly number[];
};

const POOL_MODE_NATIVE: Record<PoolMode, NativePoolParams["mode"]> = {
  max: "CUDNN_POOLING_MAX",
  average_inc_pad: "CUDNN_POOLING_AVERAGE_COUNT_INCLUDE_PADDING",
  average_exc_pad: "CUDNN_POOLING_AVERAGE_COUNT_EXCLUDE_PADDING",
};

/** Legacy "average" means counting padding. */
export function normalizePoolMode(mode: string): PoolMode {
  if (mode === "average") return "average_inc_pad";
  if (mode === "max" || mode === "average_inc_pad" || mode === "average_exc_pad") {
    return mode;
  }
  throw new ConfigurationError(
    `pooling mode must be "max", "average_inc_pad" or "average_exc_pad", got "${mode}"`,
  );
}

export class PoolDescriptorBuilder implements Operator {
  readonly kind = "dnn_pool_desc";
  readonly constantFoldable = false;
  readonly ws: readonly number[];
  readonly stride: readonly number[];
  readonly pad: readonly number[];
  readonly mode: PoolMode;
  readonly props: {
    readonly ws: readonly number[];
    readonly stride: readonly number[];
    readonly mode: PoolMode;
    readonly pad: readonly number[];
  };

  constructor(ctx: DnnContext, params: PoolDescriptorParams) {
    const ws = params.ws.slice();
    const stride = (params.stride ?? ws.map(() => 1)).slice();
    const pad = (params.pad ?? ws.map(() => 0)).slice();
    const mode = normalizePoolMode(params.mode ?? "max");

    if (ws.length !== stride.length || stride.length !== pad.length) {
      throw new ConfigurationError(
        `window, stride and pad must have equal lengths, got ${ws.length}, ${stride.length} and ${pad.length}`,
      );
    }
    checkSpatialRank("pooling window", ws.length);
    if (!ws.every(isPositiveInt)) {
      throw new ConfigurationError(
        `pooling window must be positive integers, got [${ws.join(",")}]`,
      );
    }
    if (!stride.every(isPositiveInt)) {
      throw new ConfigurationError(
        `pooling stride must be positive integers, got [${stride.join(",")}]`,
      );
    }
    if (!pad.every(isNonNegativeInt)) {
      throw new ConfigurationError(
        `pooling pad must be non-negative integers, got [${pad.join(",")}]`,
      );
    }
    if (ws.length === 3) {
      ctx.gate.requireVersion("3-d pooling descriptors", ND_DESCRIPTOR_VERSION);
    }

    this.ws = ws;
    this.stride = stride;
    this.pad = pad;
    this.mode = mode;
    this.props = { ws, stride, mode, pad };
  }

  get nbDims(): number {
    return this.ws.length;
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 0);
    return [{ type: POOL_DESCRIPTOR_TYPE }];
  }

  nativeParams(): NativePoolParams {
    return {
      nbDims: this.nbDims,
      mode: POOL_MODE_NATIVE[this.mode],
      window: this.ws,
      pad: this.pad,
      stride: this.stride,
    };
  }
}

export function convDescriptor(
  ctx: DnnContext,
  kernelShape: Value,
  params: ConvDescriptorParams,
): Value {
  return call(new ConvDescriptorBuilder(ctx, params), kernelShape);
}

export function poolDescriptor(ctx: DnnContext, params: PoolDescriptorParams): Value {
  return call(new PoolDescriptorBuilder(ctx, params));
}

/** The builder behind a descriptor value, when it was built in-graph. */
export function convDescriptorOf(desc: Value): ConvDescriptorBuilder | null {
  const op = desc.owner?.node.op;
  return op instanceof ConvDescriptorBuilder ? op : null;
}

export function poolDescriptorOf(desc: Value): PoolDescriptorBuilder | null {
  const op = desc.owner?.node.op;
  return op instanceof PoolDescriptorBuilder ? op : null;
}

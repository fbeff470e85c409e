import { ShapeError } from "../core/errors";
import { poolOutputShape } from "../core/shape";
import type { InputGrad, Operator } from "../graph/operator";
import { tensorType, type TensorType } from "../graph/types";
import { call, type Apply, type OutputSpec, type Value } from "../graph/value";
import { expectArity, requireResource, requireTensor } from "../ops/checks";
import { contiguous } from "../ops/generic";
import { poolDescriptorOf, type PoolDescriptorBuilder } from "./descriptors";

function checkPoolRank(
  kind: string,
  builder: PoolDescriptorBuilder | null,
  type: TensorType,
  name: string,
): void {
  if (builder) {
    const expected = builder.nbDims + 2;
    if (type.rank !== expected) {
      throw new ShapeError(
        `${kind} ${name} must be a ${expected}-d tensor for a ${builder.nbDims}-d window, got rank ${type.rank}`,
      );
    }
  } else if (type.rank !== 4 && type.rank !== 5) {
    throw new ShapeError(
      `${kind} ${name} must be a 4-d or 5-d tensor, got rank ${type.rank}`,
    );
  }
}

/** Pooling: `pool(img, desc)`; output spatial dims follow the window sweep. */
export class DnnPool implements Operator {
  readonly kind = "dnn_pool";
  readonly props = {};

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 2);
    const img = requireTensor(inputs[0], "dnn_pool img");
    requireResource(inputs[1], "cudnnPoolingDescriptor_t", "dnn_pool desc");
    const builder = poolDescriptorOf(inputs[1]);
    checkPoolRank(this.kind, builder, img, "img");
    if (builder && img.shape) {
      return [
        {
          type: tensorType(
            img.dtype,
            poolOutputShape(img.shape, builder.ws, builder.stride, builder.pad),
          ),
        },
      ];
    }
    return [{ type: tensorType(img.dtype, img.rank) }];
  }

  inferShape(
    node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    const builder = poolDescriptorOf(node.inputs[1]);
    const img = inputShapes[0];
    if (!builder || !img) {
      throw new ShapeError("dnn_pool shape inference needs the image shape and an in-graph descriptor");
    }
    return [poolOutputShape(img, builder.ws, builder.stride, builder.pad)];
  }

  connectionPattern(): boolean[][] {
    return [[true], [false]];
  }

  grad(node: Apply, outputGrads: readonly Value[]): InputGrad[] {
    const [img, desc] = node.inputs;
    const grad = contiguous(outputGrads[0]);
    return [call(new DnnPoolGrad(), img, node.outputs[0], grad, desc), null];
  }
}

/**
 * Pooling gradient: `(inp, out, outGrad, desc)`, typed like `inp`.
 * Has no gradient of its own.
 */
export class DnnPoolGrad implements Operator {
  readonly kind = "dnn_pool_grad";
  readonly props = {};

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 4);
    const inp = requireTensor(inputs[0], "dnn_pool_grad inp");
    const out = requireTensor(inputs[1], "dnn_pool_grad out");
    const outGrad = requireTensor(inputs[2], "dnn_pool_grad out_grad");
    requireResource(inputs[3], "cudnnPoolingDescriptor_t", "dnn_pool_grad desc");
    const builder = poolDescriptorOf(inputs[3]);
    checkPoolRank(this.kind, builder, inp, "inp");
    checkPoolRank(this.kind, builder, out, "out");
    checkPoolRank(this.kind, builder, outGrad, "out_grad");
    return [{ type: inp }];
  }

  inferShape(
    _node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    return [(inputShapes[0] ?? []).slice()];
  }
}

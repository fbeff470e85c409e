/**
 * Generic (non-accelerated) operators. This layer only describes them:
 * arity, types, static shape propagation and gradients. Rewrite rules
 * pattern-match these and lift them into accelerated subgraphs; their
 * kernels belong to the host runtime.
 */

import { GraphStructureError, ShapeError } from "../core/errors";
import {
  convOutputShape,
  shapesEqual,
  windowOutputSize,
  type Padding,
} from "../core/shape";
import type { InputGrad, Operator } from "../graph/operator";
import {
  isBroadcastableAxis,
  scalarType,
  tensorType,
  type DType,
  type TensorType,
} from "../graph/types";
import {
  call,
  constant,
  staticNumber,
  type Apply,
  type OutputSpec,
  type Value,
} from "../graph/value";
import {
  expectArity,
  requireConvOutput,
  requireRank,
  requireScalar,
  requireTensor,
} from "./checks";

// ============================================================================
// Layout and allocation
// ============================================================================

export class Contiguous implements Operator {
  readonly kind = "contiguous";
  readonly props = {};

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 1);
    return [{ type: requireTensor(inputs[0], "contiguous input") }];
  }

  inferShape(
    _node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    return [(inputShapes[0] ?? []).slice()];
  }

  grad(_node: Apply, outputGrads: readonly Value[]): InputGrad[] {
    return [outputGrads[0]];
  }
}

/** Uninitialized buffer whose dimensions come from scalar inputs. */
export class AllocEmpty implements Operator {
  readonly kind = "alloc_empty";
  readonly props: { readonly dtype: DType };
  readonly constantFoldable = false;

  constructor(readonly dtype: DType) {
    this.props = { dtype };
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    if (inputs.length === 0) {
      throw new GraphStructureError("alloc_empty needs at least one dimension");
    }
    const dims: number[] = [];
    inputs.forEach((dim, i) => {
      const type = requireScalar(dim, `alloc_empty dimension ${i}`);
      if (type.dtype !== "i64") {
        throw new GraphStructureError(
          `alloc_empty dimension ${i} must be i64, got ${type.dtype}`,
        );
      }
      const known = staticNumber(dim);
      if (known !== undefined) {
        if (!Number.isInteger(known) || known < 0) {
          throw new ShapeError(
            `alloc_empty dimension ${i} must be a non-negative integer, got ${known}`,
          );
        }
        dims.push(known);
      }
    });
    const type: TensorType =
      dims.length === inputs.length
        ? tensorType(this.dtype, dims)
        : tensorType(this.dtype, inputs.length);
    return [{ type }];
  }

  grad(node: Apply): InputGrad[] {
    return node.inputs.map(() => null);
  }

  connectionPattern(node: Apply): boolean[][] {
    return node.inputs.map(() => [false]);
  }
}

export class ShapeOf implements Operator {
  readonly kind = "shape";
  readonly props = {};

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 1);
    const type = requireTensor(inputs[0], "shape input");
    return [{ type: tensorType("i64", [type.rank]), staticValue: type.shape }];
  }

  grad(): InputGrad[] {
    return [null];
  }

  connectionPattern(): boolean[][] {
    return [[false]];
  }
}

export class ShapeI implements Operator {
  readonly kind = "shape_i";
  readonly props: { readonly axis: number };

  constructor(readonly axis: number) {
    this.props = { axis };
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 1);
    const type = requireTensor(inputs[0], "shape_i input");
    if (!Number.isInteger(this.axis) || this.axis < 0 || this.axis >= type.rank) {
      throw new ShapeError(
        `shape_i axis ${this.axis} out of range for rank ${type.rank}`,
      );
    }
    return [{ type: scalarType("i64"), staticValue: type.shape?.[this.axis] }];
  }

  grad(): InputGrad[] {
    return [null];
  }

  connectionPattern(): boolean[][] {
    return [[false]];
  }
}

/** Axis permutation; `"x"` inserts a size-1 axis. Unlisted axes must be size 1. */
export type DimShuffleEntry = number | "x";

export class DimShuffle implements Operator {
  readonly kind = "dimshuffle";
  readonly props: { readonly order: readonly DimShuffleEntry[] };

  constructor(readonly order: readonly DimShuffleEntry[]) {
    this.props = { order: order.slice() };
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 1);
    const type = requireTensor(inputs[0], "dimshuffle input");
    const seen = new Set<number>();
    for (const entry of this.order) {
      if (entry === "x") continue;
      if (!Number.isInteger(entry) || entry < 0 || entry >= type.rank || seen.has(entry)) {
        throw new ShapeError(
          `invalid dimshuffle order [${this.order.join(",")}] for rank ${type.rank}`,
        );
      }
      seen.add(entry);
    }
    for (let axis = 0; axis < type.rank; axis++) {
      if (!seen.has(axis) && !isBroadcastableAxis(type, axis)) {
        throw new ShapeError(
          `dimshuffle drops axis ${axis}, which is not known to have size 1`,
        );
      }
    }
    const shape = type.shape;
    const out: TensorType = {
      kind: "tensor",
      dtype: type.dtype,
      rank: this.order.length,
      broadcastable: this.order.map((entry) =>
        entry === "x" ? true : isBroadcastableAxis(type, entry),
      ),
    };
    if (shape) {
      out.shape = this.order.map((entry) => (entry === "x" ? 1 : shape[entry]));
    }
    return [{ type: out }];
  }

  inferShape(
    _node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    const shape = inputShapes[0] ?? [];
    return [this.order.map((entry) => (entry === "x" ? 1 : shape[entry]))];
  }

  grad(node: Apply, outputGrads: readonly Value[]): InputGrad[] {
    const type = requireTensor(node.inputs[0], "dimshuffle input");
    const inverse: DimShuffleEntry[] = [];
    for (let axis = 0; axis < type.rank; axis++) {
      const at = this.order.indexOf(axis);
      inverse.push(at >= 0 ? at : "x");
    }
    return [call(new DimShuffle(inverse), outputGrads[0])];
  }
}

/** Reverse the listed axes. */
export class Flip implements Operator {
  readonly kind = "flip";
  readonly props: { readonly axes: readonly number[] };

  constructor(readonly axes: readonly number[]) {
    this.props = { axes: axes.slice() };
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 1);
    const type = requireTensor(inputs[0], "flip input");
    for (const axis of this.axes) {
      if (!Number.isInteger(axis) || axis < 0 || axis >= type.rank) {
        throw new ShapeError(`flip axis ${axis} out of range for rank ${type.rank}`);
      }
    }
    return [{ type }];
  }

  inferShape(
    _node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    return [(inputShapes[0] ?? []).slice()];
  }

  grad(_node: Apply, outputGrads: readonly Value[]): InputGrad[] {
    return [call(new Flip(this.axes), outputGrads[0])];
  }
}

// ============================================================================
// Elementwise arithmetic
// ============================================================================

export type ElemwiseFn = "add" | "sub" | "mul" | "div" | "int_div" | "log" | "neg";

const UNARY: ReadonlySet<ElemwiseFn> = new Set(["log", "neg"]);

/** Scalar semantics of each elementwise function (`b` ignored when unary). */
export function evalScalar(fn: ElemwiseFn, a: number, b: number): number {
  switch (fn) {
    case "add":
      return a + b;
    case "sub":
      return a - b;
    case "mul":
      return a * b;
    case "div":
      return a / b;
    case "int_div":
      return Math.floor(a / b);
    case "log":
      return Math.log(a);
    case "neg":
      return -a;
  }
}

/**
 * Elementwise arithmetic over tensors and scalars. Scalars broadcast against
 * tensors; two tensors must agree in rank (and shape, where known).
 */
export class Elemwise implements Operator {
  readonly kind = "elemwise";
  readonly props: { readonly fn: ElemwiseFn };

  constructor(readonly fn: ElemwiseFn) {
    this.props = { fn };
  }

  get arity(): number {
    return UNARY.has(this.fn) ? 1 : 2;
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, this.arity);
    const first = inputs[0].type;
    const dtype = first.kind === "resource" ? null : first.dtype;
    let tensor: TensorType | null = null;
    for (const [i, input] of inputs.entries()) {
      const type = input.type;
      if (type.kind === "resource") {
        throw new GraphStructureError(`${this.fn} operand ${i} is a resource`);
      }
      if (type.dtype !== dtype) {
        throw new GraphStructureError(
          `${this.fn} operands disagree in dtype: ${dtype} vs ${type.dtype}`,
        );
      }
      if (type.kind !== "tensor") continue;
      if (!tensor) {
        tensor = type;
        continue;
      }
      if (tensor.rank !== type.rank) {
        throw new ShapeError(
          `${this.fn} operands disagree in rank: ${tensor.rank} vs ${type.rank}`,
        );
      }
      if (tensor.shape && type.shape && !shapesEqual(tensor.shape, type.shape)) {
        throw new ShapeError(
          `${this.fn} operands disagree in shape: [${tensor.shape.join(",")}] vs [${type.shape.join(",")}]`,
        );
      }
      if (!tensor.shape && type.shape) tensor = type;
    }

    if (tensor) return [{ type: tensor }];

    const values = inputs.map(staticNumber);
    let staticValue: number | undefined;
    if (values.every((v) => v !== undefined)) {
      staticValue = evalScalar(this.fn, values[0] ?? 0, values[1] ?? 0);
    }
    return [{ type: inputs[0].type, staticValue }];
  }

  inferShape(
    node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    const at = node.inputs.findIndex((input) => input.type.kind === "tensor");
    return [(inputShapes[at] ?? []).slice()];
  }

  private rawGrads(node: Apply, g: Value): InputGrad[] {
    const [a, b] = node.inputs;
    switch (this.fn) {
      case "add":
        return [g, g];
      case "sub":
        return [g, neg(g)];
      case "mul":
        return [mul(g, b), mul(g, a)];
      case "div":
        return [div(g, b), neg(div(mul(g, a), mul(b, b)))];
      case "int_div":
        return [null, null];
      case "log":
        return [div(g, a)];
      case "neg":
        return [neg(g)];
    }
  }

  grad(node: Apply, outputGrads: readonly Value[]): InputGrad[] {
    const grads = this.rawGrads(node, outputGrads[0]);
    // A scalar broadcast into a tensor result needs a reduction to come back.
    const out = node.outputs[0];
    return grads.map((grad, i) => {
      const input = node.inputs[i];
      if (grad && out.type.kind === "tensor" && input.type.kind === "scalar") {
        return gradNotImplemented(
          input,
          `gradient of a scalar broadcast through ${this.fn}`,
        );
      }
      return grad;
    });
  }

  connectionPattern(node: Apply): boolean[][] {
    const connected = this.fn !== "int_div";
    return node.inputs.map(() => [connected]);
  }
}

// ============================================================================
// Generic convolution, pooling and softmax patterns
// ============================================================================

export type ConvDirectionHint = "forward" | "forward!" | "bprop weights" | "bprop inputs";

export type GenericConvParams = {
  borderMode: "valid" | "full" | readonly number[];
  subsample: readonly number[];
  /** `true` is true convolution; `false` is cross-correlation. */
  filterFlip: boolean;
  directionHint: ConvDirectionHint;
};

/** `conv(img, kern)`: `[b, c, ...]` images, `[k, c, ...]` kernels. */
export class GenericConv implements Operator {
  readonly kind = "conv";
  readonly props: {
    readonly borderMode: Padding;
    readonly subsample: readonly number[];
    readonly filterFlip: boolean;
    readonly directionHint: ConvDirectionHint;
  };

  constructor(readonly params: GenericConvParams) {
    this.props = {
      borderMode:
        typeof params.borderMode === "string"
          ? params.borderMode
          : params.borderMode.slice(),
      subsample: params.subsample.slice(),
      filterFlip: params.filterFlip,
      directionHint: params.directionHint,
    };
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 2);
    const img = requireTensor(inputs[0], "conv image");
    const kern = requireTensor(inputs[1], "conv kernel");
    requireRank(img, [4, 5], "conv image");
    if (kern.rank !== img.rank) {
      throw new ShapeError(
        `conv kernel rank ${kern.rank} does not match image rank ${img.rank}`,
      );
    }
    if (this.params.subsample.length !== img.rank - 2) {
      throw new ShapeError(
        `conv subsample has ${this.params.subsample.length} entries for ${img.rank - 2} spatial dims`,
      );
    }
    if (img.dtype !== kern.dtype) {
      throw new GraphStructureError(
        `conv image and kernel disagree in dtype: ${img.dtype} vs ${kern.dtype}`,
      );
    }
    if (img.shape && kern.shape) {
      return [{ type: tensorType(img.dtype, this.outputShape(img.shape, kern.shape)) }];
    }
    return [{ type: tensorType(img.dtype, img.rank) }];
  }

  outputShape(imgShape: readonly number[], kernShape: readonly number[]): number[] {
    const { borderMode, subsample } = this.props;
    const out = convOutputShape(imgShape, kernShape, borderMode, subsample);
    requireConvOutput(out, imgShape, kernShape, borderMode, subsample);
    return out;
  }

  inferShape(
    _node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    const [img, kern] = inputShapes;
    if (!img || !kern) {
      throw new ShapeError("conv shape inference needs both input shapes");
    }
    return [this.outputShape(img, kern)];
  }
}

export type PoolMode = "max" | "average_inc_pad" | "average_exc_pad";

export type GenericPoolParams = {
  ws: readonly number[];
  stride: readonly number[];
  pad: readonly number[];
  mode: PoolMode;
  ignoreBorder: boolean;
};

function poolParamsProps(params: GenericPoolParams) {
  return {
    ws: params.ws.slice(),
    stride: params.stride.slice(),
    pad: params.pad.slice(),
    mode: params.mode,
    ignoreBorder: params.ignoreBorder,
  };
}

function pooledSize(
  input: number,
  ws: number,
  stride: number,
  pad: number,
  ignoreBorder: boolean,
): number {
  if (ignoreBorder) return windowOutputSize(input, ws, pad, stride);
  // Partial windows at the far border still produce an output.
  if (stride >= ws) return Math.floor((input - 1) / stride) + 1;
  return Math.max(0, Math.floor((input - 1 - ws + stride) / stride)) + 1;
}

function checkPoolInput(
  kind: string,
  params: GenericPoolParams,
  input: Value,
): TensorType {
  const type = requireTensor(input, `${kind} input`);
  const nd = params.ws.length;
  if (params.stride.length !== nd || params.pad.length !== nd) {
    throw new ShapeError(
      `${kind} window, stride and pad must have equal lengths`,
    );
  }
  if (type.rank !== nd + 2) {
    throw new ShapeError(
      `${kind} input must have rank ${nd + 2} for a ${nd}-d window, got rank ${type.rank}`,
    );
  }
  return type;
}

export class GenericPool implements Operator {
  readonly kind = "pool";
  readonly props: ReturnType<typeof poolParamsProps>;

  constructor(readonly params: GenericPoolParams) {
    this.props = poolParamsProps(params);
  }

  outputShape(imgShape: readonly number[]): number[] {
    const { ws, stride, pad, ignoreBorder } = this.params;
    return [
      imgShape[0],
      imgShape[1],
      ...ws.map((w, i) => pooledSize(imgShape[i + 2], w, stride[i], pad[i], ignoreBorder)),
    ];
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 1);
    const type = checkPoolInput(this.kind, this.params, inputs[0]);
    if (type.shape) {
      return [{ type: tensorType(type.dtype, this.outputShape(type.shape)) }];
    }
    return [{ type: tensorType(type.dtype, type.rank) }];
  }

  inferShape(
    _node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    return [this.outputShape(inputShapes[0] ?? [])];
  }

  grad(node: Apply, outputGrads: readonly Value[]): InputGrad[] {
    const [x] = node.inputs;
    const g = outputGrads[0];
    if (this.params.mode === "max") {
      return [call(new MaxPoolGrad(this.params), x, node.outputs[0], g)];
    }
    return [call(new AveragePoolGrad(this.params), x, g)];
  }
}

export class MaxPoolGrad implements Operator {
  readonly kind = "max_pool_grad";
  readonly props: ReturnType<typeof poolParamsProps>;

  constructor(readonly params: GenericPoolParams) {
    this.props = poolParamsProps(params);
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 3);
    const type = checkPoolInput(this.kind, this.params, inputs[0]);
    requireTensor(inputs[1], "max_pool_grad forward output");
    requireTensor(inputs[2], "max_pool_grad output gradient");
    return [{ type }];
  }
}

export class AveragePoolGrad implements Operator {
  readonly kind = "average_pool_grad";
  readonly props: ReturnType<typeof poolParamsProps>;

  constructor(readonly params: GenericPoolParams) {
    this.props = poolParamsProps(params);
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 2);
    const type = checkPoolInput(this.kind, this.params, inputs[0]);
    requireTensor(inputs[1], "average_pool_grad output gradient");
    return [{ type }];
  }
}

/** Row-wise softmax of a matrix. */
export class GenericSoftmax implements Operator {
  readonly kind = "softmax";
  readonly props = {};

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 1);
    const type = requireTensor(inputs[0], "softmax input");
    requireRank(type, [2], "softmax input");
    return [{ type }];
  }

  grad(node: Apply, outputGrads: readonly Value[]): InputGrad[] {
    return [call(new GenericSoftmaxGrad(), outputGrads[0], node.outputs[0])];
  }
}

/** `softmax_grad(dy, sm)`. */
export class GenericSoftmaxGrad implements Operator {
  readonly kind = "softmax_grad";
  readonly props = {};

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 2);
    requireRank(requireTensor(inputs[0], "softmax_grad dy"), [2], "softmax_grad dy");
    const sm = requireTensor(inputs[1], "softmax_grad sm");
    requireRank(sm, [2], "softmax_grad sm");
    return [{ type: sm }];
  }
}

/**
 * Stand-in for a gradient nobody implemented. Building it is fine; asking
 * autodiff for it as a result, or executing it, fails.
 */
export class GradNotImplemented implements Operator {
  readonly kind = "grad_not_implemented";
  readonly props: { readonly reason: string };
  readonly constantFoldable = false;

  constructor(readonly reason: string) {
    this.props = { reason };
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 1);
    return [{ type: inputs[0].type }];
  }
}

// ============================================================================
// Builders
// ============================================================================

export function contiguous(x: Value): Value {
  return call(new Contiguous(), x);
}

export function allocEmpty(dtype: DType, dims: readonly Value[]): Value {
  return call(new AllocEmpty(dtype), ...dims);
}

export function shapeOf(x: Value): Value {
  return call(new ShapeOf(), x);
}

export function shapeI(x: Value, axis: number): Value {
  return call(new ShapeI(axis), x);
}

/** A fresh buffer with the type and (symbolic) shape of `x`. */
export function emptyLike(x: Value): Value {
  const type = requireTensor(x, "emptyLike input");
  const dims: Value[] = [];
  for (let axis = 0; axis < type.rank; axis++) dims.push(shapeI(x, axis));
  return allocEmpty(type.dtype, dims);
}

export function dimshuffle(x: Value, order: readonly DimShuffleEntry[]): Value {
  return call(new DimShuffle(order), x);
}

export function flip(x: Value, axes: readonly number[]): Value {
  return call(new Flip(axes), x);
}

export function add(a: Value, b: Value): Value {
  return call(new Elemwise("add"), a, b);
}

export function sub(a: Value, b: Value): Value {
  return call(new Elemwise("sub"), a, b);
}

export function mul(a: Value, b: Value): Value {
  return call(new Elemwise("mul"), a, b);
}

export function div(a: Value, b: Value): Value {
  return call(new Elemwise("div"), a, b);
}

export function intDiv(a: Value, b: Value): Value {
  return call(new Elemwise("int_div"), a, b);
}

export function log(x: Value): Value {
  return call(new Elemwise("log"), x);
}

export function neg(x: Value): Value {
  return call(new Elemwise("neg"), x);
}

export function scalarConstant(value: number, dtype: DType): Value {
  return constant(scalarType(dtype), value);
}

export function gradNotImplemented(input: Value, reason: string): Value {
  return call(new GradNotImplemented(reason), input);
}

export function conv(img: Value, kern: Value, params: GenericConvParams): Value {
  return call(new GenericConv(params), img, kern);
}

export function pool(img: Value, params: GenericPoolParams): Value {
  return call(new GenericPool(params), img);
}

export function softmax(x: Value): Value {
  return call(new GenericSoftmax(), x);
}

export function isStaticScalar(value: Value, expected: number): boolean {
  return staticNumber(value) === expected;
}

export function sameBroadcastPattern(a: TensorType, b: TensorType): boolean {
  if (a.rank !== b.rank) return false;
  for (let axis = 0; axis < a.rank; axis++) {
    if (isBroadcastableAxis(a, axis) !== isBroadcastableAxis(b, axis)) return false;
  }
  return true;
}

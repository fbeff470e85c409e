import {
  ConfigurationError,
  FeatureUnsupportedError,
  GraphStructureError,
  ShapeError,
} from "../core/errors";
import type {
  AlgorithmPlan,
  DestroyMap,
  InputGrad,
  Operator,
} from "../graph/operator";
import type { DType, TensorType } from "../graph/types";
import { call, staticNumber, type Apply, type OutputSpec, type Value } from "../graph/value";
import { expectArity, requireResource, requireScalar, requireTensor } from "../ops/checks";
import {
  contiguous,
  emptyLike,
  gradNotImplemented,
  mul,
  scalarConstant,
} from "../ops/generic";
import {
  BACKWARD_ALGORITHMS,
  FORWARD_ALGORITHMS,
  isAutoAlgorithm,
  isBackwardAlgorithm,
  isForwardAlgorithm,
  planFor,
  type BackwardAlgorithm,
  type ForwardAlgorithm,
} from "./algorithms";
import { ALGO_SELECTION_VERSION, type DnnContext } from "./availability";
import { convDescriptorOf } from "./descriptors";

export type ConvOpKind = "dnn_conv" | "dnn_conv_grad_w" | "dnn_conv_grad_i";

/** Input slots shared by all three convolution operators. */
export const CONV_OUT_INPUT = 2;
export const CONV_DESC_INPUT = 3;
export const CONV_ALPHA_INPUT = 4;
export const CONV_BETA_INPUT = 5;

export type ConvOpParams<A extends string> = {
  algo?: A;
  inplace?: boolean;
};

const INPUT_NAMES: Record<ConvOpKind, readonly [string, string]> = {
  dnn_conv: ["img", "kern"],
  dnn_conv_grad_w: ["img", "topgrad"],
  dnn_conv_grad_i: ["kern", "topgrad"],
};

/** `[in][out]` connection pattern: the descriptor is disconnected. */
const CONV_CONNECTIONS = [[true], [true], [true], [false], [true], [true]];

function checkConvInputs(
  kind: ConvOpKind,
  algo: string,
  rank5Rejects: readonly string[],
  inputs: readonly Value[],
): TensorType {
  const [first, second] = INPUT_NAMES[kind];
  const a = requireTensor(inputs[0], `${kind} ${first}`);
  const b = requireTensor(inputs[1], `${kind} ${second}`);
  const out = requireTensor(inputs[CONV_OUT_INPUT], `${kind} output`);
  for (const [name, type] of [
    [first, a],
    [second, b],
    ["output", out],
  ] as const) {
    if (type.rank !== 4 && type.rank !== 5) {
      throw new ShapeError(
        `${kind} ${name} must be a 4-d or 5-d tensor, got rank ${type.rank}`,
      );
    }
  }
  if (a.rank !== b.rank || a.rank !== out.rank) {
    throw new ShapeError(
      `${kind} ${first}, ${second} and output must have the same rank, got ${a.rank}, ${b.rank} and ${out.rank}`,
    );
  }
  if (a.rank === 5 && rank5Rejects.includes(algo)) {
    throw new FeatureUnsupportedError(`convolution algorithm "${algo}" for 3-d convolutions`);
  }
  requireResource(inputs[CONV_DESC_INPUT], "cudnnConvolutionDescriptor_t", `${kind} desc`);
  const builder = convDescriptorOf(inputs[CONV_DESC_INPUT]);
  if (builder && builder.nbDims !== a.rank - 2) {
    throw new ShapeError(
      `${kind} got a ${builder.nbDims}-d descriptor for rank-${a.rank} tensors`,
    );
  }
  for (const slot of [CONV_ALPHA_INPUT, CONV_BETA_INPUT]) {
    const name = slot === CONV_ALPHA_INPUT ? "alpha" : "beta";
    const type = requireScalar(inputs[slot], `${kind} ${name}`);
    if (type.dtype !== a.dtype) {
      throw new GraphStructureError(
        `${kind} ${name} must be ${a.dtype}, got ${type.dtype}`,
      );
    }
  }
  return out;
}

function resolveForwardAlgorithm(ctx: DnnContext, algo: string | undefined): ForwardAlgorithm {
  const name = algo ?? ctx.config.defaultForwardAlgorithm;
  if (!isForwardAlgorithm(name)) {
    throw new ConfigurationError(
      `forward convolution algorithm must be one of ${FORWARD_ALGORITHMS.join(", ")}; got "${name}"`,
    );
  }
  if (name === "fft") {
    ctx.gate.requireVersion("FFT convolution", ALGO_SELECTION_VERSION);
  } else if (isAutoAlgorithm(name)) {
    ctx.gate.requireVersion(
      name.startsWith("time")
        ? "convolution timing"
        : "heuristic convolution algorithm selection",
      ALGO_SELECTION_VERSION,
    );
  }
  return name;
}

function resolveBackwardAlgorithm(ctx: DnnContext, algo: string | undefined): BackwardAlgorithm {
  const name = algo ?? ctx.config.defaultBackwardAlgorithm;
  if (!isBackwardAlgorithm(name)) {
    throw new ConfigurationError(
      `backward convolution algorithm must be one of ${BACKWARD_ALGORITHMS.join(", ")}; got "${name}"`,
    );
  }
  // Before v3 the backward kernels take only algorithm 0 and cannot choose.
  if (name !== "none" && !ctx.gate.supports(ALGO_SELECTION_VERSION)) return "none";
  return name;
}

/** Coerce an α/β argument to a scalar of the image dtype. */
export function scaleInput(
  value: Value | number | undefined,
  fallback: number,
  dtype: DType,
  name: string,
): Value {
  if (value === undefined) return scalarConstant(fallback, dtype);
  if (typeof value === "number") return scalarConstant(value, dtype);
  const type = requireScalar(value, name);
  if (type.dtype === dtype) return value;
  const known = staticNumber(value);
  if (value.isConstant && known !== undefined) return scalarConstant(known, dtype);
  throw new GraphStructureError(
    `${name} must be a ${dtype} scalar, got ${type.dtype}`,
  );
}

/**
 * Forward convolution: `out := α·conv(img, kern) + β·out`.
 * Inputs: img, kern, out, desc, alpha, beta.
 */
export class DnnConv implements Operator {
  readonly kind = "dnn_conv";
  readonly algo: ForwardAlgorithm;
  readonly inplace: boolean;
  readonly destroyMap?: DestroyMap;
  readonly props: { readonly algo: ForwardAlgorithm; readonly inplace: boolean };

  constructor(
    private readonly ctx: DnnContext,
    params: ConvOpParams<ForwardAlgorithm> = {},
  ) {
    this.algo = resolveForwardAlgorithm(ctx, params.algo);
    this.inplace = params.inplace ?? false;
    if (this.inplace) this.destroyMap = { 0: [CONV_OUT_INPUT] };
    this.props = { algo: this.algo, inplace: this.inplace };
  }

  withParams(params: ConvOpParams<ForwardAlgorithm>): DnnConv {
    return new DnnConv(this.ctx, { algo: this.algo, inplace: this.inplace, ...params });
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 6);
    return [{ type: checkConvInputs(this.kind, this.algo, ["fft"], inputs) }];
  }

  inferShape(
    _node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    return [(inputShapes[CONV_OUT_INPUT] ?? []).slice()];
  }

  algorithmPlan(): AlgorithmPlan {
    return planFor(this.algo);
  }

  connectionPattern(): boolean[][] {
    return CONV_CONNECTIONS;
  }

  grad(node: Apply, outputGrads: readonly Value[]): InputGrad[] {
    const [img, kern, , desc, alpha, beta] = node.inputs;
    const top = contiguous(outputGrads[0]);
    const dImg = call(new DnnConvGradI(this.ctx), kern, top, emptyLike(img), desc, alpha1(img), beta0(img));
    const dKern = call(new DnnConvGradW(this.ctx), img, top, emptyLike(kern), desc, alpha1(img), beta0(img));
    return [
      mul(dImg, alpha),
      mul(dKern, alpha),
      mul(top, beta),
      null,
      gradNotImplemented(alpha, `${this.kind} alpha`),
      gradNotImplemented(beta, `${this.kind} beta`),
    ];
  }
}

/**
 * Weight gradient: `out := α·gradW(img, topgrad) + β·out`.
 * Inputs: img, topgrad, out, desc, alpha, beta.
 */
export class DnnConvGradW implements Operator {
  readonly kind = "dnn_conv_grad_w";
  readonly algo: BackwardAlgorithm;
  readonly inplace: boolean;
  readonly destroyMap?: DestroyMap;
  readonly props: { readonly algo: BackwardAlgorithm; readonly inplace: boolean };

  constructor(
    private readonly ctx: DnnContext,
    params: ConvOpParams<BackwardAlgorithm> = {},
  ) {
    this.algo = resolveBackwardAlgorithm(ctx, params.algo);
    this.inplace = params.inplace ?? false;
    if (this.inplace) this.destroyMap = { 0: [CONV_OUT_INPUT] };
    this.props = { algo: this.algo, inplace: this.inplace };
  }

  withParams(params: ConvOpParams<BackwardAlgorithm>): DnnConvGradW {
    return new DnnConvGradW(this.ctx, { algo: this.algo, inplace: this.inplace, ...params });
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 6);
    return [
      { type: checkConvInputs(this.kind, this.algo, ["fft", "deterministic"], inputs) },
    ];
  }

  inferShape(
    _node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    return [(inputShapes[CONV_OUT_INPUT] ?? []).slice()];
  }

  algorithmPlan(): AlgorithmPlan {
    return planFor(this.algo);
  }

  connectionPattern(): boolean[][] {
    return CONV_CONNECTIONS;
  }

  grad(node: Apply, outputGrads: readonly Value[]): InputGrad[] {
    const [img, top, , desc, alpha, beta] = node.inputs;
    const kerns = contiguous(outputGrads[0]);
    const dImg = call(new DnnConvGradI(this.ctx), kerns, top, emptyLike(img), desc, alpha1(img), beta0(img));
    const dTop = call(new DnnConv(this.ctx), img, kerns, emptyLike(top), desc, alpha1(img), beta0(img));
    return [
      mul(dImg, alpha),
      mul(dTop, alpha),
      mul(kerns, beta),
      null,
      gradNotImplemented(alpha, `${this.kind} alpha`),
      gradNotImplemented(beta, `${this.kind} beta`),
    ];
  }
}

/**
 * Input gradient: `out := α·gradI(kern, topgrad) + β·out`.
 * Inputs: kern, topgrad, out, desc, alpha, beta.
 */
export class DnnConvGradI implements Operator {
  readonly kind = "dnn_conv_grad_i";
  readonly algo: BackwardAlgorithm;
  readonly inplace: boolean;
  readonly destroyMap?: DestroyMap;
  readonly props: { readonly algo: BackwardAlgorithm; readonly inplace: boolean };

  constructor(
    private readonly ctx: DnnContext,
    params: ConvOpParams<BackwardAlgorithm> = {},
  ) {
    this.algo = resolveBackwardAlgorithm(ctx, params.algo);
    this.inplace = params.inplace ?? false;
    if (this.inplace) this.destroyMap = { 0: [CONV_OUT_INPUT] };
    this.props = { algo: this.algo, inplace: this.inplace };
  }

  withParams(params: ConvOpParams<BackwardAlgorithm>): DnnConvGradI {
    return new DnnConvGradI(this.ctx, { algo: this.algo, inplace: this.inplace, ...params });
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 6);
    return [
      { type: checkConvInputs(this.kind, this.algo, ["fft", "deterministic"], inputs) },
    ];
  }

  inferShape(
    _node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    return [(inputShapes[CONV_OUT_INPUT] ?? []).slice()];
  }

  algorithmPlan(): AlgorithmPlan {
    return planFor(this.algo);
  }

  connectionPattern(): boolean[][] {
    return CONV_CONNECTIONS;
  }

  grad(node: Apply, outputGrads: readonly Value[]): InputGrad[] {
    const [kern, top, , desc, alpha, beta] = node.inputs;
    const img = contiguous(outputGrads[0]);
    const dKern = call(new DnnConvGradW(this.ctx), img, top, emptyLike(kern), desc, alpha1(kern), beta0(kern));
    const dTop = call(new DnnConv(this.ctx), img, kern, emptyLike(top), desc, alpha1(kern), beta0(kern));
    return [
      mul(dKern, alpha),
      mul(dTop, alpha),
      mul(img, beta),
      null,
      gradNotImplemented(alpha, `${this.kind} alpha`),
      gradNotImplemented(beta, `${this.kind} beta`),
    ];
  }
}

export type ConvOperator = DnnConv | DnnConvGradW | DnnConvGradI;

export function isConvOperator(op: unknown): op is ConvOperator {
  return op instanceof DnnConv || op instanceof DnnConvGradW || op instanceof DnnConvGradI;
}

function tensorDType(value: Value): DType {
  return requireTensor(value, "convolution operand").dtype;
}

function alpha1(like: Value): Value {
  return scalarConstant(1, tensorDType(like));
}

function beta0(like: Value): Value {
  return scalarConstant(0, tensorDType(like));
}

export type ConvCallOptions<A extends string> = ConvOpParams<A> & {
  alpha?: Value | number;
  beta?: Value | number;
};

export function convForward(
  ctx: DnnContext,
  img: Value,
  kern: Value,
  out: Value,
  desc: Value,
  options: ConvCallOptions<ForwardAlgorithm> = {},
): Value {
  const dtype = tensorDType(img);
  const op = new DnnConv(ctx, options);
  return call(
    op,
    img,
    kern,
    out,
    desc,
    scaleInput(options.alpha, 1, dtype, "alpha"),
    scaleInput(options.beta, 0, dtype, "beta"),
  );
}

export function convGradWeights(
  ctx: DnnContext,
  img: Value,
  topgrad: Value,
  out: Value,
  desc: Value,
  options: ConvCallOptions<BackwardAlgorithm> = {},
): Value {
  const dtype = tensorDType(img);
  const op = new DnnConvGradW(ctx, options);
  return call(
    op,
    img,
    topgrad,
    out,
    desc,
    scaleInput(options.alpha, 1, dtype, "alpha"),
    scaleInput(options.beta, 0, dtype, "beta"),
  );
}

export function convGradInputs(
  ctx: DnnContext,
  kern: Value,
  topgrad: Value,
  out: Value,
  desc: Value,
  options: ConvCallOptions<BackwardAlgorithm> = {},
): Value {
  const dtype = tensorDType(kern);
  const op = new DnnConvGradI(ctx, options);
  return call(
    op,
    kern,
    topgrad,
    out,
    desc,
    scaleInput(options.alpha, 1, dtype, "alpha"),
    scaleInput(options.beta, 0, dtype, "beta"),
  );
}

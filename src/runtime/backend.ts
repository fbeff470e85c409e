import type { DType } from "../graph/types";
import type { AlgorithmSelection } from "../graph/operator";
import type { DimShuffleEntry, ElemwiseFn } from "../ops/generic";
import type { ConvOpKind } from "../dnn/conv";
import type { NativeConvParams, NativePoolParams } from "../dnn/descriptors";
import type { SoftmaxAlgo, SoftmaxMode } from "../dnn/softmax";
import type { DescriptorResource } from "../dnn/resource";

/** A value flowing through an executing graph. */
export type RuntimeValue<T, D> =
  | { kind: "tensor"; value: T }
  | { kind: "scalar"; value: number }
  | { kind: "vector"; value: readonly number[] }
  | { kind: "resource"; value: DescriptorResource<D> };

/** What a compiled function hands back for each graph output. */
export type RuntimeOutput<T> =
  | { kind: "tensor"; value: T }
  | { kind: "scalar"; value: number }
  | { kind: "vector"; value: readonly number[] };

export type ConvKernelCall<T, D> = {
  kind: ConvOpKind;
  /** img, kern (forward); img, topgrad (grad_w); kern, topgrad (grad_i). */
  a: T;
  b: T;
  /** Buffer receiving `α·op + β·out`; the kernel writes into it. */
  out: T;
  desc: D;
  alpha: number;
  beta: number;
  /** Concrete algorithm name, never an automatic one. */
  algo: string;
  nativeAlgo: string;
};

export type AlgorithmQuery<D> = {
  kind: ConvOpKind;
  strategy: AlgorithmSelection["strategy"];
  shapes: readonly (readonly number[])[];
  desc: D;
};

/**
 * The numeric side of execution, supplied by the host. `T` is the host's
 * tensor representation, `D` its native descriptor handle.
 */
export interface KernelBackend<T, D> {
  readonly name: string;

  shape(tensor: T): readonly number[];
  allocEmpty(dtype: DType, shape: readonly number[]): T;
  /** A fresh, contiguous copy. */
  copy(tensor: T): T;
  contiguous(tensor: T): T;
  dimshuffle(tensor: T, order: readonly DimShuffleEntry[]): T;
  flip(tensor: T, axes: readonly number[]): T;
  elemwise(fn: ElemwiseFn, operands: readonly (T | number)[]): T;

  createConvDescriptor(params: NativeConvParams, kernelShape: readonly number[]): D;
  createPoolDescriptor(params: NativePoolParams): D;
  destroyDescriptor(handle: D): void;

  conv(call: ConvKernelCall<T, D>): T;
  /** Choose a concrete algorithm by timing or heuristic. */
  selectAlgorithm(query: AlgorithmQuery<D>): string;

  pool(img: T, desc: D): T;
  poolGrad(inp: T, out: T, outGrad: T, desc: D): T;

  softmax(algo: SoftmaxAlgo, mode: SoftmaxMode, x: T): T;
  softmaxGrad(algo: SoftmaxAlgo, mode: SoftmaxMode, dy: T, sm: T): T;
}

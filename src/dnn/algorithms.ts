import type { AlgorithmPlan, AlgorithmSelection } from "../graph/operator";

export const AUTO_ALGORITHMS = [
  "guess_once",
  "guess_on_shape_change",
  "time_once",
  "time_on_shape_change",
] as const;

export const FORWARD_ALGORITHMS = [
  "none",
  "small",
  "large",
  "fft",
  ...AUTO_ALGORITHMS,
] as const;

export const BACKWARD_ALGORITHMS = [
  "none",
  "deterministic",
  "fft",
  ...AUTO_ALGORITHMS,
] as const;

export type AutoAlgorithm = (typeof AUTO_ALGORITHMS)[number];
export type ForwardAlgorithm = (typeof FORWARD_ALGORITHMS)[number];
export type BackwardAlgorithm = (typeof BACKWARD_ALGORITHMS)[number];

export function isForwardAlgorithm(name: string): name is ForwardAlgorithm {
  return FORWARD_ALGORITHMS.some((algo) => algo === name);
}

export function isBackwardAlgorithm(name: string): name is BackwardAlgorithm {
  return BACKWARD_ALGORITHMS.some((algo) => algo === name);
}

export function isAutoAlgorithm(name: string): name is AutoAlgorithm {
  return AUTO_ALGORITHMS.some((algo) => algo === name);
}

export function selectionFor(algo: string): AlgorithmSelection | undefined {
  if (!isAutoAlgorithm(algo)) return undefined;
  return {
    strategy: algo.startsWith("time") ? "time" : "guess",
    scope: algo.endsWith("_once") ? "once" : "on_shape_change",
  };
}

export function planFor(algo: string): AlgorithmPlan {
  const selection = selectionFor(algo);
  return selection ? { algo, selection } : { algo };
}

/** Native algorithm names for the fixed strategies. */
export const FORWARD_NATIVE: Readonly<Record<string, string>> = {
  none: "CUDNN_CONVOLUTION_FWD_ALGO_IMPLICIT_GEMM",
  small: "CUDNN_CONVOLUTION_FWD_ALGO_IMPLICIT_PRECOMP_GEMM",
  large: "CUDNN_CONVOLUTION_FWD_ALGO_GEMM",
  fft: "CUDNN_CONVOLUTION_FWD_ALGO_FFT",
};

export const BACKWARD_FILTER_NATIVE: Readonly<Record<string, string>> = {
  none: "CUDNN_CONVOLUTION_BWD_FILTER_ALGO_0",
  deterministic: "CUDNN_CONVOLUTION_BWD_FILTER_ALGO_1",
  fft: "CUDNN_CONVOLUTION_BWD_FILTER_ALGO_FFT",
};

export const BACKWARD_DATA_NATIVE: Readonly<Record<string, string>> = {
  none: "CUDNN_CONVOLUTION_BWD_DATA_ALGO_0",
  deterministic: "CUDNN_CONVOLUTION_BWD_DATA_ALGO_1",
  fft: "CUDNN_CONVOLUTION_BWD_DATA_ALGO_FFT",
};

import { ConfigurationError } from "./core/errors";
import {
  BACKWARD_ALGORITHMS,
  FORWARD_ALGORITHMS,
  isBackwardAlgorithm,
  isForwardAlgorithm,
  type BackwardAlgorithm,
  type ForwardAlgorithm,
} from "./dnn/algorithms";

/**
 * Accelerated backend configuration. Read once, then frozen; operators and
 * the availability gate only ever see this value.
 */
export type DnnConfig = Readonly<{
  includePath: string;
  libraryPath: string;
  defaultForwardAlgorithm: ForwardAlgorithm;
  defaultBackwardAlgorithm: BackwardAlgorithm;
}>;

export const DEFAULT_DNN_CONFIG: DnnConfig = Object.freeze({
  includePath: "/usr/local/cuda/include",
  libraryPath: "/usr/local/cuda/lib64",
  defaultForwardAlgorithm: "small",
  defaultBackwardAlgorithm: "none",
});

export type Env = Readonly<Record<string, string | undefined>>;

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

export function loadDnnConfig(
  env: Env = process.env,
  overrides: Partial<DnnConfig> = {},
): DnnConfig {
  const fwd =
    overrides.defaultForwardAlgorithm ??
    nonEmpty(env.ACCELOP_DNN_CONV_ALGO_FWD) ??
    DEFAULT_DNN_CONFIG.defaultForwardAlgorithm;
  if (!isForwardAlgorithm(fwd)) {
    throw new ConfigurationError(
      `ACCELOP_DNN_CONV_ALGO_FWD must be one of ${FORWARD_ALGORITHMS.join(", ")}; got "${fwd}"`,
    );
  }
  const bwd =
    overrides.defaultBackwardAlgorithm ??
    nonEmpty(env.ACCELOP_DNN_CONV_ALGO_BWD) ??
    DEFAULT_DNN_CONFIG.defaultBackwardAlgorithm;
  if (!isBackwardAlgorithm(bwd)) {
    throw new ConfigurationError(
      `ACCELOP_DNN_CONV_ALGO_BWD must be one of ${BACKWARD_ALGORITHMS.join(", ")}; got "${bwd}"`,
    );
  }
  return Object.freeze({
    includePath:
      overrides.includePath ??
      nonEmpty(env.ACCELOP_DNN_INCLUDE_PATH) ??
      DEFAULT_DNN_CONFIG.includePath,
    libraryPath:
      overrides.libraryPath ??
      nonEmpty(env.ACCELOP_DNN_LIBRARY_PATH) ??
      DEFAULT_DNN_CONFIG.libraryPath,
    defaultForwardAlgorithm: fwd,
    defaultBackwardAlgorithm: bwd,
  });
}

export class ShapeError extends Error {
  name = "ShapeError";
}

export class ConfigurationError extends Error {
  name = "ConfigurationError";
}

export class UnavailableError extends Error {
  name = "UnavailableError";

  constructor(readonly reason: string) {
    super(`accelerated backend is not available: ${reason}`);
  }
}

export class FeatureUnsupportedError extends Error {
  name = "FeatureUnsupportedError";

  constructor(
    readonly feature: string,
    readonly required?: number,
    readonly detected?: number,
  ) {
    super(
      required === undefined
        ? `${feature} is not supported`
        : `${feature} requires backend version ${required} or newer (detected ${detected})`,
    );
  }
}

/**
 * Raised when acceleration was explicitly requested for an optimization pass
 * but the backend cannot be used. Aborts the whole pass.
 */
export class AccelerationRequiredError extends Error {
  name = "AccelerationRequiredError";
}

export class GradientNotImplementedError extends Error {
  name = "GradientNotImplementedError";
}

export class DescriptorReleasedError extends Error {
  name = "DescriptorReleasedError";
}

export class GraphStructureError extends Error {
  name = "GraphStructureError";
}

export class ReentrantProbeError extends Error {
  name = "ReentrantProbeError";
}

import type { DnnConfig } from "../config";
import {
  FeatureUnsupportedError,
  ReentrantProbeError,
  UnavailableError,
} from "../core/errors";
import {
  parseComputeCapability,
  type DeviceBinding,
  type SessionProbe,
  type SessionVersions,
  type ToolchainProbe,
} from "./toolchain";

export const MIN_SUPPORTED_VERSION = 2000;
/** 3-D convolution and pooling descriptors. */
export const ND_DESCRIPTOR_VERSION = 3000;
export const LOG_SOFTMAX_VERSION = 3000;
/** FFT and automatic algorithm selection for forward convolution. */
export const ALGO_SELECTION_VERSION = 3000;
export const MIN_COMPUTE_CAPABILITY = 30;
export const REQUIRED_DEVICE_FAMILY = "cuda";

/** v3 release candidates: [3000, 3007). */
const RELEASE_CANDIDATE_BAND: readonly [number, number] = [3000, 3007];

export type GateState =
  | { status: "unknown" }
  | { status: "probing" }
  | { status: "available"; version: number }
  | { status: "unavailable"; reason: string };

export type TerminalGateState = Extract<
  GateState,
  { status: "available" | "unavailable" }
>;

export type GateDependencies = {
  config: DnnConfig;
  device: DeviceBinding;
  toolchain: ToolchainProbe;
  session: SessionProbe;
};

const DEBUG =
  typeof process !== "undefined" && !!process.env?.ACCELOP_DEBUG_DNN;

const PROBE_PREAMBLE = `
#include <stdio.h>
#include <cuda.h>
#include <cudnn.h>
`;

const PROBE_BODY = `
cudnnHandle_t _handle = NULL;
cudnnStatus_t err;
if ((err = cudnnCreate(&_handle)) != CUDNN_STATUS_SUCCESS) {
  fprintf(stderr, "could not create a backend handle: %s",
          cudnnGetErrorString(err));
  return 1;
}
`;

/**
 * Capability gate for the accelerated backend. Probes once, on first use,
 * and answers every later query from the cached terminal state. Injected
 * into operators and rules rather than held globally.
 */
export class AvailabilityGate {
  private current: GateState = { status: "unknown" };
  private _probeCount = 0;

  constructor(private readonly deps: GateDependencies) {}

  /** Number of times the probe body has run (0 or 1). */
  get probeCount(): number {
    return this._probeCount;
  }

  get config(): DnnConfig {
    return this.deps.config;
  }

  state(): TerminalGateState {
    return this.resolve();
  }

  /** Current state without triggering a probe. */
  peek(): GateState {
    return this.current;
  }

  isAvailable(): boolean {
    return this.resolve().status === "available";
  }

  reason(): string | null {
    const state = this.resolve();
    return state.status === "unavailable" ? state.reason : null;
  }

  version(): number {
    const state = this.resolve();
    if (state.status === "unavailable") {
      throw new UnavailableError(state.reason);
    }
    return state.version;
  }

  /** Whether the detected version is at least `minVersion` (false if unavailable). */
  supports(minVersion: number): boolean {
    const state = this.resolve();
    return state.status === "available" && state.version >= minVersion;
  }

  /** Throws unless the backend is available at `minVersion` or newer. */
  requireVersion(feature: string, minVersion: number): void {
    const detected = this.version();
    if (detected < minVersion) {
      throw new FeatureUnsupportedError(feature, minVersion, detected);
    }
  }

  private resolve(): TerminalGateState {
    const state = this.current;
    if (state.status === "available" || state.status === "unavailable") {
      return state;
    }
    if (state.status === "probing") {
      throw new ReentrantProbeError(
        "availability gate queried while its probe is running",
      );
    }
    this.current = { status: "probing" };
    this._probeCount++;
    let result: TerminalGateState;
    try {
      result = this.probe();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      result = { status: "unavailable", reason: message };
    }
    this.current = result;
    if (DEBUG) {
      console.log(
        result.status === "available"
          ? `[dnn] backend available, version ${result.version}`
          : `[dnn] backend unavailable: ${result.reason}`,
      );
    }
    return result;
  }

  private probe(): TerminalGateState {
    const unavailable = (reason: string): TerminalGateState => ({
      status: "unavailable",
      reason,
    });

    const device = this.deps.device.query();
    if (!device) return unavailable("no device binding present");
    if (device.family !== REQUIRED_DEVICE_FAMILY) {
      return unavailable("not on required device family");
    }

    const capability = parseComputeCapability(device.computeCapability);
    if (capability === null) {
      return unavailable(
        `unrecognized compute capability "${device.computeCapability}" on ${device.name}`,
      );
    }
    if (capability < MIN_COMPUTE_CAPABILITY) {
      return unavailable(
        `device ${device.name} (${device.computeCapability}) is below the minimum compute capability sm_${MIN_COMPUTE_CAPABILITY}`,
      );
    }

    const { includePath, libraryPath } = this.deps.config;
    const compiled = this.deps.toolchain.tryFlags({
      flags: ["-l", "cudnn", `-I${includePath}`, `-L${libraryPath}`],
      preamble: PROBE_PREAMBLE,
      body: PROBE_BODY,
    });
    if (!compiled.ok) {
      return unavailable(
        `cannot compile against the accelerated backend:\n${compiled.error}`,
      );
    }

    let versions: SessionVersions;
    try {
      versions = this.deps.session.open();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return unavailable(`could not open a backend session: ${message}`);
    }
    const { headerVersion, libraryVersion } = versions;
    if (headerVersion !== libraryVersion) {
      return unavailable(
        `Mixed dnn version. The header is version ${headerVersion} while the library is version ${libraryVersion}.`,
      );
    }
    const version = libraryVersion;
    if (version < MIN_SUPPORTED_VERSION) {
      return unavailable(
        `backend version ${version} is an old release or release candidate that is not supported; update to at least v2 final`,
      );
    }
    const [rcLow, rcHigh] = RELEASE_CANDIDATE_BAND;
    if (version >= rcLow && version < rcHigh) {
      return unavailable(
        `backend version ${version} is a v3 release candidate, which is not supported; update to v3 final`,
      );
    }
    return { status: "available", version };
  }
}

export type DnnContext = {
  readonly gate: AvailabilityGate;
  readonly config: DnnConfig;
};

export function dnnContext(gate: AvailabilityGate): DnnContext {
  return { gate, config: gate.config };
}

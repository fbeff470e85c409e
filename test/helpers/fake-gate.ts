import {
  AvailabilityGate,
  DEFAULT_DNN_CONFIG,
  dnnContext,
  type DeviceInfo,
  type DnnConfig,
  type DnnContext,
  type GateDependencies,
  type TrialCompileRequest,
} from "../../src";

export const CUDA_DEVICE: DeviceInfo = {
  family: "cuda",
  name: "cuda0",
  computeCapability: "sm_52",
};

export type FakeGateOptions = {
  /** Library version; the header reports the same unless `headerVersion` is set. */
  version?: number;
  headerVersion?: number;
  /** `null` means no device is bound. */
  device?: DeviceInfo | null;
  compileError?: string;
  sessionError?: string;
  config?: DnnConfig;
};

export type FakeGateCalls = {
  device: number;
  compile: TrialCompileRequest[];
  session: number;
};

/** In-process gate collaborators that record how often each probe stage ran. */
export function fakeGateDeps(options: FakeGateOptions = {}): {
  deps: GateDependencies;
  calls: FakeGateCalls;
} {
  const calls: FakeGateCalls = { device: 0, compile: [], session: 0 };
  const version = options.version ?? 5005;
  const device = options.device === undefined ? CUDA_DEVICE : options.device;
  const deps: GateDependencies = {
    config: options.config ?? DEFAULT_DNN_CONFIG,
    device: {
      query() {
        calls.device++;
        return device;
      },
    },
    toolchain: {
      tryFlags(request) {
        calls.compile.push(request);
        const error = options.compileError;
        return error === undefined
          ? { ok: true, output: "", error: "" }
          : { ok: false, output: "", error };
      },
    },
    session: {
      open() {
        calls.session++;
        if (options.sessionError !== undefined) throw new Error(options.sessionError);
        return { headerVersion: options.headerVersion ?? version, libraryVersion: version };
      },
    },
  };
  return { deps, calls };
}

export function fakeGate(options: FakeGateOptions = {}): AvailabilityGate {
  return new AvailabilityGate(fakeGateDeps(options).deps);
}

export function fakeContext(options: FakeGateOptions = {}): DnnContext {
  return dnnContext(fakeGate(options));
}

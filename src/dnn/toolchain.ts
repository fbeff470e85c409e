import { spawnSync } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { Env } from "../config";

// ============================================================================
// Device binding
// ============================================================================

export type DeviceInfo = {
  /** Device family, e.g. "cuda" or "cpu". */
  family: string;
  name: string;
  /** Compute capability identifier in `sm_XY` form. */
  computeCapability: string;
};

export interface DeviceBinding {
  /** The active device, or `null` when no device is bound. */
  query(): DeviceInfo | null;
}

/**
 * Device binding from the environment: `ACCELOP_DEVICE` names the device
 * (`cuda0`, `cpu`, ...), `ACCELOP_COMPUTE_CAPABILITY` its `sm_XY` id.
 */
export function nodeDeviceBinding(env: Env = process.env): DeviceBinding {
  return {
    query() {
      const name = env.ACCELOP_DEVICE?.trim();
      if (!name) return null;
      const family = /^[a-z]+/i.exec(name)?.[0].toLowerCase() ?? name;
      return {
        family,
        name,
        computeCapability: env.ACCELOP_COMPUTE_CAPABILITY?.trim() ?? "",
      };
    },
  };
}

/** `sm_35` → 35. Returns `null` for anything else. */
export function parseComputeCapability(id: string): number | null {
  const match = /^sm_(\d+)(\d)$/.exec(id);
  if (!match) return null;
  return Number(match[1]) * 10 + Number(match[2]);
}

// ============================================================================
// Native toolchain probe
// ============================================================================

export type TrialCompileRequest = {
  flags: readonly string[];
  preamble: string;
  body: string;
};

export type TrialCompileResult = {
  ok: boolean;
  output: string;
  error: string;
};

export interface ToolchainProbe {
  /** Compile and link a test program. Never runs it. */
  tryFlags(request: TrialCompileRequest): TrialCompileResult;
}

export type SpawnOutcome = {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
};

export type CompilerSpawn = (
  command: string,
  args: readonly string[],
) => SpawnOutcome;

const defaultSpawn: CompilerSpawn = (command, args) => {
  const result = spawnSync(command, [...args], { encoding: "utf8" });
  return {
    status: result.status,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    error: result.error,
  };
};

export function trialProgram(preamble: string, body: string): string {
  return `${preamble}\nint main(void) {\n${body}\nreturn 0;\n}\n`;
}

/**
 * Toolchain probe that writes the test program into a temp directory and
 * builds it with the host C compiler (`ACCELOP_CC`, default `cc`).
 */
export function createCompilerProbe(
  options: { compiler?: string; spawn?: CompilerSpawn } = {},
): ToolchainProbe {
  const compiler = options.compiler ?? process.env.ACCELOP_CC ?? "cc";
  const spawn = options.spawn ?? defaultSpawn;

  return {
    tryFlags(request) {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), "accelop-probe-"));
      try {
        const source = path.join(dir, "probe.c");
        fs.writeFileSync(source, trialProgram(request.preamble, request.body));
        const result = spawn(compiler, [
          source,
          "-o",
          path.join(dir, "probe"),
          ...request.flags,
        ]);
        if (result.error) {
          return { ok: false, output: result.stdout, error: result.error.message };
        }
        return {
          ok: result.status === 0,
          output: result.stdout,
          error: result.stderr,
        };
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    },
  };
}

// ============================================================================
// Backend session
// ============================================================================

export type SessionVersions = {
  headerVersion: number;
  libraryVersion: number;
};

export interface SessionProbe {
  /** Open a backend session on the bound device and report versions. */
  open(): SessionVersions;
}

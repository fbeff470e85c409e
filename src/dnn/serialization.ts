/**
 * Versioned records for the accelerated operators, so optimized graphs can
 * be stored and reloaded. Older records are upgraded once, at load time.
 */

import { ConfigurationError } from "../core/errors";
import type { Operator, OperatorProps, PropValue } from "../graph/operator";
import { isBackwardAlgorithm, isForwardAlgorithm } from "./algorithms";
import type { DnnContext } from "./availability";
import { DnnConv, DnnConvGradI, DnnConvGradW } from "./conv";
import {
  ConvDescriptorBuilder,
  normalizePoolMode,
  PoolDescriptorBuilder,
  type BorderModeInput,
  type ConvMode,
} from "./descriptors";
import { DnnPool, DnnPoolGrad } from "./pool";
import { DnnSoftmax, DnnSoftmaxGrad, type SoftmaxAlgo, type SoftmaxMode } from "./softmax";

export const SCHEMA_VERSION = 2;

export type OperatorRecord = {
  schemaVersion: number;
  kind: string;
  props: Record<string, PropValue>;
};

const SERIALIZABLE_KINDS: readonly string[] = [
  "dnn_conv",
  "dnn_conv_grad_w",
  "dnn_conv_grad_i",
  "dnn_conv_desc",
  "dnn_pool_desc",
  "dnn_pool",
  "dnn_pool_grad",
  "dnn_softmax",
  "dnn_softmax_grad",
];

const CONV_KINDS: readonly string[] = ["dnn_conv", "dnn_conv_grad_w", "dnn_conv_grad_i"];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPropValue(value: unknown): value is PropValue {
  if (value === null) return true;
  if (Array.isArray(value)) return value.every(isPropValue);
  return ["string", "number", "boolean"].includes(typeof value);
}

export function serializeOperator(op: Operator): OperatorRecord {
  if (!SERIALIZABLE_KINDS.includes(op.kind)) {
    throw new ConfigurationError(`${op.kind} operators are not serializable`);
  }
  return { schemaVersion: SCHEMA_VERSION, kind: op.kind, props: copyProps(op.props) };
}

function copyProp(value: PropValue): PropValue {
  return typeof value === "object" && value !== null ? value.map(copyProp) : value;
}

function copyProps(props: OperatorProps): Record<string, PropValue> {
  const out: Record<string, PropValue> = {};
  for (const [key, value] of Object.entries(props)) out[key] = copyProp(value);
  return out;
}

/**
 * Upgrades a raw record to the current schema. Version 1 records have no
 * `schemaVersion`, name the convolution algorithm `workmem`, omit `inplace`,
 * and omit pooling `pad`.
 */
export function migrateRecord(raw: unknown): OperatorRecord {
  if (!isObject(raw) || typeof raw.kind !== "string" || !isObject(raw.props)) {
    throw new ConfigurationError("operator record must have a string kind and a props object");
  }
  const props: Record<string, PropValue> = {};
  for (const [key, value] of Object.entries(raw.props)) {
    if (!isPropValue(value)) {
      throw new ConfigurationError(`${raw.kind} record prop "${key}" is not a plain value`);
    }
    props[key] = value;
  }

  const version = raw.schemaVersion ?? 1;
  if (version === SCHEMA_VERSION) {
    return { schemaVersion: SCHEMA_VERSION, kind: raw.kind, props };
  }
  if (version !== 1) {
    throw new ConfigurationError(`unsupported operator record schemaVersion ${String(version)}`);
  }

  console.warn(`[dnn] migrating schemaVersion 1 record for ${raw.kind}`);
  if (CONV_KINDS.includes(raw.kind)) {
    if (props.algo === undefined && props.workmem !== undefined) props.algo = props.workmem;
    delete props.workmem;
    if (props.inplace === undefined) props.inplace = false;
  }
  if (raw.kind === "dnn_pool_desc" && props.pad === undefined) {
    const ws = props.ws;
    props.pad = typeof ws === "object" && ws !== null ? ws.map(() => 0) : [0, 0];
  }
  return { schemaVersion: SCHEMA_VERSION, kind: raw.kind, props };
}

function stringProp(record: OperatorRecord, key: string): string | undefined {
  const value = record.props[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigurationError(`${record.kind} prop "${key}" must be a string`);
  }
  return value;
}

function boolProp(record: OperatorRecord, key: string): boolean | undefined {
  const value = record.props[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigurationError(`${record.kind} prop "${key}" must be a boolean`);
  }
  return value;
}

function numbersProp(record: OperatorRecord, key: string): number[] | undefined {
  const value = record.props[key];
  if (value === undefined) return undefined;
  if (typeof value !== "object" || value === null) {
    throw new ConfigurationError(`${record.kind} prop "${key}" must be a number list`);
  }
  return value.map((entry) => {
    if (typeof entry !== "number") {
      throw new ConfigurationError(`${record.kind} prop "${key}" must be a number list`);
    }
    return entry;
  });
}

function required<V>(record: OperatorRecord, key: string, value: V | undefined): V {
  if (value === undefined) {
    throw new ConfigurationError(`${record.kind} record is missing "${key}"`);
  }
  return value;
}

function borderModeProp(record: OperatorRecord): BorderModeInput {
  const value = record.props.borderMode;
  if (value === "valid" || value === "full" || typeof value === "number") return value;
  return required(record, "borderMode", numbersProp(record, "borderMode"));
}

function convModeProp(record: OperatorRecord): ConvMode | undefined {
  const value = stringProp(record, "convMode");
  if (value === undefined || value === "conv" || value === "cross") return value;
  throw new ConfigurationError(`convMode must be "conv" or "cross", got "${value}"`);
}

function softmaxProps(record: OperatorRecord): [SoftmaxAlgo, SoftmaxMode] {
  const algo = required(record, "algo", stringProp(record, "algo"));
  const mode = required(record, "mode", stringProp(record, "mode"));
  if (algo !== "fast" && algo !== "accurate" && algo !== "log") {
    throw new ConfigurationError(`softmax algo must be "fast", "accurate" or "log", got "${algo}"`);
  }
  if (mode !== "channel" && mode !== "instance") {
    throw new ConfigurationError(`softmax mode must be "channel" or "instance", got "${mode}"`);
  }
  return [algo, mode];
}

function forwardAlgo(record: OperatorRecord) {
  const algo = stringProp(record, "algo");
  if (algo === undefined || isForwardAlgorithm(algo)) return algo;
  throw new ConfigurationError(`unknown forward convolution algorithm "${algo}"`);
}

function backwardAlgo(record: OperatorRecord) {
  const algo = stringProp(record, "algo");
  if (algo === undefined || isBackwardAlgorithm(algo)) return algo;
  throw new ConfigurationError(`unknown backward convolution algorithm "${algo}"`);
}

/** Rebuilds an operator from a record of any supported schema version. */
export function deserializeOperator(ctx: DnnContext, raw: unknown): Operator {
  const record = migrateRecord(raw);
  switch (record.kind) {
    case "dnn_conv":
      return new DnnConv(ctx, { algo: forwardAlgo(record), inplace: boolProp(record, "inplace") });
    case "dnn_conv_grad_w":
      return new DnnConvGradW(ctx, { algo: backwardAlgo(record), inplace: boolProp(record, "inplace") });
    case "dnn_conv_grad_i":
      return new DnnConvGradI(ctx, { algo: backwardAlgo(record), inplace: boolProp(record, "inplace") });
    case "dnn_conv_desc":
      return new ConvDescriptorBuilder(ctx, {
        borderMode: borderModeProp(record),
        subsample: numbersProp(record, "subsample"),
        convMode: convModeProp(record),
      });
    case "dnn_pool_desc": {
      const mode = stringProp(record, "mode");
      return new PoolDescriptorBuilder(ctx, {
        ws: required(record, "ws", numbersProp(record, "ws")),
        stride: numbersProp(record, "stride"),
        pad: numbersProp(record, "pad"),
        mode: mode === undefined ? undefined : normalizePoolMode(mode),
      });
    }
    case "dnn_pool":
      return new DnnPool();
    case "dnn_pool_grad":
      return new DnnPoolGrad();
    case "dnn_softmax":
      return new DnnSoftmax(ctx, ...softmaxProps(record));
    case "dnn_softmax_grad":
      return new DnnSoftmaxGrad(ctx, ...softmaxProps(record));
    default:
      throw new ConfigurationError(`cannot deserialize operator kind "${record.kind}"`);
  }
}

/**
 * Rewrite rules that lift generic convolution, pooling and softmax into the
 * accelerated operators, fold surrounding arithmetic into their α/β/output
 * slots, and turn their output buffers into in-place destinations.
 *
 * Every rule declines unless the availability gate reports the backend
 * usable at the version the replacement needs.
 */

import { AccelerationRequiredError, FeatureUnsupportedError } from "../core/errors";
import type { Graph } from "../graph/graph";
import { typesCompatible } from "../graph/types";
import { call, staticNumber, type Apply, type Value } from "../graph/value";
import {
  AllocEmpty,
  AveragePoolGrad,
  contiguous,
  dimshuffle,
  DimShuffle,
  Elemwise,
  GenericConv,
  GenericPool,
  GenericSoftmax,
  GenericSoftmaxGrad,
  isStaticScalar,
  MaxPoolGrad,
  mul,
  sameBroadcastPattern,
  scalarConstant,
  type ElemwiseFn,
  type GenericPoolParams,
} from "../ops/generic";
import {
  LOG_SOFTMAX_VERSION,
  ND_DESCRIPTOR_VERSION,
  type DnnContext,
} from "../dnn/availability";
import {
  CONV_ALPHA_INPUT,
  CONV_BETA_INPUT,
  CONV_OUT_INPUT,
  isConvOperator,
  type ConvOpKind,
  type ConvOperator,
} from "../dnn/conv";
import { poolDescriptor } from "../dnn/descriptors";
import { dnnPool } from "../dnn/functional";
import { DnnPoolGrad } from "../dnn/pool";
import { DnnSoftmax, DnnSoftmaxGrad } from "../dnn/softmax";
import {
  alternativeHint,
  convCandidates,
  primaryLoweringOracle,
  type CostOracle,
} from "./cost";
import { RuleRegistry } from "./registry";
import { globalRule, localRule, type GlobalRule, type LocalRule } from "./rule";

const DEBUG =
  typeof process !== "undefined" && !!process.env?.ACCELOP_DEBUG_REWRITE;

export const DNN_PASS = "dnn";
export const DNN_INPLACE_PASS = "dnn_inplace";

const CONV_KINDS: readonly ConvOpKind[] = ["dnn_conv", "dnn_conv_grad_w", "dnn_conv_grad_i"];

/** Producers whose output may alias their input. */
const VIEW_KINDS: readonly string[] = ["dimshuffle", "flip", "contiguous"];

function isElemwise(node: Apply, fn: ElemwiseFn): node is Apply & { op: Elemwise } {
  return node.op instanceof Elemwise && node.op.fn === fn;
}

/**
 * Run `build`, declining (null) when it needs a backend feature the detected
 * version lacks.
 */
function unlessUnsupported(rule: string, build: () => Value[]): Value[] | null {
  try {
    return build();
  } catch (err) {
    if (!(err instanceof FeatureUnsupportedError)) throw err;
    if (DEBUG) console.log(`[rewrite] ${rule} declined: ${err.message}`);
    return null;
  }
}

// ============================================================================
// Gate
// ============================================================================

/** Aborts optimization when acceleration was requested but is unusable. */
export function hardFailRule(ctx: DnnContext): GlobalRule {
  return globalRule("dnn_required", () => {
    const reason = ctx.gate.reason();
    if (reason !== null) {
      throw new AccelerationRequiredError(
        `accelerated operators were requested, but the backend cannot be used: ${reason}`,
      );
    }
  });
}

// ============================================================================
// Lifting
// ============================================================================

function convLiftable(ctx: DnnContext, node: Apply): node is Apply & { op: GenericConv } {
  if (!(node.op instanceof GenericConv)) return false;
  if (!ctx.gate.isAvailable()) return false;
  const rank = node.inputs[0].type.kind === "tensor" ? node.inputs[0].type.rank : 0;
  return rank === 4 || (rank === 5 && ctx.gate.supports(ND_DESCRIPTOR_VERSION));
}

export function liftConvRule(
  ctx: DnnContext,
  oracle: CostOracle = primaryLoweringOracle,
): LocalRule {
  const name = "local_conv_dnn";
  return localRule(name, ["conv"], (node) => {
    if (!convLiftable(ctx, node)) return null;
    const [img, kern] = node.inputs;
    const chosen = oracle.choose(node.op, convCandidates(ctx, node.op, img, kern));
    return unlessUnsupported(name, () => [chosen.build()]);
  });
}

/** Same lift under the opposite lowering; unit-stride valid/full only. */
export function liftConvAlternativeRule(ctx: DnnContext): LocalRule {
  const name = "local_conv_dnn_alternative";
  return localRule(name, ["conv"], (node) => {
    if (!convLiftable(ctx, node)) return null;
    if (alternativeHint(node.op) === null) return null;
    const [img, kern] = node.inputs;
    const alt = convCandidates(ctx, node.op, img, kern).find((c) => c.label === "alternative");
    if (!alt) return null;
    return unlessUnsupported(name, () => [alt.build()]);
  });
}

function poolLiftable(ctx: DnnContext, params: GenericPoolParams): boolean {
  if (!ctx.gate.isAvailable() || !params.ignoreBorder) return false;
  const nd = params.ws.length;
  return nd === 2 || (nd === 3 && ctx.gate.supports(ND_DESCRIPTOR_VERSION));
}

function descriptorFor(ctx: DnnContext, params: GenericPoolParams): Value {
  return poolDescriptor(ctx, {
    ws: params.ws,
    stride: params.stride,
    pad: params.pad,
    mode: params.mode,
  });
}

export function liftPoolRule(ctx: DnnContext): LocalRule {
  const name = "local_pool_dnn";
  return localRule(name, ["pool"], (node) => {
    const op = node.op;
    if (!(op instanceof GenericPool) || !poolLiftable(ctx, op.params)) return null;
    const { ws, stride, pad, mode } = op.params;
    return unlessUnsupported(name, () => [
      dnnPool(ctx, node.inputs[0], { ws, stride, pad, mode }),
    ]);
  });
}

export function liftMaxPoolGradRule(ctx: DnnContext): LocalRule {
  const name = "local_max_pool_grad_dnn";
  return localRule(name, ["max_pool_grad"], (node) => {
    const op = node.op;
    if (!(op instanceof MaxPoolGrad) || !poolLiftable(ctx, op.params)) return null;
    const [inp, out, outGrad] = node.inputs;
    return unlessUnsupported(name, () => [
      call(
        new DnnPoolGrad(),
        contiguous(inp),
        contiguous(out),
        contiguous(outGrad),
        descriptorFor(ctx, op.params),
      ),
    ]);
  });
}

/** Average pooling never reads the forward output; the gradient stands in for it. */
export function liftAveragePoolGradRule(ctx: DnnContext): LocalRule {
  const name = "local_average_pool_grad_dnn";
  return localRule(name, ["average_pool_grad"], (node) => {
    const op = node.op;
    if (!(op instanceof AveragePoolGrad) || !poolLiftable(ctx, op.params)) return null;
    const [inp, outGrad] = node.inputs;
    const g = contiguous(outGrad);
    return unlessUnsupported(name, () => [
      call(new DnnPoolGrad(), contiguous(inp), g, g, descriptorFor(ctx, op.params)),
    ]);
  });
}

function asChannelImage(x: Value): Value {
  return contiguous(dimshuffle(x, [0, 1, "x", "x"]));
}

export function liftSoftmaxRule(ctx: DnnContext): LocalRule {
  return localRule("local_softmax_dnn", ["softmax"], (node) => {
    if (!(node.op instanceof GenericSoftmax) || !ctx.gate.isAvailable()) return null;
    const out = call(new DnnSoftmax(ctx, "accurate", "channel"), asChannelImage(node.inputs[0]));
    return [dimshuffle(out, [0, 1])];
  });
}

export function liftSoftmaxGradRule(ctx: DnnContext): LocalRule {
  return localRule("local_softmax_grad_dnn", ["softmax_grad"], (node) => {
    if (!(node.op instanceof GenericSoftmaxGrad) || !ctx.gate.isAvailable()) return null;
    const [dy, sm] = node.inputs;
    const out = call(
      new DnnSoftmaxGrad(ctx, "accurate", "channel"),
      asChannelImage(dy),
      asChannelImage(sm),
    );
    return [dimshuffle(out, [0, 1])];
  });
}

// ============================================================================
// Fusion
// ============================================================================

/**
 * `log(softmax(x))` → log-softmax, when the softmax has no other consumer.
 * Looks through the dimshuffle a lifted generic softmax ends in.
 */
export function logSoftmaxRule(ctx: DnnContext): LocalRule {
  return localRule("local_log_softmax_dnn", ["elemwise"], (node, graph) => {
    if (!isElemwise(node, "log")) return null;
    let input = node.inputs[0];
    let view: DimShuffle | null = null;
    const viewNode = input.owner?.node;
    if (viewNode && viewNode.op instanceof DimShuffle) {
      if (graph.clients(input).length !== 1) return null;
      view = viewNode.op;
      input = viewNode.inputs[0];
    }
    const producer = input.owner?.node;
    if (!producer) return null;
    const sm = producer.op;
    if (!(sm instanceof DnnSoftmax) || sm.algo === "log") return null;
    if (graph.clients(input).length !== 1) return null;
    if (!ctx.gate.supports(LOG_SOFTMAX_VERSION)) return null;
    const fused = call(new DnnSoftmax(ctx, "log", sm.mode), producer.inputs[0]);
    return [view ? dimshuffle(fused, view.order) : fused];
  });
}

type MergeTarget = {
  node: Apply;
  op: ConvOperator;
  other: Value;
};

/** The operand of a binary node produced by a `kind` convolution it alone consumes. */
function mergeTarget(node: Apply, graph: Graph, kind: ConvOpKind): MergeTarget | null {
  for (const [mine, theirs] of [
    [0, 1],
    [1, 0],
  ] as const) {
    const candidate = node.inputs[mine];
    const producer = candidate.owner?.node;
    if (!producer) continue;
    const op = producer.op;
    if (!isConvOperator(op) || op.kind !== kind) continue;
    if (graph.clients(candidate).length !== 1) continue;
    return { node: producer, op, other: node.inputs[theirs] };
  }
  return null;
}

function convDType(target: MergeTarget): string | null {
  const out = target.node.inputs[CONV_OUT_INPUT].type;
  return out.kind === "tensor" ? out.dtype : null;
}

/**
 * `s * conv(..., α, β)` → `conv(..., s·α, s·β)`. Constant scales of 0 and 1
 * skip the multiplication.
 */
export function alphaMergeRule(ctx: DnnContext, kind: ConvOpKind): LocalRule {
  return localRule(`local_${kind}_alpha_merge`, ["elemwise"], (node, graph) => {
    if (!ctx.gate.isAvailable() || !isElemwise(node, "mul")) return null;
    const target = mergeTarget(node, graph, kind);
    if (!target) return null;
    const scale = target.other;
    if (scale.type.kind !== "scalar" || scale.type.dtype !== convDType(target)) return null;

    const inputs = target.node.inputs.slice();
    const known = staticNumber(scale);
    if (known === 0) {
      inputs[CONV_ALPHA_INPUT] = scale;
      inputs[CONV_BETA_INPUT] = scale;
    } else if (known !== 1) {
      inputs[CONV_ALPHA_INPUT] = mul(scale, inputs[CONV_ALPHA_INPUT]);
      inputs[CONV_BETA_INPUT] = mul(scale, inputs[CONV_BETA_INPUT]);
    }
    return [call(target.op.withParams({ inplace: false }), ...inputs)];
  });
}

/** `conv(..., out, β=0) + w` → `conv(..., w, β=1)`. */
export function outputMergeRule(ctx: DnnContext, kind: ConvOpKind): LocalRule {
  return localRule(`local_${kind}_output_merge`, ["elemwise"], (node, graph) => {
    if (!ctx.gate.isAvailable() || !isElemwise(node, "add")) return null;
    const target = mergeTarget(node, graph, kind);
    if (!target) return null;
    const w = target.other;
    const out = target.node.inputs[CONV_OUT_INPUT].type;
    if (w.type.kind !== "tensor" || out.kind !== "tensor") return null;
    if (w.type.dtype !== out.dtype) return null;
    if (!sameBroadcastPattern(out, w.type) || !typesCompatible(out, w.type)) return null;
    if (!isStaticScalar(target.node.inputs[CONV_BETA_INPUT], 0)) return null;

    const inputs = target.node.inputs.slice();
    inputs[CONV_OUT_INPUT] = contiguous(w);
    inputs[CONV_BETA_INPUT] = scalarConstant(1, out.dtype);
    return [call(target.op.withParams({ inplace: false }), ...inputs)];
  });
}

// ============================================================================
// In-place
// ============================================================================

function overwritable(value: Value, graph: Graph): boolean {
  const producer = value.owner?.node;
  if (!producer) return false;
  if (VIEW_KINDS.includes(producer.op.kind)) return false;
  return (
    graph.clients(value).length === 1 &&
    !graph.isInput(value) &&
    !graph.isOutput(value) &&
    !value.isConstant
  );
}

/**
 * Marks a convolution as writing into its output-buffer input. A fresh
 * buffer shared with other consumers is re-allocated for this node alone;
 * any other buffer must be exclusively consumed here.
 */
export function inplaceRule(ctx: DnnContext, kind: ConvOpKind): LocalRule {
  return localRule(`local_${kind}_inplace`, [kind], (node, graph) => {
    if (!ctx.gate.isAvailable()) return null;
    const op = node.op;
    if (!isConvOperator(op) || op.inplace) return null;

    const dest = node.inputs[CONV_OUT_INPUT];
    const producer = dest.owner?.node;
    let buffer = dest;
    if (producer && producer.op instanceof AllocEmpty) {
      if (graph.clients(dest).length > 1) {
        buffer = call(new AllocEmpty(producer.op.dtype), ...producer.inputs);
      }
    } else if (!overwritable(dest, graph)) {
      return null;
    }

    const inputs = node.inputs.slice();
    inputs[CONV_OUT_INPUT] = buffer;
    return [call(op.withParams({ inplace: true }), ...inputs)];
  });
}

// ============================================================================
// Registry
// ============================================================================

export type DnnRuleOptions = {
  /** Picks among equivalent convolution lowerings; defaults to the node's hint. */
  costOracle?: CostOracle;
};

/**
 * Registers every accelerated rule. Tag "dnn" selects all of them; the
 * hard-fail rule additionally carries "dnn_required" so hosts that merely
 * allow acceleration can exclude it.
 */
export function registerDnnRules(
  registry: RuleRegistry,
  ctx: DnnContext,
  options: DnnRuleOptions = {},
): RuleRegistry {
  const lift = ["dnn", "fast_run", "fast_compile"];
  const fuse = ["dnn", "fast_run"];

  registry.register(hardFailRule(ctx), { pass: DNN_PASS, priority: 0, tags: ["dnn", "dnn_required"] });
  registry.register(liftConvRule(ctx, options.costOracle), { pass: DNN_PASS, priority: 20, tags: lift });
  registry.register(liftConvAlternativeRule(ctx), {
    pass: DNN_PASS,
    priority: 30,
    tags: ["dnn", "conv_alternative"],
  });
  registry.register(liftPoolRule(ctx), { pass: DNN_PASS, priority: 20, tags: lift });
  registry.register(liftMaxPoolGradRule(ctx), { pass: DNN_PASS, priority: 20, tags: lift });
  registry.register(liftAveragePoolGradRule(ctx), { pass: DNN_PASS, priority: 20, tags: lift });
  registry.register(liftSoftmaxRule(ctx), { pass: DNN_PASS, priority: 20, tags: lift });
  registry.register(liftSoftmaxGradRule(ctx), { pass: DNN_PASS, priority: 20, tags: lift });
  for (const kind of CONV_KINDS) {
    registry.register(alphaMergeRule(ctx, kind), { pass: DNN_PASS, priority: 40, tags: fuse });
    registry.register(outputMergeRule(ctx, kind), { pass: DNN_PASS, priority: 40, tags: fuse });
  }
  registry.register(logSoftmaxRule(ctx), { pass: DNN_PASS, priority: 45, tags: fuse });
  for (const kind of CONV_KINDS) {
    registry.register(inplaceRule(ctx, kind), {
      pass: DNN_INPLACE_PASS,
      priority: 70,
      tags: ["dnn", "inplace"],
    });
  }
  return registry;
}

export function buildDnnRuleRegistry(ctx: DnnContext, options: DnnRuleOptions = {}): RuleRegistry {
  return registerDnnRules(new RuleRegistry(), ctx, options).seal();
}

import { GraphStructureError } from "../core/errors";
import type { Graph } from "../graph/graph";
import type { Apply } from "../graph/value";
import type { LocalRule, RewriteRule } from "./rule";

const DEBUG =
  typeof process !== "undefined" && !!process.env?.ACCELOP_DEBUG_REWRITE;

export type RewriteEvent = {
  rule: string;
  kind: string;
  nodeId: number;
};

export type RewriteReport = {
  events: RewriteEvent[];
  iterations: number;
};

export type FixpointOptions = {
  maxIterations?: number;
};

function applyLocal(rule: LocalRule, node: Apply, graph: Graph): boolean {
  const replacement = rule.transform(node, graph);
  if (!replacement) return false;
  if (replacement.length !== node.outputs.length) {
    throw new GraphStructureError(
      `rule ${rule.name} returned ${replacement.length} values for ${node.outputs.length} outputs`,
    );
  }
  graph.replaceAll(
    node.outputs.map((out, i) => [out, replacement[i]] as const),
    rule.name,
  );
  return true;
}

/**
 * Reference driver: global rules run once, in order; local rules sweep the
 * graph in dependency order until a full sweep changes nothing.
 */
export function rewriteToFixpoint(
  graph: Graph,
  rules: readonly RewriteRule[],
  options: FixpointOptions = {},
): RewriteReport {
  const maxIterations = options.maxIterations ?? 100;
  const events: RewriteEvent[] = [];

  for (const rule of rules) {
    if (rule.type === "global") rule.apply(graph);
  }
  const locals = rules.filter((rule): rule is LocalRule => rule.type === "local");

  let iterations = 0;
  for (;;) {
    if (iterations >= maxIterations) {
      throw new GraphStructureError(
        `rewriting did not reach a fixpoint after ${maxIterations} sweeps`,
      );
    }
    iterations++;
    let changed = false;
    for (const rule of locals) {
      for (const node of graph.toposort()) {
        if (!graph.hasNode(node)) continue;
        if (!rule.tracks.includes(node.op.kind)) continue;
        if (applyLocal(rule, node, graph)) {
          changed = true;
          events.push({ rule: rule.name, kind: node.op.kind, nodeId: node.id });
          if (DEBUG) {
            console.log(`[rewrite] ${rule.name} fired on ${node.op.kind}#${node.id}`);
          }
        }
      }
    }
    if (!changed) break;
  }

  return { events, iterations };
}

import type { Graph } from "../graph/graph";
import type { Apply, Value } from "../graph/value";

/**
 * A local rewrite: given a matched node, return replacement values for its
 * outputs (same count, compatible types) or `null` to decline. Must never
 * match its own output.
 */
export type LocalRule = {
  readonly type: "local";
  readonly name: string;
  /** Operator kinds this rule inspects. */
  readonly tracks: readonly string[];
  transform(node: Apply, graph: Graph): Value[] | null;
};

/** A whole-graph pass; may mutate the graph or throw to abort optimization. */
export type GlobalRule = {
  readonly type: "global";
  readonly name: string;
  apply(graph: Graph): void;
};

export type RewriteRule = LocalRule | GlobalRule;

export function localRule(
  name: string,
  tracks: readonly string[],
  transform: (node: Apply, graph: Graph) => Value[] | null,
): LocalRule {
  return { type: "local", name, tracks, transform };
}

export function globalRule(name: string, apply: (graph: Graph) => void): GlobalRule {
  return { type: "global", name, apply };
}

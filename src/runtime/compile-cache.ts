import { scalarKey } from "../core/scalar";
import type { Graph } from "../graph/graph";
import { opKey } from "../graph/operator";
import { formatType } from "../graph/types";
import type { Value } from "../graph/value";

/**
 * Cache key components for a compiled graph: the normalized structure and
 * the backend version the descriptors were built against.
 */
export type CompiledCacheKey = {
  graphHash: string;
  version: number;
};

export type CompiledCacheEntry<C> = {
  key: CompiledCacheKey;
  compiled: C;
  hitCount: number;
};

function constantPart(value: Value): string {
  const known = value.staticValue;
  if (known === undefined) return "?";
  return typeof known === "number" ? scalarKey(known) : `[${known.map(scalarKey).join(",")}]`;
}

/**
 * Deterministic hash of a graph's structure.
 *
 * The hash captures:
 * - Operator keys in dependency order
 * - Data flow, with inputs and nodes renumbered canonically
 * - Value types and constant contents
 *
 * It does NOT include value or node ids.
 */
export function hashGraph(graph: Graph): string {
  const nodes = graph.toposort();
  const refs = new Map<Value, string>();
  graph.inputs.forEach((input, i) => refs.set(input, `in${i}`));

  const parts: string[] = graph.inputs.map((input, i) => `in${i}:${formatType(input.type)}`);
  nodes.forEach((node, n) => {
    const inputs = node.inputs.map((input) => {
      const ref = refs.get(input);
      if (ref !== undefined) return ref;
      return `const(${formatType(input.type)}=${constantPart(input)})`;
    });
    node.outputs.forEach((out, k) => refs.set(out, `n${n}.${k}`));
    const outTypes = node.outputs.map((out) => formatType(out.type)).join(",");
    parts.push(`${opKey(node.op)}[${inputs.join(",")}](${outTypes})`);
  });
  parts.push(`out[${graph.outputs.map((out) => refs.get(out) ?? constantPart(out)).join(",")}]`);

  return simpleHash(parts.join("|"));
}

/** djb2 string hash. */
function simpleHash(str: string): string {
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = (hash * 33) ^ str.charCodeAt(i);
  }
  return (hash >>> 0).toString(16).padStart(8, "0");
}

export function generateCacheKey(graph: Graph, version: number): CompiledCacheKey {
  return { graphHash: hashGraph(graph), version };
}

export function serializeCacheKey(key: CompiledCacheKey): string {
  return `${key.graphHash}|v${key.version}`;
}

/**
 * LRU cache of compiled functions. Evicted entries are handed to `onEvict`
 * so their descriptors can be released.
 *
 * `compileGraph` does not consult it: hosts that recompile the same graphs
 * own an instance, key it with `generateCacheKey(graph, gate.version())` and
 * pass `(fn) => fn.dispose()` as `onEvict`.
 */
export class CompiledCache<C> {
  private cache = new Map<string, CompiledCacheEntry<C>>();

  constructor(
    private readonly maxSize = 64,
    private readonly onEvict?: (compiled: C) => void,
  ) {}

  get(key: CompiledCacheKey): CompiledCacheEntry<C> | undefined {
    const keyStr = serializeCacheKey(key);
    const entry = this.cache.get(keyStr);
    if (entry) {
      entry.hitCount++;
      // Move to end for LRU
      this.cache.delete(keyStr);
      this.cache.set(keyStr, entry);
    }
    return entry;
  }

  set(key: CompiledCacheKey, compiled: C): CompiledCacheEntry<C> {
    const keyStr = serializeCacheKey(key);
    const previous = this.cache.get(keyStr);
    if (previous) {
      this.cache.delete(keyStr);
      if (previous.compiled !== compiled) this.onEvict?.(previous.compiled);
    }
    while (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      const evicted = this.cache.get(oldest.value);
      this.cache.delete(oldest.value);
      if (evicted) this.onEvict?.(evicted.compiled);
    }

    const entry: CompiledCacheEntry<C> = {
      key,
      compiled,
      hitCount: 0,
    };
    this.cache.set(keyStr, entry);
    return entry;
  }

  has(key: CompiledCacheKey): boolean {
    return this.cache.has(serializeCacheKey(key));
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    for (const entry of this.cache.values()) this.onEvict?.(entry.compiled);
    this.cache.clear();
  }

  stats(): { size: number; entries: { key: string; hitCount: number }[] } {
    const entries = Array.from(this.cache.entries()).map(([key, entry]) => ({
      key,
      hitCount: entry.hitCount,
    }));
    return { size: this.cache.size, entries };
  }
}

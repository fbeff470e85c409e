import type { AlgorithmSelection } from "../graph/operator";

const DEBUG =
  typeof process !== "undefined" && !!process.env?.ACCELOP_DEBUG_RUNTIME;

/**
 * Remembers automatic algorithm choices. `once` keeps the first choice for
 * a node forever; `on_shape_change` keeps one choice per input-shape
 * signature.
 */
export class AlgorithmCache {
  private choices = new Map<string, string>();
  private _hits = 0;
  private _misses = 0;

  get hits(): number {
    return this._hits;
  }

  get misses(): number {
    return this._misses;
  }

  get size(): number {
    return this.choices.size;
  }

  resolve(
    nodeKey: string,
    shapes: readonly (readonly number[])[],
    selection: AlgorithmSelection,
    choose: () => string,
  ): string {
    const key =
      selection.scope === "once"
        ? nodeKey
        : `${nodeKey}|${shapes.map((s) => s.join("x")).join(";")}`;
    const cached = this.choices.get(key);
    if (cached !== undefined) {
      this._hits++;
      return cached;
    }
    this._misses++;
    const algo = choose();
    this.choices.set(key, algo);
    if (DEBUG) {
      console.log(`[runtime] ${selection.strategy} selected ${algo} for ${key}`);
    }
    return algo;
  }

  clear(): void {
    this.choices.clear();
  }
}

import { GraphStructureError } from "../core/errors";
import { formatType, typesCompatible } from "./types";
import type { Apply, Value } from "./value";

/** A consumer of a value: an input slot of a node, or a graph output slot. */
export type Client =
  | { kind: "node"; node: Apply; index: number }
  | { kind: "output"; index: number };

const DEBUG =
  typeof process !== "undefined" && !!process.env?.ACCELOP_DEBUG_REWRITE;

/**
 * A function graph: fixed inputs, replaceable outputs, and the nodes between
 * them. Tracks clients so rewrites can ask how many consumers a value has.
 * Nodes that stop reaching an output after a replacement are pruned.
 */
export class Graph {
  readonly inputs: readonly Value[];
  private _outputs: Value[];
  private nodeSet = new Set<Apply>();
  private clientMap = new Map<Value, Client[]>();

  constructor(inputs: readonly Value[], outputs: readonly Value[]) {
    this.inputs = inputs.slice();
    this._outputs = outputs.slice();
    for (const input of inputs) {
      if (input.owner) {
        throw new GraphStructureError(
          `graph input ${input} is produced by a node`,
        );
      }
      this.clientMap.set(input, []);
    }
    outputs.forEach((output, index) => {
      this.importValue(output);
      this.clientsMut(output).push({ kind: "output", index });
    });
    this.toposort();
  }

  get outputs(): readonly Value[] {
    return this._outputs;
  }

  get size(): number {
    return this.nodeSet.size;
  }

  hasNode(node: Apply): boolean {
    return this.nodeSet.has(node);
  }

  contains(value: Value): boolean {
    return this.clientMap.has(value);
  }

  clients(value: Value): readonly Client[] {
    return this.clientMap.get(value) ?? [];
  }

  isInput(value: Value): boolean {
    return this.inputs.includes(value);
  }

  isOutput(value: Value): boolean {
    return this._outputs.includes(value);
  }

  /** Nodes in dependency order. Throws on a cycle. */
  toposort(): Apply[] {
    const order: Apply[] = [];
    const state = new Map<Apply, "visiting" | "done">();

    const visit = (node: Apply): void => {
      const mark = state.get(node);
      if (mark === "done") return;
      if (mark === "visiting") {
        throw new GraphStructureError(
          `cycle through node ${node.id} (${node.op.kind})`,
        );
      }
      state.set(node, "visiting");
      for (const input of node.inputs) {
        if (input.owner) visit(input.owner.node);
      }
      state.set(node, "done");
      order.push(node);
    };

    for (const output of this._outputs) {
      if (output.owner) visit(output.owner.node);
    }
    return order;
  }

  /**
   * Redirect every client of `old` to `next`. The graph is left unchanged
   * when the types disagree or the rewiring would close a cycle.
   */
  replace(old: Value, next: Value, reason?: string): void {
    if (old === next) return;
    if (!this.clientMap.has(old)) {
      throw new GraphStructureError(`${old} is not part of this graph`);
    }
    if (!typesCompatible(old.type, next.type)) {
      throw new GraphStructureError(
        `cannot replace ${formatType(old.type)} with ${formatType(next.type)}`,
      );
    }

    const before = new Set(this.nodeSet);
    this.importValue(next);
    const moved = this.clientsMut(old).slice();
    this.clientMap.set(old, []);
    for (const client of moved) this.attach(client, next);

    try {
      this.toposort();
    } catch (err) {
      for (const client of moved) this.detach(client, next);
      for (const client of moved) this.attach(client, old);
      for (const node of Array.from(this.nodeSet)) {
        if (!before.has(node)) this.forgetNode(node);
      }
      throw err;
    }

    if (DEBUG) {
      console.log(
        `[rewrite] replace ${old} -> ${next}${reason ? ` (${reason})` : ""}`,
      );
    }
    if (old.owner) this.pruneIfDead(old.owner.node);
  }

  replaceAll(pairs: readonly (readonly [Value, Value])[], reason?: string): void {
    for (const [old, next] of pairs) this.replace(old, next, reason);
  }

  // --------------------------------------------------------------------------

  private clientsMut(value: Value): Client[] {
    let list = this.clientMap.get(value);
    if (!list) {
      list = [];
      this.clientMap.set(value, list);
    }
    return list;
  }

  private importValue(value: Value): void {
    if (this.clientMap.has(value)) return;
    const owner = value.owner;
    if (!owner) {
      if (!value.isConstant) {
        throw new GraphStructureError(
          `${value} is neither a graph input nor a constant`,
        );
      }
      this.clientMap.set(value, []);
      return;
    }
    this.importNode(owner.node);
  }

  private importNode(node: Apply): void {
    if (this.nodeSet.has(node)) return;
    this.nodeSet.add(node);
    for (const output of node.outputs) this.clientsMut(output);
    node.inputs.forEach((input, index) => {
      this.importValue(input);
      this.clientsMut(input).push({ kind: "node", node, index });
    });
  }

  private attach(client: Client, value: Value): void {
    if (client.kind === "node") {
      client.node._setInput(client.index, value);
    } else {
      this._outputs[client.index] = value;
    }
    this.clientsMut(value).push(client);
  }

  private detach(client: Client, value: Value): void {
    const list = this.clientsMut(value);
    const at = list.findIndex(
      (c) =>
        c.kind === client.kind &&
        c.index === client.index &&
        (c.kind === "output" || (client.kind === "node" && c.node === client.node)),
    );
    if (at >= 0) list.splice(at, 1);
  }

  private pruneIfDead(node: Apply): void {
    if (!this.nodeSet.has(node)) return;
    const live = node.outputs.some((out) => this.clients(out).length > 0);
    if (live) return;
    this.forgetNode(node);
    for (const input of node.inputs) {
      if (input.owner) this.pruneIfDead(input.owner.node);
    }
  }

  private forgetNode(node: Apply): void {
    this.nodeSet.delete(node);
    for (const output of node.outputs) this.clientMap.delete(output);
    node.inputs.forEach((input, index) => {
      const list = this.clientMap.get(input);
      if (!list) return;
      const at = list.findIndex(
        (c) => c.kind === "node" && c.node === node && c.index === index,
      );
      if (at >= 0) list.splice(at, 1);
      if (list.length === 0 && !input.owner && !this.inputs.includes(input)) {
        this.clientMap.delete(input);
      }
    });
  }
}

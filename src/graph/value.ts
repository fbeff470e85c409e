import type { Operator } from "./operator";
import type { StaticValue, ValueType } from "./types";

// ============================================================================
// ID counters
// ============================================================================

let nextValueId = 1;
let nextApplyId = 1;

export type ValueOwner = {
  node: Apply;
  index: number;
};

/**
 * A typed edge. Values without an owner are graph inputs or constants.
 * `staticValue` is carried for scalars and shape vectors whose content is
 * known while the graph is being built.
 */
export class Value {
  readonly id: number;

  constructor(
    readonly type: ValueType,
    readonly owner: ValueOwner | null,
    readonly name?: string,
    readonly staticValue?: StaticValue,
    readonly isConstant = false,
  ) {
    this.id = nextValueId++;
  }

  toString(): string {
    return this.name ?? `v${this.id}`;
  }
}

export type OutputSpec = {
  type: ValueType;
  staticValue?: StaticValue;
};

/**
 * A graph node: one operator bound to ordered inputs, producing ordered
 * outputs. Only the owning graph rewires inputs (`_setInput`).
 */
export class Apply {
  readonly id: number;
  readonly outputs: readonly Value[];
  private _inputs: Value[];

  constructor(
    readonly op: Operator,
    inputs: readonly Value[],
    outputs: readonly OutputSpec[],
  ) {
    this.id = nextApplyId++;
    this._inputs = inputs.slice();
    this.outputs = outputs.map(
      (spec, index) =>
        new Value(spec.type, { node: this, index }, undefined, spec.staticValue),
    );
  }

  get inputs(): readonly Value[] {
    return this._inputs;
  }

  /** @internal Used by Graph.replace. */
  _setInput(index: number, value: Value): void {
    this._inputs[index] = value;
  }
}

/**
 * Validate inputs through the operator and build the node. The operator
 * throws before any node or value exists, so failures leave nothing behind.
 */
export function applyOp(op: Operator, inputs: readonly Value[]): Apply {
  const outputs = op.makeOutputs(inputs);
  return new Apply(op, inputs, outputs);
}

/** Single-output convenience around `applyOp`. */
export function call(op: Operator, ...inputs: Value[]): Value {
  return applyOp(op, inputs).outputs[0];
}

export function variable(type: ValueType, name?: string): Value {
  return new Value(type, null, name);
}

export function constant(
  type: ValueType,
  value: StaticValue,
  name?: string,
): Value {
  return new Value(type, null, name, value, true);
}

export function staticNumber(value: Value): number | undefined {
  return typeof value.staticValue === "number" ? value.staticValue : undefined;
}

export function ownerKind(value: Value): string | undefined {
  return value.owner?.node.op.kind;
}

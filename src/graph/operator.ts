import type { Apply, OutputSpec, Value } from "./value";

export type PropValue =
  | string
  | number
  | boolean
  | null
  | readonly PropValue[];

export type OperatorProps = Readonly<Record<string, PropValue>>;

/** Output index → input indices whose buffers that output overwrites. */
export type DestroyMap = Readonly<Record<number, readonly number[]>>;

export type AlgorithmSelection = {
  strategy: "time" | "guess";
  scope: "once" | "on_shape_change";
};

export type AlgorithmPlan = {
  algo: string;
  /** Present for the automatic algorithms; resolved at execution time. */
  selection?: AlgorithmSelection;
};

/**
 * Gradient contribution for one input: a value, `null` when the input is
 * disconnected from every output.
 */
export type InputGrad = Value | null;

/**
 * An immutable description of a computation kind plus fixed parameters.
 * Identity is `opKey`, never object identity. Capabilities beyond
 * `makeOutputs` are optional members; callers dispatch on `kind`.
 */
export interface Operator {
  readonly kind: string;
  readonly props: OperatorProps;

  /**
   * Validate inputs and describe outputs. Must throw before any node is
   * created when the inputs do not fit.
   */
  makeOutputs(inputs: readonly Value[]): OutputSpec[];

  /** Concrete output shapes from concrete input shapes (tensor outputs only). */
  inferShape?(
    node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][];

  /** Vector-Jacobian product: one entry per input. */
  grad?(node: Apply, outputGrads: readonly Value[]): InputGrad[];

  /** `[input][output]`: whether output depends differentiably on input. */
  connectionPattern?(node: Apply): boolean[][];

  readonly destroyMap?: DestroyMap;

  algorithmPlan?(): AlgorithmPlan;

  /** `false` excludes the node from constant propagation. */
  readonly constantFoldable?: boolean;
}

function stableProp(value: PropValue): string {
  if (typeof value === "object" && value !== null) {
    return `[${value.map(stableProp).join(",")}]`;
  }
  if (typeof value === "number" && Object.is(value, -0)) return "-0";
  return JSON.stringify(value);
}

/** Structural identity of an operator: kind plus sorted parameters. */
export function opKey(op: Operator): string {
  const keys = Object.keys(op.props).sort();
  const parts = keys.map((key) => `${key}=${stableProp(op.props[key])}`);
  return `${op.kind}{${parts.join(";")}}`;
}

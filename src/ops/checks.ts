import { GraphStructureError, ShapeError } from "../core/errors";
import type { Padding } from "../core/shape";
import type { Operator } from "../graph/operator";
import {
  formatType,
  type ResourceCType,
  type ResourceType,
  type ScalarType,
  type TensorType,
} from "../graph/types";
import type { Value } from "../graph/value";

export function expectArity(
  op: Operator,
  inputs: readonly Value[],
  arity: number,
): void {
  if (inputs.length !== arity) {
    throw new GraphStructureError(
      `${op.kind} takes ${arity} inputs, got ${inputs.length}`,
    );
  }
}

export function requireTensor(value: Value, what: string): TensorType {
  if (value.type.kind !== "tensor") {
    throw new GraphStructureError(
      `${what} must be a tensor, got ${formatType(value.type)}`,
    );
  }
  return value.type;
}

export function requireScalar(value: Value, what: string): ScalarType {
  if (value.type.kind !== "scalar") {
    throw new GraphStructureError(
      `${what} must be a scalar, got ${formatType(value.type)}`,
    );
  }
  return value.type;
}

export function requireResource(
  value: Value,
  ctype: ResourceCType,
  what: string,
): ResourceType {
  if (value.type.kind !== "resource" || value.type.ctype !== ctype) {
    throw new GraphStructureError(
      `${what} must be a ${ctype}, got ${formatType(value.type)}`,
    );
  }
  return value.type;
}

export function requireRank(
  type: TensorType,
  ranks: readonly number[],
  what: string,
): void {
  if (!ranks.includes(type.rank)) {
    throw new ShapeError(
      `${what} must have rank ${ranks.join(" or ")}, got rank ${type.rank}`,
    );
  }
}

function formatBorderMode(borderMode: Padding | number): string {
  if (typeof borderMode === "string") return `"${borderMode}"`;
  if (typeof borderMode === "number") return String(borderMode);
  return `[${borderMode.join(",")}]`;
}

/** Throws when a convolution geometry leaves no output in some dimension. */
export function requireConvOutput(
  out: readonly number[],
  img: readonly number[],
  kern: readonly number[],
  borderMode: Padding | number,
  subsample: readonly number[],
): void {
  if (out.every((dim) => dim >= 1)) return;
  throw new ShapeError(
    `conv output shape [${out.join(",")}] is empty for image [${img.join(",")}], ` +
      `kernel [${kern.join(",")}], borderMode ${formatBorderMode(borderMode)} ` +
      `and subsample [${subsample.join(",")}]`,
  );
}

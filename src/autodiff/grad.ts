import {
  GradientNotImplementedError,
  GraphStructureError,
} from "../core/errors";
import { formatType, typesCompatible } from "../graph/types";
import type { Apply, Value } from "../graph/value";
import { add, GradNotImplemented } from "../ops/generic";

export type GradientRequest = {
  /** Values whose incoming gradients are known. */
  outputs: readonly Value[];
  /** One gradient per output, typed like the output. */
  outputGrads: readonly Value[];
  wrt: readonly Value[];
  /** "raise" (default) throws for a `wrt` no output depends on; "ignore" yields null. */
  disconnected?: "raise" | "ignore";
};

function isPlaceholder(value: Value): boolean {
  return value.owner?.node.op.kind === "grad_not_implemented";
}

function placeholderReason(value: Value): string {
  const op = value.owner?.node.op;
  return op instanceof GradNotImplemented ? op.reason : "unknown";
}

/**
 * Builds the gradient subgraph of `outputs` with respect to `wrt` by asking
 * each operator on the path for its own differentiation rule, in reverse
 * dependency order. Gradient contributions are summed. Only nodes that both
 * depend on a `wrt` value and feed an output are differentiated.
 */
export function gradients(request: GradientRequest): (Value | null)[] {
  const { outputs, outputGrads, wrt } = request;
  if (outputs.length !== outputGrads.length) {
    throw new GraphStructureError(
      `got ${outputGrads.length} output gradients for ${outputs.length} outputs`,
    );
  }
  outputs.forEach((output, i) => {
    if (!typesCompatible(output.type, outputGrads[i].type)) {
      throw new GraphStructureError(
        `gradient for output ${i} is ${formatType(outputGrads[i].type)}, expected ${formatType(output.type)}`,
      );
    }
  });

  // Topological order of every node feeding the outputs.
  const ordered: Apply[] = [];
  const visited = new Set<Apply>();
  const visit = (node: Apply) => {
    if (visited.has(node)) return;
    visited.add(node);
    for (const input of node.inputs) {
      if (input.owner) visit(input.owner.node);
    }
    ordered.push(node);
  };
  for (const output of outputs) {
    if (output.owner) visit(output.owner.node);
  }

  // Forward pass: which values depend on some wrt.
  const dependsOnWrt = new Set<Value>(wrt);
  for (const node of ordered) {
    if (node.inputs.some((input) => dependsOnWrt.has(input))) {
      for (const out of node.outputs) dependsOnWrt.add(out);
    }
  }

  const gradMap = new Map<Value, Value>();
  const accumulate = (value: Value, grad: Value) => {
    const existing = gradMap.get(value);
    if (!existing) {
      gradMap.set(value, grad);
    } else if (!isPlaceholder(existing)) {
      // A missing contribution makes the whole sum missing.
      gradMap.set(value, isPlaceholder(grad) ? grad : add(existing, grad));
    }
  };
  outputs.forEach((output, i) => accumulate(output, outputGrads[i]));

  for (let i = ordered.length - 1; i >= 0; i -= 1) {
    const node = ordered[i];
    if (!node.inputs.some((input) => dependsOnWrt.has(input))) continue;
    const outGrads = node.outputs.map((out) => gradMap.get(out));
    if (outGrads.every((g) => g === undefined)) continue;

    const op = node.op;
    if (!op.grad) {
      throw new GradientNotImplementedError(
        `${op.kind} has no gradient but lies between the outputs and a requested input`,
      );
    }
    const present: Value[] = [];
    for (const [j, g] of outGrads.entries()) {
      if (!g) {
        throw new GradientNotImplementedError(
          `${op.kind} output ${j} has no incoming gradient`,
        );
      }
      present.push(g);
    }

    const pattern = op.connectionPattern?.(node);
    const upstreamMissing = present.find(isPlaceholder);
    const inputGrads = upstreamMissing ? [] : op.grad(node, present);

    node.inputs.forEach((input, j) => {
      if (!dependsOnWrt.has(input)) return;
      const connected = pattern ? pattern[j].some(Boolean) : true;
      if (!connected) return;
      if (upstreamMissing) {
        accumulate(input, upstreamMissing);
        return;
      }
      const grad = inputGrads[j];
      if (grad) accumulate(input, grad);
    });
  }

  return wrt.map((value) => {
    const grad = gradMap.get(value);
    if (!grad) {
      if (request.disconnected === "ignore") return null;
      throw new GraphStructureError(
        `${value} is not connected to any requested output`,
      );
    }
    if (isPlaceholder(grad)) {
      throw new GradientNotImplementedError(
        `gradient of ${value} is not implemented: ${placeholderReason(grad)}`,
      );
    }
    return grad;
  });
}

/** Single-output convenience: gradient of `output` given its incoming gradient. */
export function grad(output: Value, outputGrad: Value, wrt: readonly Value[]): Value[] {
  return gradients({ outputs: [output], outputGrads: [outputGrad], wrt }).map(
    (g, i) => {
      if (!g) throw new GraphStructureError(`${wrt[i]} is not connected to ${output}`);
      return g;
    },
  );
}

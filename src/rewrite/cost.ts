import type { Value } from "../graph/value";
import type { GenericConv, ConvDirectionHint } from "../ops/generic";
import type { DnnContext } from "../dnn/availability";
import { chooseConvLowering, dnnConv, type ConvLowering } from "../dnn/functional";

/** One way to lift a generic convolution; `build` creates the subgraph. */
export type ConvCandidate = {
  label: "primary" | "alternative";
  directionHint: ConvDirectionHint;
  lowering: ConvLowering;
  build(): Value;
};

/** Picks one of the equivalent convolution lowerings for a node. */
export interface CostOracle {
  choose(op: GenericConv, candidates: readonly ConvCandidate[]): ConvCandidate;
}

/** Always the lowering named by the node's own direction hint. */
export const primaryLoweringOracle: CostOracle = {
  choose: (_op, candidates) => candidates[0],
};

export function preferLowering(lowering: ConvLowering): CostOracle {
  return {
    choose: (_op, candidates) =>
      candidates.find((c) => c.lowering === lowering) ?? candidates[0],
  };
}

/**
 * The hint that switches a unit-stride valid/full convolution to its other
 * lowering, or null when there is none.
 */
export function alternativeHint(op: GenericConv): ConvDirectionHint | null {
  const { borderMode, subsample, directionHint } = op.params;
  if (!subsample.every((s) => s === 1)) return null;
  if (borderMode === "full") return "forward!";
  if (borderMode === "valid") {
    return directionHint === "bprop weights" ? "forward" : "bprop weights";
  }
  return null;
}

/** Primary candidate first, then the alternative where one exists. */
export function convCandidates(
  ctx: DnnContext,
  op: GenericConv,
  img: Value,
  kern: Value,
): ConvCandidate[] {
  const { borderMode, subsample, filterFlip } = op.params;
  const candidate = (
    label: ConvCandidate["label"],
    directionHint: ConvDirectionHint,
  ): ConvCandidate => ({
    label,
    directionHint,
    lowering: chooseConvLowering(borderMode, subsample, directionHint),
    build: () =>
      dnnConv(ctx, img, kern, {
        borderMode,
        subsample,
        convMode: filterFlip ? "conv" : "cross",
        directionHint,
      }),
  });

  const candidates = [candidate("primary", op.params.directionHint)];
  const alt = alternativeHint(op);
  if (alt) candidates.push(candidate("alternative", alt));
  return candidates;
}

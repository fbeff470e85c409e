import { ConfigurationError } from "../core/errors";
import type { InputGrad, Operator } from "../graph/operator";
import { call, type Apply, type OutputSpec, type Value } from "../graph/value";
import { expectArity, requireRank, requireTensor } from "../ops/checks";
import { LOG_SOFTMAX_VERSION, type DnnContext } from "./availability";

export type SoftmaxAlgo = "fast" | "accurate" | "log";
/** "channel": across c at each spatial position; "instance": across c01 per image. */
export type SoftmaxMode = "channel" | "instance";

function checkConfig(ctx: DnnContext, algo: string, mode: string): void {
  if (algo !== "fast" && algo !== "accurate" && algo !== "log") {
    throw new ConfigurationError(
      `softmax algo must be "fast", "accurate" or "log", got "${algo}"`,
    );
  }
  if (mode !== "channel" && mode !== "instance") {
    throw new ConfigurationError(
      `softmax mode must be "channel" or "instance", got "${mode}"`,
    );
  }
  if (algo === "log") ctx.gate.requireVersion("log-softmax", LOG_SOFTMAX_VERSION);
}

export class DnnSoftmax implements Operator {
  readonly kind = "dnn_softmax";
  readonly props: { readonly algo: SoftmaxAlgo; readonly mode: SoftmaxMode };

  constructor(
    private readonly ctx: DnnContext,
    readonly algo: SoftmaxAlgo,
    readonly mode: SoftmaxMode,
  ) {
    checkConfig(ctx, algo, mode);
    this.props = { algo, mode };
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 1);
    const x = requireTensor(inputs[0], "dnn_softmax input");
    requireRank(x, [4], "dnn_softmax input");
    return [{ type: x }];
  }

  inferShape(
    _node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    return [(inputShapes[0] ?? []).slice()];
  }

  grad(node: Apply, outputGrads: readonly Value[]): InputGrad[] {
    const op = new DnnSoftmaxGrad(this.ctx, this.algo, this.mode);
    return [call(op, outputGrads[0], node.outputs[0])];
  }
}

/** `(dy, sm)`, both rank 4, typed like `sm`. */
export class DnnSoftmaxGrad implements Operator {
  readonly kind = "dnn_softmax_grad";
  readonly props: { readonly algo: SoftmaxAlgo; readonly mode: SoftmaxMode };

  constructor(
    ctx: DnnContext,
    readonly algo: SoftmaxAlgo,
    readonly mode: SoftmaxMode,
  ) {
    checkConfig(ctx, algo, mode);
    this.props = { algo, mode };
  }

  makeOutputs(inputs: readonly Value[]): OutputSpec[] {
    expectArity(this, inputs, 2);
    requireRank(requireTensor(inputs[0], "dnn_softmax_grad dy"), [4], "dnn_softmax_grad dy");
    const sm = requireTensor(inputs[1], "dnn_softmax_grad sm");
    requireRank(sm, [4], "dnn_softmax_grad sm");
    return [{ type: sm }];
  }

  inferShape(
    _node: Apply,
    inputShapes: readonly (readonly number[] | null)[],
  ): number[][] {
    return [(inputShapes[1] ?? []).slice()];
  }
}

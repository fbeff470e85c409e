import {
  ConfigurationError,
  DescriptorReleasedError,
  GradientNotImplementedError,
  GraphStructureError,
  ShapeError,
} from "../core/errors";
import type { Graph } from "../graph/graph";
import { opKey, type Operator } from "../graph/operator";
import type { Apply, Value } from "../graph/value";
import {
  AllocEmpty,
  DimShuffle,
  Elemwise,
  evalScalar,
  Flip,
  GradNotImplemented,
  ShapeI,
} from "../ops/generic";
import {
  BACKWARD_DATA_NATIVE,
  BACKWARD_FILTER_NATIVE,
  FORWARD_NATIVE,
  isAutoAlgorithm,
} from "../dnn/algorithms";
import type { AvailabilityGate } from "../dnn/availability";
import {
  CONV_ALPHA_INPUT,
  CONV_BETA_INPUT,
  CONV_DESC_INPUT,
  CONV_OUT_INPUT,
  isConvOperator,
  type ConvOperator,
} from "../dnn/conv";
import { ConvDescriptorBuilder, PoolDescriptorBuilder } from "../dnn/descriptors";
import { DescriptorCache, DescriptorResource, descriptorKey } from "../dnn/resource";
import { DnnSoftmax, DnnSoftmaxGrad } from "../dnn/softmax";
import { AlgorithmCache } from "./algorithm-cache";
import type { KernelBackend, RuntimeOutput, RuntimeValue } from "./backend";

const DEBUG =
  typeof process !== "undefined" && !!process.env?.ACCELOP_DEBUG_RUNTIME;

export type CompileOptions<T, D> = {
  backend: KernelBackend<T, D>;
  gate: AvailabilityGate;
  /** Shared across compiled functions when given. */
  algorithmCache?: AlgorithmCache;
};

/** Tensors for tensor inputs, numbers for scalar inputs. */
export type RuntimeInput<T> = T | number;

type Held<D> = DescriptorResource<D>[];

function expectOp<C extends Operator>(
  op: Operator,
  ctor: abstract new (...args: never[]) => C,
): C {
  if (!(op instanceof ctor)) {
    throw new GraphStructureError(`unexpected operator implementation for ${op.kind}`);
  }
  return op;
}

const NATIVE_TABLES: Record<ConvOperator["kind"], Readonly<Record<string, string>>> = {
  dnn_conv: FORWARD_NATIVE,
  dnn_conv_grad_w: BACKWARD_FILTER_NATIVE,
  dnn_conv_grad_i: BACKWARD_DATA_NATIVE,
};

/**
 * A graph bound to a kernel backend. Descriptors are created on first use
 * and reused across runs; each run holds a reference to every descriptor it
 * touches until it returns.
 */
export class CompiledFunction<T, D> {
  readonly algorithms: AlgorithmCache;
  private readonly order: readonly Apply[];
  private readonly descriptors = new DescriptorCache<D>();
  private disposed = false;

  constructor(
    private readonly graph: Graph,
    private readonly backend: KernelBackend<T, D>,
    private readonly gate: AvailabilityGate,
    algorithms?: AlgorithmCache,
  ) {
    this.order = graph.toposort();
    this.algorithms = algorithms ?? new AlgorithmCache();
  }

  /** Descriptors materialized so far. */
  get descriptorCount(): number {
    return this.descriptors.createdCount;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  run(inputs: readonly RuntimeInput<T>[]): RuntimeOutput<T>[] {
    if (this.disposed) {
      throw new DescriptorReleasedError("compiled function has been disposed");
    }
    const graphInputs = this.graph.inputs;
    if (inputs.length !== graphInputs.length) {
      throw new GraphStructureError(
        `expected ${graphInputs.length} inputs, got ${inputs.length}`,
      );
    }

    const env = new Map<Value, RuntimeValue<T, D>>();
    graphInputs.forEach((value, i) => {
      const given = inputs[i];
      if (value.type.kind === "scalar") {
        if (typeof given !== "number") {
          throw new GraphStructureError(`input ${value} must be a number`);
        }
        env.set(value, { kind: "scalar", value: given });
      } else if (value.type.kind === "tensor") {
        if (typeof given === "number") {
          throw new GraphStructureError(`input ${value} must be a tensor`);
        }
        env.set(value, { kind: "tensor", value: given });
      } else {
        throw new GraphStructureError(`input ${value} is a descriptor; descriptors are built in-graph`);
      }
    });

    const read = (value: Value): RuntimeValue<T, D> => {
      const known = env.get(value);
      if (known) return known;
      if (value.isConstant && value.staticValue !== undefined) {
        const constant: RuntimeValue<T, D> =
          typeof value.staticValue === "number"
            ? { kind: "scalar", value: value.staticValue }
            : { kind: "vector", value: value.staticValue };
        env.set(value, constant);
        return constant;
      }
      throw new GraphStructureError(`${value} has not been computed`);
    };

    const held: Held<D> = [];
    try {
      for (const node of this.order) {
        const result = this.execute(node, node.inputs.map(read), held);
        env.set(node.outputs[0], result);
      }
      return this.graph.outputs.map((value) => {
        const result = read(value);
        if (result.kind === "resource") {
          throw new GraphStructureError(`output ${value} is a descriptor`);
        }
        return result;
      });
    } finally {
      for (const resource of held) resource.release();
    }
  }

  /** Releases the descriptor cache; descriptors held by a running call live until it returns. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.descriptors.clear();
    if (DEBUG) console.log("[runtime] disposed compiled function");
  }

  // --------------------------------------------------------------------------

  private execute(
    node: Apply,
    args: readonly RuntimeValue<T, D>[],
    held: Held<D>,
  ): RuntimeValue<T, D> {
    const { backend } = this;
    const op = node.op;
    const tensor = (value: T): RuntimeValue<T, D> => ({ kind: "tensor", value });

    switch (op.kind) {
      case "contiguous":
        return tensor(backend.contiguous(tensorArg(node, args, 0)));
      case "alloc_empty": {
        const alloc = expectOp(op, AllocEmpty);
        const dims = args.map((_, i) => scalarArg(node, args, i));
        return tensor(backend.allocEmpty(alloc.dtype, dims));
      }
      case "shape":
        return { kind: "vector", value: backend.shape(tensorArg(node, args, 0)).slice() };
      case "shape_i": {
        const axis = expectOp(op, ShapeI).axis;
        return { kind: "scalar", value: backend.shape(tensorArg(node, args, 0))[axis] };
      }
      case "dimshuffle":
        return tensor(backend.dimshuffle(tensorArg(node, args, 0), expectOp(op, DimShuffle).order));
      case "flip":
        return tensor(backend.flip(tensorArg(node, args, 0), expectOp(op, Flip).axes));
      case "elemwise":
        return this.elemwise(expectOp(op, Elemwise), node, args);

      case "dnn_conv_desc": {
        const builder = expectOp(op, ConvDescriptorBuilder);
        const kernelShape = vectorArg(node, args, 0);
        if (kernelShape.length !== builder.nbDims + 2) {
          throw new ShapeError(
            `kernel shape [${kernelShape.join(",")}] does not fit a ${builder.nbDims}-d descriptor`,
          );
        }
        const key = descriptorKey(opKey(builder), kernelShape, this.gate.version());
        const resource = this.descriptors.acquire(key, () =>
          new DescriptorResource(
            "cudnnConvolutionDescriptor_t",
            backend.createConvDescriptor(builder.nativeParams(), kernelShape),
            (handle) => backend.destroyDescriptor(handle),
          ),
        );
        held.push(resource);
        return { kind: "resource", value: resource };
      }
      case "dnn_pool_desc": {
        const builder = expectOp(op, PoolDescriptorBuilder);
        const key = descriptorKey(opKey(builder), null, this.gate.version());
        const resource = this.descriptors.acquire(key, () =>
          new DescriptorResource(
            "cudnnPoolingDescriptor_t",
            backend.createPoolDescriptor(builder.nativeParams()),
            (handle) => backend.destroyDescriptor(handle),
          ),
        );
        held.push(resource);
        return { kind: "resource", value: resource };
      }

      case "dnn_conv":
      case "dnn_conv_grad_w":
      case "dnn_conv_grad_i": {
        if (!isConvOperator(op)) {
          throw new GraphStructureError(`unexpected operator implementation for ${op.kind}`);
        }
        return tensor(this.conv(op, node, args));
      }

      case "dnn_pool":
        return tensor(
          backend.pool(tensorArg(node, args, 0), resourceArg(node, args, 1).get()),
        );
      case "dnn_pool_grad":
        return tensor(
          backend.poolGrad(
            tensorArg(node, args, 0),
            tensorArg(node, args, 1),
            tensorArg(node, args, 2),
            resourceArg(node, args, 3).get(),
          ),
        );
      case "dnn_softmax": {
        const sm = expectOp(op, DnnSoftmax);
        return tensor(backend.softmax(sm.algo, sm.mode, tensorArg(node, args, 0)));
      }
      case "dnn_softmax_grad": {
        const sg = expectOp(op, DnnSoftmaxGrad);
        return tensor(
          backend.softmaxGrad(sg.algo, sg.mode, tensorArg(node, args, 0), tensorArg(node, args, 1)),
        );
      }

      case "grad_not_implemented":
        throw new GradientNotImplementedError(
          `cannot execute a missing gradient: ${expectOp(op, GradNotImplemented).reason}`,
        );
      default:
        throw new GraphStructureError(
          `no kernel for ${op.kind}; lift it to an accelerated operator first`,
        );
    }
  }

  private elemwise(
    op: Elemwise,
    node: Apply,
    args: readonly RuntimeValue<T, D>[],
  ): RuntimeValue<T, D> {
    const operands: (T | number)[] = args.map((arg, i) => {
      if (arg.kind === "tensor" || arg.kind === "scalar") return arg.value;
      throw new GraphStructureError(`${op.fn} operand ${i} of node ${node.id} is a ${arg.kind}`);
    });
    const numbers = operands.filter((x): x is number => typeof x === "number");
    if (numbers.length === operands.length) {
      return { kind: "scalar", value: evalScalar(op.fn, numbers[0], numbers[1] ?? 0) };
    }
    return { kind: "tensor", value: this.backend.elemwise(op.fn, operands) };
  }

  private conv(op: ConvOperator, node: Apply, args: readonly RuntimeValue<T, D>[]): T {
    const a = tensorArg(node, args, 0);
    const b = tensorArg(node, args, 1);
    const out = tensorArg(node, args, CONV_OUT_INPUT);
    const desc = resourceArg(node, args, CONV_DESC_INPUT).get();

    const plan = op.algorithmPlan();
    let algo = plan.algo;
    const selection = plan.selection;
    if (selection) {
      const shapes = [a, b, out].map((t) => this.backend.shape(t));
      algo = this.algorithms.resolve(`${node.id}`, shapes, selection, () => {
        const chosen = this.backend.selectAlgorithm({
          kind: op.kind,
          strategy: selection.strategy,
          shapes,
          desc,
        });
        if (isAutoAlgorithm(chosen)) {
          throw new ConfigurationError(
            `${this.backend.name} selected the automatic algorithm "${chosen}" for ${op.kind}`,
          );
        }
        return chosen;
      });
    }
    const nativeAlgo = NATIVE_TABLES[op.kind][algo];
    if (nativeAlgo === undefined) {
      throw new ConfigurationError(`${op.kind} has no native algorithm named "${algo}"`);
    }

    return this.backend.conv({
      kind: op.kind,
      a,
      b,
      out: op.inplace ? out : this.backend.copy(out),
      desc,
      alpha: scalarArg(node, args, CONV_ALPHA_INPUT),
      beta: scalarArg(node, args, CONV_BETA_INPUT),
      algo,
      nativeAlgo,
    });
  }
}

function argAt<T, D>(node: Apply, args: readonly RuntimeValue<T, D>[], i: number): RuntimeValue<T, D> {
  const arg = args[i];
  if (!arg) throw new GraphStructureError(`${node.op.kind} node ${node.id} is missing input ${i}`);
  return arg;
}

function tensorArg<T, D>(node: Apply, args: readonly RuntimeValue<T, D>[], i: number): T {
  const arg = argAt(node, args, i);
  if (arg.kind !== "tensor") {
    throw new GraphStructureError(`${node.op.kind} input ${i} must be a tensor, got ${arg.kind}`);
  }
  return arg.value;
}

function scalarArg<T, D>(node: Apply, args: readonly RuntimeValue<T, D>[], i: number): number {
  const arg = argAt(node, args, i);
  if (arg.kind !== "scalar") {
    throw new GraphStructureError(`${node.op.kind} input ${i} must be a scalar, got ${arg.kind}`);
  }
  return arg.value;
}

function vectorArg<T, D>(
  node: Apply,
  args: readonly RuntimeValue<T, D>[],
  i: number,
): readonly number[] {
  const arg = argAt(node, args, i);
  if (arg.kind !== "vector") {
    throw new GraphStructureError(`${node.op.kind} input ${i} must be a shape vector, got ${arg.kind}`);
  }
  return arg.value;
}

function resourceArg<T, D>(
  node: Apply,
  args: readonly RuntimeValue<T, D>[],
  i: number,
): DescriptorResource<D> {
  const arg = argAt(node, args, i);
  if (arg.kind !== "resource") {
    throw new GraphStructureError(`${node.op.kind} input ${i} must be a descriptor, got ${arg.kind}`);
  }
  return arg.value;
}

export function compileGraph<T, D>(graph: Graph, options: CompileOptions<T, D>): CompiledFunction<T, D> {
  const compiled = new CompiledFunction(graph, options.backend, options.gate, options.algorithmCache);
  if (DEBUG) {
    console.log(`[runtime] compiled ${graph.size} nodes for ${options.backend.name}`);
  }
  return compiled;
}

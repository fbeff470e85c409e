import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
  AlgorithmCache,
  buildDnnRuleRegistry,
  compileGraph,
  ConfigurationError,
  conv,
  convDescriptor,
  convForward,
  convOutputShape,
  DescriptorReleasedError,
  dnnConv,
  dnnPool,
  DNN_INPLACE_PASS,
  DNN_PASS,
  GenericSoftmaxGrad,
  GradientNotImplementedError,
  gradients,
  gradNotImplemented,
  Graph,
  GraphStructureError,
  add,
  loadDnnConfig,
  call,
  log,
  mul,
  ownerKind,
  rewriteToFixpoint,
  scalarConstant,
  shapeOf,
  softmax,
  tensorType,
  variable,
  type BackwardAlgorithm,
  type ConvDirectionHint,
  type DnnContext,
  type ForwardAlgorithm,
  type Padding,
} from "../src";
import { fakeContext } from "./helpers/fake-gate";
import {
  expectNDArray,
  maxAbsDiff,
  NDArray,
  ReferenceBackend,
  referenceConv,
  seededArray,
} from "./helpers/reference-backend";

const ctx = fakeContext({ version: 5005 });

function optimize(graph: Graph, context: DnnContext = ctx): Graph {
  const registry = buildDnnRuleRegistry(context);
  rewriteToFixpoint(graph, registry.query(DNN_PASS));
  rewriteToFixpoint(graph, registry.query(DNN_INPLACE_PASS));
  return graph;
}

function execute(
  graph: Graph,
  inputs: readonly (NDArray | number)[],
  context: DnnContext = ctx,
): NDArray[] {
  const fn = compileGraph(graph, { backend: new ReferenceBackend(), gate: context.gate });
  try {
    return fn.run(inputs).map(expectNDArray);
  } finally {
    fn.dispose();
  }
}

function forwardGraph(imgShape: number[], kernShape: number[], algo?: ForwardAlgorithm) {
  const img = variable(tensorType("f64", imgShape), "img");
  const kern = variable(tensorType("f64", kernShape), "kern");
  return new Graph([img, kern], [dnnConv(ctx, img, kern, { borderMode: "valid", algo })]);
}

describe("lowering equivalence", () => {
  const img = seededArray([2, 3, 6, 5], 11);
  const kern = seededArray([4, 3, 3, 2], 12);

  const cases: { name: string; borderMode: "valid" | "full"; hint: ConvDirectionHint }[] = [
    { name: "valid forward", borderMode: "valid", hint: "forward" },
    { name: "valid through the weight gradient", borderMode: "valid", hint: "bprop weights" },
    { name: "full through the input gradient", borderMode: "full", hint: "forward" },
    { name: "full forward", borderMode: "full", hint: "forward!" },
  ];

  for (const filterFlip of [true, false]) {
    it.each(cases)(`$name matches the reference (filterFlip ${filterFlip})`, ({ borderMode, hint }) => {
      const imgV = variable(tensorType("f64", img.shape));
      const kernV = variable(tensorType("f64", kern.shape));
      const out = dnnConv(ctx, imgV, kernV, {
        borderMode,
        convMode: filterFlip ? "conv" : "cross",
        directionHint: hint,
      });
      const [result] = execute(new Graph([imgV, kernV], [out]), [img, kern]);
      const expected = referenceConv(img, kern, { borderMode, subsample: [1, 1], filterFlip });
      expect(result.shape).toEqual(expected.shape);
      expect(maxAbsDiff(result, expected)).toBeLessThan(1e-9);
    });
  }

  it("handles strided convolutions with explicit padding", () => {
    const imgV = variable(tensorType("f64", img.shape));
    const kernV = variable(tensorType("f64", kern.shape));
    const out = dnnConv(ctx, imgV, kernV, { borderMode: [1, 2], subsample: [2, 3] });
    const [result] = execute(new Graph([imgV, kernV], [out]), [img, kern]);
    const expected = referenceConv(img, kern, { borderMode: [1, 2], subsample: [2, 3], filterFlip: true });
    expect(result.shape).toEqual([2, 4, 3, 3]);
    expect(maxAbsDiff(result, expected)).toBeLessThan(1e-9);
  });

  it("handles three spatial dims", () => {
    const img5 = seededArray([1, 2, 4, 3, 4], 21);
    const kern5 = seededArray([3, 2, 2, 2, 2], 22);
    for (const borderMode of ["valid", "full"] as const) {
      const imgV = variable(tensorType("f64", img5.shape));
      const kernV = variable(tensorType("f64", kern5.shape));
      const out = dnnConv(ctx, imgV, kernV, { borderMode });
      const [result] = execute(new Graph([imgV, kernV], [out]), [img5, kern5]);
      const expected = referenceConv(img5, kern5, {
        borderMode,
        subsample: [1, 1, 1],
        filterFlip: true,
      });
      expect(maxAbsDiff(result, expected)).toBeLessThan(1e-9);
    }
  });

  it("computes what the generic convolution describes once lifted", () => {
    for (const filterFlip of [true, false]) {
      const imgV = variable(tensorType("f64", img.shape));
      const kernV = variable(tensorType("f64", kern.shape));
      const graph = optimize(
        new Graph(
          [imgV, kernV],
          [conv(imgV, kernV, { borderMode: "full", subsample: [1, 1], filterFlip, directionHint: "forward" })],
        ),
      );
      expect(ownerKind(graph.outputs[0])).toBe("dnn_conv_grad_i");
      const [result] = execute(graph, [img, kern]);
      const expected = referenceConv(img, kern, { borderMode: "full", subsample: [1, 1], filterFlip });
      expect(maxAbsDiff(result, expected)).toBeLessThan(1e-9);
    }
  });

  it("materializes the statically inferred shape", () => {
    const geometry = fc.record({
      batch: fc.integer({ min: 1, max: 2 }),
      channels: fc.integer({ min: 1, max: 2 }),
      filters: fc.integer({ min: 1, max: 2 }),
      spatial: fc.tuple(fc.integer({ min: 3, max: 6 }), fc.integer({ min: 3, max: 6 })),
      kernel: fc.tuple(fc.integer({ min: 1, max: 3 }), fc.integer({ min: 1, max: 3 })),
      pad: fc.tuple(fc.integer({ min: 0, max: 1 }), fc.integer({ min: 0, max: 1 })),
      stride: fc.tuple(fc.integer({ min: 1, max: 2 }), fc.integer({ min: 1, max: 2 })),
    });
    fc.assert(
      fc.property(geometry, (g) => {
        const imgShape = [g.batch, g.channels, ...g.spatial];
        const kernShape = [g.filters, g.channels, ...g.kernel];
        const borderMode: Padding = g.pad;
        const imgV = variable(tensorType("f64", imgShape));
        const kernV = variable(tensorType("f64", kernShape));
        const out = dnnConv(ctx, imgV, kernV, { borderMode, subsample: g.stride });
        const imgA = seededArray(imgShape, 3);
        const kernA = seededArray(kernShape, 4);
        const [result] = execute(new Graph([imgV, kernV], [out]), [imgA, kernA]);

        const expectedShape = convOutputShape(imgShape, kernShape, borderMode, g.stride);
        expect(out.type.kind === "tensor" ? out.type.shape : undefined).toEqual(expectedShape);
        expect(result.shape).toEqual(expectedShape);
        const expected = referenceConv(imgA, kernA, { borderMode, subsample: g.stride, filterFlip: true });
        expect(maxAbsDiff(result, expected)).toBeLessThan(1e-9);
      }),
      { numRuns: 25 },
    );
  });
});

describe("descriptor lifetimes", () => {
  const img = seededArray([1, 2, 5, 5], 1);
  const kern = seededArray([3, 2, 3, 3], 2);

  it("creates descriptors lazily and reuses them across runs", () => {
    const backend = new ReferenceBackend();
    const fn = compileGraph(forwardGraph([1, 2, 5, 5], [3, 2, 3, 3]), { backend, gate: ctx.gate });
    expect(fn.descriptorCount).toBe(0);
    fn.run([img, kern]);
    fn.run([img, kern]);
    expect(fn.descriptorCount).toBe(1);
    expect(backend.live.size).toBe(1);
    expect(backend.destroyed).toEqual([]);
  });

  it("frees every descriptor exactly once on dispose", () => {
    const backend = new ReferenceBackend();
    const fn = compileGraph(forwardGraph([1, 2, 5, 5], [3, 2, 3, 3]), { backend, gate: ctx.gate });
    fn.run([img, kern]);
    fn.dispose();
    fn.dispose();
    expect(fn.isDisposed).toBe(true);
    expect(backend.live.size).toBe(0);
    expect(backend.destroyed).toEqual([1]);
  });

  it("refuses to run after dispose", () => {
    const fn = compileGraph(forwardGraph([1, 2, 5, 5], [3, 2, 3, 3]), {
      backend: new ReferenceBackend(),
      gate: ctx.gate,
    });
    fn.dispose();
    expect(() => fn.run([img, kern])).toThrow(DescriptorReleasedError);
    expect(() => fn.run([img, kern])).toThrow("compiled function has been disposed");
  });

  it("shares one descriptor between nodes with equal parameters", () => {
    const imgV = variable(tensorType("f64", [1, 2, 5, 5]));
    const kernV = variable(tensorType("f64", [3, 2, 3, 3]));
    const pool = { ws: [2, 2], stride: [2, 2] };
    const graph = new Graph(
      [imgV, kernV],
      [
        dnnConv(ctx, imgV, kernV),
        dnnConv(ctx, imgV, kernV),
        dnnPool(ctx, imgV, pool),
        dnnPool(ctx, imgV, pool),
      ],
    );
    const backend = new ReferenceBackend();
    const fn = compileGraph(graph, { backend, gate: ctx.gate });
    const [a, b] = fn.run([img, kern]).map(expectNDArray);
    expect(maxAbsDiff(a, b)).toBe(0);
    expect(fn.descriptorCount).toBe(2);
    fn.dispose();
    expect(backend.destroyed).toHaveLength(2);
    expect(backend.live.size).toBe(0);
  });

  it("releases descriptors held by a failing run", () => {
    class AutoPicker extends ReferenceBackend {
      override selectAlgorithm(): string {
        return "time_once";
      }
    }
    const backend = new AutoPicker();
    const fn = compileGraph(forwardGraph([1, 2, 5, 5], [3, 2, 3, 3], "guess_once"), {
      backend,
      gate: ctx.gate,
    });
    expect(() => fn.run([img, kern])).toThrow(ConfigurationError);
    expect(() => fn.run([img, kern])).toThrow(
      'reference selected the automatic algorithm "time_once" for dnn_conv',
    );
    fn.dispose();
    expect(backend.live.size).toBe(0);
  });
});

describe("algorithm selection", () => {
  function polymorphicGraph(algo: ForwardAlgorithm): Graph {
    const img = variable(tensorType("f64", 4), "img");
    const kern = variable(tensorType("f64", 4), "kern");
    return new Graph([img, kern], [dnnConv(ctx, img, kern, { algo })]);
  }

  const kern = seededArray([1, 1, 3, 3], 5);
  const small = seededArray([1, 1, 5, 5], 6);
  const large = seededArray([1, 1, 6, 6], 7);

  it("chooses once per node for *_once", () => {
    const backend = new ReferenceBackend();
    const fn = compileGraph(polymorphicGraph("guess_once"), { backend, gate: ctx.gate });
    fn.run([small, kern]);
    fn.run([small, kern]);
    fn.run([large, kern]);
    expect(backend.selections).toHaveLength(1);
    expect(backend.selections[0].strategy).toBe("guess");
    expect(fn.algorithms.misses).toBe(1);
    expect(fn.algorithms.hits).toBe(2);
    expect(fn.algorithms.size).toBe(1);
  });

  it("chooses again when the input shapes change for *_on_shape_change", () => {
    const backend = new ReferenceBackend();
    const fn = compileGraph(polymorphicGraph("time_on_shape_change"), { backend, gate: ctx.gate });
    fn.run([small, kern]);
    fn.run([small, kern]);
    fn.run([large, kern]);
    expect(backend.selections.map((s) => s.strategy)).toEqual(["time", "time"]);
    expect(backend.selections[1].shapes).toEqual([
      [1, 1, 6, 6],
      [1, 1, 3, 3],
      [1, 1, 4, 4],
    ]);
    expect(fn.algorithms.misses).toBe(2);
    expect(fn.algorithms.hits).toBe(1);
  });

  it("hands the kernel the concrete algorithm", () => {
    const backend = new ReferenceBackend();
    const fn = compileGraph(polymorphicGraph("guess_on_shape_change"), { backend, gate: ctx.gate });
    fn.run([small, kern]);
    expect(backend.convCalls.map((c) => [c.algo, c.nativeAlgo])).toEqual([
      ["small", "CUDNN_CONVOLUTION_FWD_ALGO_IMPLICIT_PRECOMP_GEMM"],
    ]);
  });

  it.each(["fft", "deterministic", "guess_once"] as const)(
    "runs backward %s as algorithm 0 on a v2 backend",
    (algo: BackwardAlgorithm) => {
      const v2 = fakeContext({
        version: 2000,
        config: loadDnnConfig({}, { defaultBackwardAlgorithm: algo }),
      });
      const img = variable(tensorType("f64", [2, 2, 5, 4]), "img");
      const kern = variable(tensorType("f64", [3, 2, 3, 2]), "kern");
      const y = dnnConv(v2, img, kern, { directionHint: "bprop weights" });
      const backend = new ReferenceBackend();
      const fn = compileGraph(new Graph([img, kern], [y]), { backend, gate: v2.gate });
      fn.run([seededArray([2, 2, 5, 4], 8), seededArray([3, 2, 3, 2], 9)]);
      fn.dispose();

      expect(backend.convCalls.map((c) => [c.kind, c.algo, c.nativeAlgo])).toEqual([
        ["dnn_conv_grad_w", "none", "CUDNN_CONVOLUTION_BWD_FILTER_ALGO_0"],
      ]);
      expect(backend.selections).toHaveLength(0);
    },
  );

  it("uses a cache shared between compiled functions when given one", () => {
    const cache = new AlgorithmCache();
    const fn = compileGraph(polymorphicGraph("time_once"), {
      backend: new ReferenceBackend(),
      gate: ctx.gate,
      algorithmCache: cache,
    });
    expect(fn.algorithms).toBe(cache);
    fn.run([small, kern]);
    expect(cache.size).toBe(1);
  });
});

describe("in-place execution", () => {
  const img = seededArray([1, 1, 5, 5], 8);
  const kern = seededArray([1, 1, 3, 3], 9);

  function accumulate(inplace: boolean) {
    const imgV = variable(tensorType("f64", [1, 1, 5, 5]), "img");
    const kernV = variable(tensorType("f64", [1, 1, 3, 3]), "kern");
    const given = variable(tensorType("f64", [1, 1, 3, 3]), "given");
    const desc = convDescriptor(ctx, shapeOf(kernV), { borderMode: "valid" });
    const y = convForward(ctx, imgV, kernV, given, desc, { inplace, beta: 1 });
    return new Graph([imgV, kernV, given], [y]);
  }

  function expected(before: NDArray): NDArray {
    const out = referenceConv(img, kern, { borderMode: "valid", subsample: [1, 1], filterFlip: true });
    for (let i = 0; i < out.data.length; i++) out.data[i] += before.data[i];
    return out;
  }

  it("writes into the destination buffer", () => {
    const buffer = seededArray([1, 1, 3, 3], 10);
    const before = buffer.clone();
    const [result] = execute(accumulate(true), [img, kern, buffer]);
    expect(result).toBe(buffer);
    expect(maxAbsDiff(result, expected(before))).toBeLessThan(1e-12);
  });

  it("leaves the destination alone otherwise", () => {
    const buffer = seededArray([1, 1, 3, 3], 10);
    const before = buffer.clone();
    const [result] = execute(accumulate(false), [img, kern, buffer]);
    expect(result).not.toBe(buffer);
    expect(buffer.toArray()).toEqual(before.toArray());
    expect(maxAbsDiff(result, expected(before))).toBeLessThan(1e-12);
  });
});

describe("merged graphs", () => {
  const img = seededArray([1, 2, 5, 5], 31);
  const kern = seededArray([2, 2, 3, 3], 32);
  const buffer = seededArray([1, 2, 3, 3], 33);

  function build(merge: "alpha" | "output") {
    const imgV = variable(tensorType("f64", [1, 2, 5, 5]), "img");
    const kernV = variable(tensorType("f64", [2, 2, 3, 3]), "kern");
    const out = variable(tensorType("f64", [1, 2, 3, 3]), "out");
    const desc = convDescriptor(ctx, shapeOf(kernV), { borderMode: "valid" });
    if (merge === "alpha") {
      const y = convForward(ctx, imgV, kernV, out, desc, { beta: 0.5 });
      return new Graph([imgV, kernV, out], [mul(scalarConstant(2, "f64"), y)]);
    }
    const y = convForward(ctx, imgV, kernV, out, desc);
    return new Graph([imgV, kernV, out], [add(y, out)]);
  }

  it.each(["alpha", "output"] as const)("%s merge preserves the result", (merge) => {
    const [plain] = execute(build(merge), [img, kern, buffer]);
    const merged = optimize(build(merge));
    expect(ownerKind(merged.outputs[0])).toBe("dnn_conv");
    const [folded] = execute(merged, [img, kern, buffer]);
    expect(maxAbsDiff(folded, plain)).toBeLessThan(1e-12);
  });
});

describe("pooling execution", () => {
  const ramp = NDArray.from(
    Array.from({ length: 16 }, (_, i) => i + 1),
    [1, 1, 4, 4],
  );

  it("max-pools non-overlapping windows", () => {
    const x = variable(tensorType("f64", [1, 1, 4, 4]));
    const y = dnnPool(ctx, x, { ws: [2, 2], stride: [2, 2] });
    const [result] = execute(new Graph([x], [y]), [ramp]);
    expect(result.toArray()).toEqual([6, 8, 14, 16]);
  });

  it("counts padding only in the including average", () => {
    const x = variable(tensorType("f64", [1, 1, 4, 4]));
    const opts = { ws: [2, 2], stride: [2, 2], pad: [1, 1] };
    const graph = new Graph(
      [x],
      [
        dnnPool(ctx, x, { ...opts, mode: "average_exc_pad" }),
        dnnPool(ctx, x, { ...opts, mode: "average_inc_pad" }),
      ],
    );
    const [exc, inc] = execute(graph, [ramp]);
    expect(exc.shape).toEqual([1, 1, 3, 3]);
    expect([exc.data[0], exc.data[1], exc.data[4]]).toEqual([1, 2.5, 8.5]);
    expect([inc.data[0], inc.data[1], inc.data[4]]).toEqual([0.25, 1.25, 8.5]);
  });

  it("routes max-pool gradients to the winning positions", () => {
    const x = variable(tensorType("f64", [1, 1, 4, 4]), "x");
    const gy = variable(tensorType("f64", [1, 1, 2, 2]), "gy");
    const y = dnnPool(ctx, x, { ws: [2, 2], stride: [2, 2] });
    const [dx] = gradients({ outputs: [y], outputGrads: [gy], wrt: [x] });
    if (!dx) throw new Error("expected a gradient");
    const [result] = execute(new Graph([x, gy], [dx]), [ramp, NDArray.from([1, 2, 3, 4], [1, 1, 2, 2])]);
    const want = new Array<number>(16).fill(0);
    want[5] = 1;
    want[7] = 2;
    want[13] = 3;
    want[15] = 4;
    expect(result.toArray()).toEqual(want);
  });
});

describe("softmax execution", () => {
  const rows = NDArray.from([0, Math.log(2), Math.log(3), 1, 1, 1], [2, 3]);

  function logSoftmaxGraph(): Graph {
    const x = variable(tensorType("f64", [2, 3]), "x");
    return new Graph([x], [log(softmax(x))]);
  }

  it("computes a row softmax through the lifted channel softmax", () => {
    const x = variable(tensorType("f64", [2, 3]));
    const [result] = execute(optimize(new Graph([x], [softmax(x)])), [rows]);
    expect(result.shape).toEqual([2, 3]);
    const want = [1 / 6, 1 / 3, 1 / 2, 1 / 3, 1 / 3, 1 / 3];
    result.toArray().forEach((v, i) => expect(v).toBeCloseTo(want[i], 12));
  });

  it("gives the same log-probabilities fused and unfused", () => {
    const v2 = fakeContext({ version: 2000 });
    const unfused = optimize(logSoftmaxGraph(), v2);
    const fused = optimize(logSoftmaxGraph());
    expect(ownerKind(unfused.outputs[0])).toBe("elemwise");
    expect(ownerKind(fused.outputs[0])).toBe("dimshuffle");

    const [a] = execute(unfused, [rows], v2);
    const [b] = execute(fused, [rows]);
    expect(maxAbsDiff(a, b)).toBeLessThan(1e-12);
    expect(b.data[0]).toBeCloseTo(Math.log(1 / 6), 12);
    expect(b.data[5]).toBeCloseTo(Math.log(1 / 3), 12);
  });

  it("lifts and runs the softmax gradient", () => {
    const x = variable(tensorType("f64", [1, 3]), "x");
    const dy = variable(tensorType("f64", [1, 3]), "dy");
    const sm = softmax(x);
    const graph = optimize(new Graph([x, dy], [call(new GenericSoftmaxGrad(), dy, sm)]));
    const [result] = execute(graph, [
      NDArray.from([0, Math.log(2), Math.log(3)], [1, 3]),
      NDArray.from([1, 0, 0], [1, 3]),
    ]);
    const want = [5 / 36, -1 / 18, -1 / 12];
    result.toArray().forEach((v, i) => expect(v).toBeCloseTo(want[i], 12));
  });
});

describe("execution errors", () => {
  const img = seededArray([1, 2, 5, 5], 1);
  const kern = seededArray([3, 2, 3, 3], 2);

  it("checks the number and kind of inputs", () => {
    const graph = forwardGraph([1, 2, 5, 5], [3, 2, 3, 3]);
    expect(() => execute(graph, [img])).toThrow("expected 2 inputs, got 1");
    expect(() => execute(graph, [img, 3])).toThrow("input kern must be a tensor");

    const s = variable({ kind: "scalar", dtype: "f64" }, "s");
    const x = variable(tensorType("f64", [2]), "x");
    expect(() => execute(new Graph([x, s], [mul(s, x)]), [NDArray.from([1, 2], [2]), img])).toThrow(
      "input s must be a number",
    );
  });

  it("scales by runtime scalars", () => {
    const s = variable({ kind: "scalar", dtype: "f64" }, "s");
    const x = variable(tensorType("f64", [2]), "x");
    const [result] = execute(new Graph([x, s], [mul(s, x)]), [NDArray.from([1, 2], [2]), 3]);
    expect(result.toArray()).toEqual([3, 6]);
  });

  it("has no kernel for generic convolutions", () => {
    const imgV = variable(tensorType("f64", [1, 2, 5, 5]));
    const kernV = variable(tensorType("f64", [3, 2, 3, 3]));
    const graph = new Graph(
      [imgV, kernV],
      [conv(imgV, kernV, { borderMode: "valid", subsample: [1, 1], filterFlip: true, directionHint: "forward" })],
    );
    expect(() => execute(graph, [img, kern])).toThrow(GraphStructureError);
    expect(() => execute(graph, [img, kern])).toThrow(
      "no kernel for conv; lift it to an accelerated operator first",
    );
  });

  it("refuses to execute a missing gradient", () => {
    const x = variable(tensorType("f64", [2]), "x");
    const graph = new Graph([x], [gradNotImplemented(x, "test reason")]);
    expect(() => execute(graph, [NDArray.from([1, 2], [2])])).toThrow(GradientNotImplementedError);
    expect(() => execute(graph, [NDArray.from([1, 2], [2])])).toThrow(
      "cannot execute a missing gradient: test reason",
    );
  });
});

/**
 * CPU reference kernels for tests. Tensors are always contiguous row-major
 * f64 arrays; descriptors are plain records so tests can watch their
 * lifetimes.
 */

import {
  convOutputShape,
  evalScalar,
  sizeOf,
  windowOutputSize,
  type AlgorithmQuery,
  type ConvKernelCall,
  type DimShuffleEntry,
  type DType,
  type ElemwiseFn,
  type KernelBackend,
  type NativeConvParams,
  type NativePoolParams,
  type Padding,
  type SoftmaxAlgo,
  type SoftmaxMode,
} from "../../src";

function computeStrides(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

/** Every multi-index of `shape`, in row-major order. */
function* indices(shape: readonly number[]): Generator<number[]> {
  if (shape.some((d) => d === 0)) return;
  const idx = shape.map(() => 0);
  for (;;) {
    yield idx.slice();
    let axis = shape.length - 1;
    while (axis >= 0) {
      idx[axis]++;
      if (idx[axis] < shape[axis]) break;
      idx[axis] = 0;
      axis--;
    }
    if (axis < 0) return;
  }
}

export class NDArray {
  readonly shape: number[];
  readonly strides: number[];
  readonly data: Float64Array;

  constructor(shape: readonly number[], data?: Float64Array) {
    this.shape = shape.slice();
    this.strides = computeStrides(shape);
    this.data = data ?? new Float64Array(sizeOf(shape));
    if (this.data.length !== sizeOf(shape)) {
      throw new Error("NDArray data length does not match shape");
    }
  }

  static from(values: readonly number[], shape: readonly number[]): NDArray {
    return new NDArray(shape, Float64Array.from(values));
  }

  offset(idx: readonly number[]): number {
    let off = 0;
    for (let i = 0; i < idx.length; i++) off += idx[i] * this.strides[i];
    return off;
  }

  get(idx: readonly number[]): number {
    return this.data[this.offset(idx)];
  }

  set(idx: readonly number[], value: number): void {
    this.data[this.offset(idx)] = value;
  }

  toArray(): number[] {
    return Array.from(this.data);
  }

  clone(): NDArray {
    return new NDArray(this.shape, this.data.slice());
  }
}

/** Deterministic values in [-1, 1). */
export function seededArray(shape: readonly number[], seed: number): NDArray {
  let state = seed >>> 0 || 1;
  const out = new NDArray(shape);
  for (let i = 0; i < out.data.length; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    out.data[i] = state / 2 ** 31 - 1;
  }
  return out;
}

// ============================================================================
// Convolution
// ============================================================================

type ConvGeometry = {
  pads: number[];
  strides: number[];
  flip: boolean;
};

function mirror(w: readonly number[], extent: readonly number[], flip: boolean): number[] {
  return flip ? w.map((x, d) => extent[d] - 1 - x) : w.slice();
}

/** Input position hit by output `o` and kernel offset `w`, or null when in padding. */
function source(
  o: readonly number[],
  w: readonly number[],
  geo: ConvGeometry,
  spatial: readonly number[],
): number[] | null {
  const at: number[] = [];
  for (let d = 0; d < o.length; d++) {
    const i = o[d] * geo.strides[d] + w[d] - geo.pads[d];
    if (i < 0 || i >= spatial[d]) return null;
    at.push(i);
  }
  return at;
}

export function correlate(
  img: NDArray,
  kern: NDArray,
  outShape: readonly number[],
  geo: ConvGeometry,
): NDArray {
  const out = new NDArray(outShape);
  const channels = img.shape[1];
  const kSpatial = kern.shape.slice(2);
  const iSpatial = img.shape.slice(2);
  for (const idx of indices(outShape)) {
    const [b, k, ...o] = idx;
    let acc = 0;
    for (let c = 0; c < channels; c++) {
      for (const w of indices(kSpatial)) {
        const at = source(o, w, geo, iSpatial);
        if (!at) continue;
        acc += img.get([b, c, ...at]) * kern.get([k, c, ...mirror(w, kSpatial, geo.flip)]);
      }
    }
    out.set(idx, acc);
  }
  return out;
}

export function correlateGradWeights(
  img: NDArray,
  top: NDArray,
  kernShape: readonly number[],
  geo: ConvGeometry,
): NDArray {
  const out = new NDArray(kernShape);
  const kSpatial = kernShape.slice(2);
  const iSpatial = img.shape.slice(2);
  const tSpatial = top.shape.slice(2);
  for (const idx of indices(kernShape)) {
    const [k, c, ...w] = idx;
    let acc = 0;
    for (let b = 0; b < img.shape[0]; b++) {
      for (const o of indices(tSpatial)) {
        const at = source(o, w, geo, iSpatial);
        if (!at) continue;
        acc += img.get([b, c, ...at]) * top.get([b, k, ...o]);
      }
    }
    out.set([k, c, ...mirror(w, kSpatial, geo.flip)], acc);
  }
  return out;
}

export function correlateGradInputs(
  kern: NDArray,
  top: NDArray,
  imgShape: readonly number[],
  geo: ConvGeometry,
): NDArray {
  const out = new NDArray(imgShape);
  const kSpatial = kern.shape.slice(2);
  const iSpatial = imgShape.slice(2);
  const channels = imgShape[1];
  for (const tIdx of indices(top.shape)) {
    const [b, k, ...o] = tIdx;
    const g = top.get(tIdx);
    for (let c = 0; c < channels; c++) {
      for (const w of indices(kSpatial)) {
        const at = source(o, w, geo, iSpatial);
        if (!at) continue;
        const idx = [b, c, ...at];
        out.set(idx, out.get(idx) + g * kern.get([k, c, ...mirror(w, kSpatial, geo.flip)]));
      }
    }
  }
  return out;
}

export type ReferenceConvOptions = {
  borderMode: Padding;
  subsample: readonly number[];
  /** `true`: true convolution; `false`: cross-correlation. */
  filterFlip: boolean;
};

/** What a generic convolution node computes. */
export function referenceConv(img: NDArray, kern: NDArray, options: ReferenceConvOptions): NDArray {
  const kSpatial = kern.shape.slice(2);
  const pads =
    options.borderMode === "valid"
      ? kSpatial.map(() => 0)
      : options.borderMode === "full"
        ? kSpatial.map((k) => k - 1)
        : options.borderMode.slice();
  const outShape = convOutputShape(img.shape, kern.shape, options.borderMode, options.subsample);
  return correlate(img, kern, outShape, {
    pads,
    strides: options.subsample.slice(),
    flip: options.filterFlip,
  });
}

// ============================================================================
// Pooling and softmax
// ============================================================================

function pooledShape(img: readonly number[], p: NativePoolParams): number[] {
  return [
    img[0],
    img[1],
    ...p.window.map((ws, d) => windowOutputSize(img[d + 2], ws, p.pad[d], p.stride[d])),
  ];
}

/** In-bounds input positions of the window at output position `o`. */
function windowPositions(
  o: readonly number[],
  p: NativePoolParams,
  spatial: readonly number[],
): number[][] {
  const geo = { pads: p.pad.slice(), strides: p.stride.slice(), flip: false };
  const positions: number[][] = [];
  for (const w of indices(p.window)) {
    const at = source(o, w, geo, spatial);
    if (at) positions.push(at);
  }
  return positions;
}

function poolDivisor(p: NativePoolParams, inBounds: number): number {
  return p.mode === "CUDNN_POOLING_AVERAGE_COUNT_EXCLUDE_PADDING"
    ? inBounds
    : sizeOf(p.window);
}

export function referencePool(img: NDArray, p: NativePoolParams): NDArray {
  const out = new NDArray(pooledShape(img.shape, p));
  const spatial = img.shape.slice(2);
  for (const idx of indices(out.shape)) {
    const [b, c, ...o] = idx;
    const values = windowPositions(o, p, spatial).map((at) => img.get([b, c, ...at]));
    if (p.mode === "CUDNN_POOLING_MAX") {
      out.set(idx, Math.max(...values));
    } else {
      const sum = values.reduce((a, v) => a + v, 0);
      out.set(idx, sum / poolDivisor(p, values.length));
    }
  }
  return out;
}

export function referencePoolGrad(
  inp: NDArray,
  out: NDArray,
  outGrad: NDArray,
  p: NativePoolParams,
): NDArray {
  const grad = new NDArray(inp.shape);
  const spatial = inp.shape.slice(2);
  for (const idx of indices(outGrad.shape)) {
    const [b, c, ...o] = idx;
    const g = outGrad.get(idx);
    const positions = windowPositions(o, p, spatial).map((at) => [b, c, ...at]);
    if (p.mode === "CUDNN_POOLING_MAX") {
      const target = positions.find((pos) => inp.get(pos) === out.get(idx));
      if (target) grad.set(target, grad.get(target) + g);
    } else {
      const share = g / poolDivisor(p, positions.length);
      for (const pos of positions) grad.set(pos, grad.get(pos) + share);
    }
  }
  return grad;
}

/** Flat offsets of each softmax group of a rank-4 tensor. */
function softmaxGroups(shape: readonly number[], mode: SoftmaxMode): number[][] {
  const [n, c, h, w] = shape;
  const strides = computeStrides(shape);
  const groups: number[][] = [];
  if (mode === "instance") {
    const size = c * h * w;
    for (let b = 0; b < n; b++) {
      groups.push(Array.from({ length: size }, (_, i) => b * size + i));
    }
    return groups;
  }
  for (let b = 0; b < n; b++) {
    for (let y = 0; y < h; y++) {
      for (let x = 0; x < w; x++) {
        const base = b * strides[0] + y * strides[2] + x * strides[3];
        groups.push(Array.from({ length: c }, (_, ch) => base + ch * strides[1]));
      }
    }
  }
  return groups;
}

export function referenceSoftmax(algo: SoftmaxAlgo, mode: SoftmaxMode, x: NDArray): NDArray {
  const out = new NDArray(x.shape);
  for (const group of softmaxGroups(x.shape, mode)) {
    const shift = algo === "fast" ? 0 : Math.max(...group.map((i) => x.data[i]));
    const sum = group.reduce((acc, i) => acc + Math.exp(x.data[i] - shift), 0);
    for (const i of group) {
      out.data[i] =
        algo === "log" ? x.data[i] - shift - Math.log(sum) : Math.exp(x.data[i] - shift) / sum;
    }
  }
  return out;
}

export function referenceSoftmaxGrad(
  algo: SoftmaxAlgo,
  mode: SoftmaxMode,
  dy: NDArray,
  sm: NDArray,
): NDArray {
  const out = new NDArray(sm.shape);
  for (const group of softmaxGroups(sm.shape, mode)) {
    if (algo === "log") {
      const total = group.reduce((acc, i) => acc + dy.data[i], 0);
      for (const i of group) out.data[i] = dy.data[i] - Math.exp(sm.data[i]) * total;
    } else {
      const dot = group.reduce((acc, i) => acc + dy.data[i] * sm.data[i], 0);
      for (const i of group) out.data[i] = sm.data[i] * (dy.data[i] - dot);
    }
  }
  return out;
}

// ============================================================================
// Backend
// ============================================================================

export type RefDescriptor =
  | { id: number; kind: "conv"; params: NativeConvParams; kernelShape: readonly number[] }
  | { id: number; kind: "pool"; params: NativePoolParams };

function convGeometry(desc: RefDescriptor): ConvGeometry {
  if (desc.kind !== "conv") throw new Error("expected a convolution descriptor");
  const { params, kernelShape } = desc;
  const nd = params.nbDims;
  const kSpatial = kernelShape.slice(2);
  const pads =
    params.borderMode === 0
      ? kSpatial.map((k) => k - 1)
      : params.borderMode === 1
        ? kSpatial.map(() => 0)
        : params.pads.slice(0, nd);
  return {
    pads,
    strides: params.strides.slice(0, nd),
    flip: params.convMode === "CUDNN_CONVOLUTION",
  };
}

function poolParams(desc: RefDescriptor): NativePoolParams {
  if (desc.kind !== "pool") throw new Error("expected a pooling descriptor");
  return desc.params;
}

export class ReferenceBackend implements KernelBackend<NDArray, RefDescriptor> {
  readonly name = "reference";
  readonly live = new Set<number>();
  readonly destroyed: number[] = [];
  readonly convCalls: ConvKernelCall<NDArray, RefDescriptor>[] = [];
  readonly selections: AlgorithmQuery<RefDescriptor>[] = [];
  private nextId = 1;

  shape(tensor: NDArray): readonly number[] {
    return tensor.shape;
  }

  allocEmpty(_dtype: DType, shape: readonly number[]): NDArray {
    return new NDArray(shape);
  }

  copy(tensor: NDArray): NDArray {
    return tensor.clone();
  }

  contiguous(tensor: NDArray): NDArray {
    return tensor.clone();
  }

  dimshuffle(tensor: NDArray, order: readonly DimShuffleEntry[]): NDArray {
    const out = new NDArray(order.map((e) => (e === "x" ? 1 : tensor.shape[e])));
    for (const idx of indices(out.shape)) {
      const src = tensor.shape.map((_, axis) => {
        const at = order.indexOf(axis);
        return at >= 0 ? idx[at] : 0;
      });
      out.set(idx, tensor.get(src));
    }
    return out;
  }

  flip(tensor: NDArray, axes: readonly number[]): NDArray {
    const out = new NDArray(tensor.shape);
    for (const idx of indices(tensor.shape)) {
      const src = idx.map((i, axis) => (axes.includes(axis) ? tensor.shape[axis] - 1 - i : i));
      out.set(idx, tensor.get(src));
    }
    return out;
  }

  elemwise(fn: ElemwiseFn, operands: readonly (NDArray | number)[]): NDArray {
    const shaped = operands.find((x): x is NDArray => typeof x !== "number");
    if (!shaped) throw new Error("elemwise needs a tensor operand");
    const out = new NDArray(shaped.shape);
    const at = (x: NDArray | number | undefined, i: number) =>
      x === undefined ? 0 : typeof x === "number" ? x : x.data[i];
    for (let i = 0; i < out.data.length; i++) {
      out.data[i] = evalScalar(fn, at(operands[0], i), at(operands[1], i));
    }
    return out;
  }

  createConvDescriptor(params: NativeConvParams, kernelShape: readonly number[]): RefDescriptor {
    const id = this.nextId++;
    this.live.add(id);
    return { id, kind: "conv", params, kernelShape: kernelShape.slice() };
  }

  createPoolDescriptor(params: NativePoolParams): RefDescriptor {
    const id = this.nextId++;
    this.live.add(id);
    return { id, kind: "pool", params };
  }

  destroyDescriptor(handle: RefDescriptor): void {
    if (!this.live.delete(handle.id)) {
      throw new Error(`descriptor ${handle.id} destroyed twice`);
    }
    this.destroyed.push(handle.id);
  }

  conv(call: ConvKernelCall<NDArray, RefDescriptor>): NDArray {
    this.convCalls.push(call);
    const geo = convGeometry(call.desc);
    const out = call.out;
    let raw: NDArray;
    switch (call.kind) {
      case "dnn_conv":
        raw = correlate(call.a, call.b, out.shape, geo);
        break;
      case "dnn_conv_grad_w":
        raw = correlateGradWeights(call.a, call.b, out.shape, geo);
        break;
      case "dnn_conv_grad_i":
        raw = correlateGradInputs(call.a, call.b, out.shape, geo);
        break;
    }
    for (let i = 0; i < out.data.length; i++) {
      out.data[i] = call.alpha * raw.data[i] + call.beta * out.data[i];
    }
    return out;
  }

  selectAlgorithm(query: AlgorithmQuery<RefDescriptor>): string {
    this.selections.push(query);
    return query.kind === "dnn_conv" ? "small" : "none";
  }

  pool(img: NDArray, desc: RefDescriptor): NDArray {
    return referencePool(img, poolParams(desc));
  }

  poolGrad(inp: NDArray, out: NDArray, outGrad: NDArray, desc: RefDescriptor): NDArray {
    return referencePoolGrad(inp, out, outGrad, poolParams(desc));
  }

  softmax(algo: SoftmaxAlgo, mode: SoftmaxMode, x: NDArray): NDArray {
    return referenceSoftmax(algo, mode, x);
  }

  softmaxGrad(algo: SoftmaxAlgo, mode: SoftmaxMode, dy: NDArray, sm: NDArray): NDArray {
    return referenceSoftmaxGrad(algo, mode, dy, sm);
  }
}

export function expectNDArray(value: { kind: string; value: unknown }): NDArray {
  if (value.kind !== "tensor" || !(value.value instanceof NDArray)) {
    throw new Error(`expected a tensor output, got ${value.kind}`);
  }
  return value.value;
}

export function maxAbsDiff(a: NDArray, b: NDArray): number {
  if (a.shape.join() !== b.shape.join()) {
    throw new Error(`shape mismatch: [${a.shape}] vs [${b.shape}]`);
  }
  let max = 0;
  for (let i = 0; i < a.data.length; i++) max = Math.max(max, Math.abs(a.data[i] - b.data[i]));
  return max;
}

/**
 * Shape arithmetic shared by the graph, the accelerated operators and the
 * executor. No imports, so every layer can use it.
 */

export function sizeOf(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

export function shapesEqual(
  a: readonly number[],
  b: readonly number[],
): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export type Padding = "valid" | "full" | readonly number[];

/**
 * Resolve a border mode to explicit per-dimension padding.
 * "full" pads by kernel-1 so every partial overlap is produced.
 */
export function resolvePadding(
  padding: Padding,
  kernelSpatial: readonly number[],
): number[] {
  if (padding === "valid") return kernelSpatial.map(() => 0);
  if (padding === "full") return kernelSpatial.map((k) => k - 1);
  return padding.slice();
}

/**
 * Output spatial size of a strided window sweep:
 * floor((in + 2*pad - window) / stride) + 1.
 */
export function windowOutputSize(
  input: number,
  window: number,
  pad: number,
  stride: number,
): number {
  return Math.floor((input + 2 * pad - window) / stride) + 1;
}

/**
 * Convolution output shape for `[batch, channelIn, ...spatial]` images and
 * `[channelOut, channelIn, ...kernelSpatial]` kernels.
 */
export function convOutputShape(
  imageShape: readonly number[],
  kernelShape: readonly number[],
  padding: Padding,
  stride: readonly number[],
): number[] {
  const kernelSpatial = kernelShape.slice(2);
  const pads = resolvePadding(padding, kernelSpatial);
  const out = [imageShape[0], kernelShape[0]];
  for (let i = 0; i < kernelSpatial.length; i += 1) {
    out.push(
      windowOutputSize(imageShape[i + 2], kernelSpatial[i], pads[i], stride[i]),
    );
  }
  return out;
}

export function poolOutputShape(
  imageShape: readonly number[],
  window: readonly number[],
  stride: readonly number[],
  pad: readonly number[],
): number[] {
  const out = [imageShape[0], imageShape[1]];
  for (let i = 0; i < window.length; i += 1) {
    out.push(windowOutputSize(imageShape[i + 2], window[i], pad[i], stride[i]));
  }
  return out;
}

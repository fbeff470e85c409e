export type DType = "f16" | "f32" | "f64" | "i64";

/**
 * A tensor edge. `shape` is present when every dimension is statically
 * known; graphs stay valid without it (shape-polymorphic).
 */
export type TensorType = {
  kind: "tensor";
  dtype: DType;
  rank: number;
  shape?: readonly number[];
  /** Axes statically known to have size 1. */
  broadcastable?: readonly boolean[];
};

export type ScalarType = {
  kind: "scalar";
  dtype: DType;
};

/** Opaque native handle, tagged with its native type and release function. */
export type ResourceType = {
  kind: "resource";
  ctype: ResourceCType;
  freeFunc: string;
};

export type ResourceCType =
  | "cudnnConvolutionDescriptor_t"
  | "cudnnPoolingDescriptor_t";

export type ValueType = TensorType | ScalarType | ResourceType;

export type StaticValue = number | readonly number[];

export const CONV_DESCRIPTOR_TYPE: ResourceType = {
  kind: "resource",
  ctype: "cudnnConvolutionDescriptor_t",
  freeFunc: "cudnnDestroyConvolutionDescriptor",
};

export const POOL_DESCRIPTOR_TYPE: ResourceType = {
  kind: "resource",
  ctype: "cudnnPoolingDescriptor_t",
  freeFunc: "cudnnDestroyPoolingDescriptor",
};

export function tensorType(
  dtype: DType,
  rankOrShape: number | readonly number[],
): TensorType {
  if (typeof rankOrShape === "number") {
    return { kind: "tensor", dtype, rank: rankOrShape };
  }
  return {
    kind: "tensor",
    dtype,
    rank: rankOrShape.length,
    shape: rankOrShape.slice(),
  };
}

export function isBroadcastableAxis(type: TensorType, axis: number): boolean {
  return type.shape?.[axis] === 1 || type.broadcastable?.[axis] === true;
}

export function scalarType(dtype: DType): ScalarType {
  return { kind: "scalar", dtype };
}

export function formatType(type: ValueType): string {
  switch (type.kind) {
    case "tensor":
      return type.shape
        ? `tensor<${type.dtype}>[${type.shape.join(",")}]`
        : `tensor<${type.dtype}, rank ${type.rank}>`;
    case "scalar":
      return `scalar<${type.dtype}>`;
    case "resource":
      return type.ctype;
  }
}

/**
 * Whether a value of type `b` may stand in for one of type `a`.
 * Static shapes only have to agree where both sides know them.
 */
export function typesCompatible(a: ValueType, b: ValueType): boolean {
  if (a.kind === "tensor" && b.kind === "tensor") {
    if (a.dtype !== b.dtype || a.rank !== b.rank) return false;
    if (a.shape && b.shape) {
      return a.shape.every((dim, i) => b.shape?.[i] === dim);
    }
    return true;
  }
  if (a.kind === "scalar" && b.kind === "scalar") {
    return a.dtype === b.dtype;
  }
  if (a.kind === "resource" && b.kind === "resource") {
    return a.ctype === b.ctype;
  }
  return false;
}

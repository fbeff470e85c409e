import { describe, expect, it, vi } from "vitest";

import {
  ConfigurationError,
  CONV_DESCRIPTOR_TYPE,
  ConvDescriptorBuilder,
  convDescriptor,
  DescriptorCache,
  descriptorKey,
  DescriptorReleasedError,
  DescriptorResource,
  FeatureUnsupportedError,
  GraphStructureError,
  normalizePoolMode,
  opKey,
  PoolDescriptorBuilder,
  poolDescriptor,
  POOL_DESCRIPTOR_TYPE,
  tensorType,
  variable,
} from "../src";
import { fakeContext } from "./helpers/fake-gate";

const ctx = fakeContext({ version: 5005 });
const v2ctx = fakeContext({ version: 2000 });

describe("convolution descriptor builder", () => {
  it("broadcasts an integer pad to every spatial dim", () => {
    const builder = new ConvDescriptorBuilder(ctx, { borderMode: 1, subsample: [2, 2] });
    expect(builder.props).toEqual({ borderMode: [1, 1], subsample: [2, 2], convMode: "conv" });
    expect(builder.nbDims).toBe(2);
  });

  it("lowers to native parameters", () => {
    expect(
      new ConvDescriptorBuilder(ctx, { borderMode: [1, 2], subsample: [2, 3] }).nativeParams(),
    ).toEqual({
      nbDims: 2,
      borderMode: 2,
      pads: [1, 2, 0],
      strides: [2, 3, 0],
      convMode: "CUDNN_CONVOLUTION",
    });
    expect(
      new ConvDescriptorBuilder(ctx, { borderMode: "full", convMode: "cross" }).nativeParams(),
    ).toEqual({
      nbDims: 2,
      borderMode: 0,
      pads: [0, 0, 0],
      strides: [1, 1, 0],
      convMode: "CUDNN_CROSS_CORRELATION",
    });
    expect(new ConvDescriptorBuilder(ctx, { borderMode: "valid" }).nativeParams().borderMode).toBe(1);
  });

  it("resolves padding for a kernel extent", () => {
    const full = new ConvDescriptorBuilder(ctx, { borderMode: "full" });
    expect(full.padsFor([3, 5])).toEqual([2, 4]);
    const explicit = new ConvDescriptorBuilder(ctx, { borderMode: [1, 0] });
    expect(explicit.padsFor([3, 5])).toEqual([1, 0]);
  });

  it("rejects malformed tuples", () => {
    expect(
      () => new ConvDescriptorBuilder(ctx, { borderMode: [1, 1, 1], subsample: [1, 1] }),
    ).toThrow("borderMode has 3 entries but subsample has 2");
    expect(() => new ConvDescriptorBuilder(ctx, { borderMode: "valid", subsample: [1] })).toThrow(
      "subsample must describe 2 or 3 spatial dims, got 1",
    );
    expect(() => new ConvDescriptorBuilder(ctx, { borderMode: [-1, 0] })).toThrow(ConfigurationError);
    expect(() => new ConvDescriptorBuilder(ctx, { borderMode: "valid", subsample: [0, 1] })).toThrow(
      "subsample must be positive integers, got [0,1]",
    );
  });

  it("requires N-d descriptor support for three spatial dims", () => {
    expect(
      () => new ConvDescriptorBuilder(v2ctx, { borderMode: "valid", subsample: [1, 1, 1] }),
    ).toThrow(FeatureUnsupportedError);
    expect(
      new ConvDescriptorBuilder(ctx, { borderMode: "valid", subsample: [1, 1, 1] }).nativeParams(),
    ).toEqual({
      nbDims: 3,
      borderMode: 1,
      pads: [0, 0, 0],
      strides: [1, 1, 1],
      convMode: "CUDNN_CONVOLUTION",
    });
  });

  it("takes a 1-d i64 kernel shape and yields a descriptor resource", () => {
    const shape = variable(tensorType("i64", [4]));
    const desc = convDescriptor(ctx, shape, { borderMode: "valid" });
    expect(desc.type).toEqual(CONV_DESCRIPTOR_TYPE);

    expect(() => convDescriptor(ctx, variable(tensorType("i64", [5])), { borderMode: "valid" })).toThrow(
      "kernel shape has 5 entries; a 2-d descriptor needs 4",
    );
    expect(() => convDescriptor(ctx, variable(tensorType("f32", [4])), { borderMode: "valid" })).toThrow(
      GraphStructureError,
    );
  });

  it("is never constant-folded", () => {
    expect(new ConvDescriptorBuilder(ctx, { borderMode: "valid" }).constantFoldable).toBe(false);
    expect(new PoolDescriptorBuilder(ctx, { ws: [2, 2] }).constantFoldable).toBe(false);
  });

  it("keys on its parameters", () => {
    const a = new ConvDescriptorBuilder(ctx, { borderMode: 1 });
    const b = new ConvDescriptorBuilder(ctx, { borderMode: [1, 1] });
    const c = new ConvDescriptorBuilder(ctx, { borderMode: 1, convMode: "cross" });
    expect(opKey(a)).toBe(opKey(b));
    expect(opKey(a)).not.toBe(opKey(c));
  });
});

describe("pooling descriptor builder", () => {
  it("defaults stride, pad and mode", () => {
    const builder = new PoolDescriptorBuilder(ctx, { ws: [3, 3] });
    expect(builder.props).toEqual({ ws: [3, 3], stride: [1, 1], mode: "max", pad: [0, 0] });
    expect(builder.nativeParams()).toEqual({
      nbDims: 2,
      mode: "CUDNN_POOLING_MAX",
      window: [3, 3],
      pad: [0, 0],
      stride: [1, 1],
    });
  });

  it("maps the legacy average mode to counting padding", () => {
    expect(normalizePoolMode("average")).toBe("average_inc_pad");
    const builder = new PoolDescriptorBuilder(ctx, { ws: [2, 2], mode: "average" });
    expect(builder.mode).toBe("average_inc_pad");
    expect(builder.nativeParams().mode).toBe("CUDNN_POOLING_AVERAGE_COUNT_INCLUDE_PADDING");
    expect(
      new PoolDescriptorBuilder(ctx, { ws: [2, 2], mode: "average_exc_pad" }).nativeParams().mode,
    ).toBe("CUDNN_POOLING_AVERAGE_COUNT_EXCLUDE_PADDING");
    expect(() => normalizePoolMode("sum")).toThrow(ConfigurationError);
  });

  it("validates tuples", () => {
    expect(() => new PoolDescriptorBuilder(ctx, { ws: [2, 2], stride: [1] })).toThrow(
      "window, stride and pad must have equal lengths, got 2, 1 and 2",
    );
    expect(() => new PoolDescriptorBuilder(ctx, { ws: [2] })).toThrow(
      "pooling window must describe 2 or 3 spatial dims, got 1",
    );
    expect(() => new PoolDescriptorBuilder(ctx, { ws: [2, 0] })).toThrow(ConfigurationError);
    expect(() => new PoolDescriptorBuilder(ctx, { ws: [2, 2], pad: [0, -1] })).toThrow(
      ConfigurationError,
    );
  });

  it("requires N-d descriptor support for 3-d windows", () => {
    expect(() => new PoolDescriptorBuilder(v2ctx, { ws: [2, 2, 2] })).toThrow(
      "3-d pooling descriptors requires backend version 3000 or newer (detected 2000)",
    );
    expect(poolDescriptor(ctx, { ws: [2, 2, 2] }).type).toEqual(POOL_DESCRIPTOR_TYPE);
  });
});

describe("descriptor resources", () => {
  it("frees the handle exactly once, on the last release", () => {
    const free = vi.fn();
    const resource = new DescriptorResource("cudnnPoolingDescriptor_t", 7, free);
    resource.retain();
    expect(resource.refCount).toBe(2);
    resource.release();
    expect(free).not.toHaveBeenCalled();
    resource.release();
    expect(free).toHaveBeenCalledTimes(1);
    expect(free).toHaveBeenCalledWith(7);
    expect(resource.isReleased).toBe(true);
  });

  it("rejects use after release", () => {
    const resource = new DescriptorResource("cudnnConvolutionDescriptor_t", "h", () => {});
    expect(resource.get()).toBe("h");
    resource.release();
    expect(() => resource.get()).toThrow(DescriptorReleasedError);
    expect(() => resource.retain()).toThrow(DescriptorReleasedError);
    expect(() => resource.release()).toThrow("cudnnConvolutionDescriptor_t released more than once");
  });

  it("shares one resource per key in the cache", () => {
    const free = vi.fn();
    const cache = new DescriptorCache<number>();
    let next = 0;
    const create = () => new DescriptorResource("cudnnPoolingDescriptor_t", next++, free);

    const a = cache.acquire("k1", create);
    const b = cache.acquire("k1", create);
    const c = cache.acquire("k2", create);
    expect(a).toBe(b);
    expect(a).not.toBe(c);
    expect(cache.createdCount).toBe(2);
    expect(a.refCount).toBe(3);

    a.release();
    b.release();
    c.release();
    expect(free).not.toHaveBeenCalled();
    cache.clear();
    expect(free).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });

  it("keys descriptors by builder, kernel shape and version", () => {
    expect(descriptorKey("dnn_pool_desc{}", null, 5005)).toBe("dnn_pool_desc{}|-|v5005");
    expect(descriptorKey("b", [4, 3, 3, 3], 3007)).toBe("b|4x3x3x3|v3007");
  });
});

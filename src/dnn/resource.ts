import { DescriptorReleasedError } from "../core/errors";
import type { ResourceCType } from "../graph/types";

const DEBUG =
  typeof process !== "undefined" && !!process.env?.ACCELOP_DEBUG_RUNTIME;

/**
 * A native descriptor handle with an explicit release function. Starts with
 * one reference held by its creator; the handle is freed exactly once, when
 * the last reference is released.
 */
export class DescriptorResource<H> {
  private refs = 1;
  private freed = false;

  constructor(
    readonly ctype: ResourceCType,
    private readonly handle: H,
    private readonly free: (handle: H) => void,
  ) {}

  get refCount(): number {
    return this.refs;
  }

  get isReleased(): boolean {
    return this.freed;
  }

  /** The native handle; throws once released. */
  get(): H {
    if (this.freed) {
      throw new DescriptorReleasedError(`${this.ctype} used after release`);
    }
    return this.handle;
  }

  retain(): this {
    if (this.freed) {
      throw new DescriptorReleasedError(`cannot retain a released ${this.ctype}`);
    }
    this.refs++;
    return this;
  }

  release(): void {
    if (this.freed) {
      throw new DescriptorReleasedError(`${this.ctype} released more than once`);
    }
    this.refs--;
    if (this.refs > 0) return;
    this.freed = true;
    if (DEBUG) console.log(`[runtime] free ${this.ctype}`);
    this.free(this.handle);
  }
}

/**
 * Descriptors keyed by (builder key, kernel shape, backend version). The
 * cache holds one reference per entry; `acquire` hands out another.
 */
export class DescriptorCache<H> {
  private entries = new Map<string, DescriptorResource<H>>();
  private created = 0;

  get size(): number {
    return this.entries.size;
  }

  /** Number of descriptors ever materialized. */
  get createdCount(): number {
    return this.created;
  }

  acquire(key: string, create: () => DescriptorResource<H>): DescriptorResource<H> {
    let resource = this.entries.get(key);
    if (!resource) {
      resource = create();
      this.created++;
      this.entries.set(key, resource);
      if (DEBUG) console.log(`[runtime] create ${resource.ctype} (${key})`);
    }
    return resource.retain();
  }

  /** Drop the cache's references; held descriptors live until released. */
  clear(): void {
    for (const resource of this.entries.values()) resource.release();
    this.entries.clear();
  }
}

export function descriptorKey(
  builderKey: string,
  kernelShape: readonly number[] | null,
  version: number,
): string {
  return `${builderKey}|${kernelShape ? kernelShape.join("x") : "-"}|v${version}`;
}

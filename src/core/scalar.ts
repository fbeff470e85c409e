const CANONICAL_NAN_BITS = 0x7ff8000000000000n;

function canonicalizeF64Bits(value: number): bigint {
  if (Number.isNaN(value)) {
    return CANONICAL_NAN_BITS;
  }

  const buffer = new ArrayBuffer(8);
  const view = new DataView(buffer);
  view.setFloat64(0, value, true);
  return view.getBigUint64(0, true);
}

/**
 * Stable text form of a scalar constant for operator and cache keys.
 * +0.0 and -0.0 stay distinct; every NaN maps to one key.
 */
export function scalarKey(value: number): string {
  return canonicalizeF64Bits(value).toString(16).padStart(16, "0");
}


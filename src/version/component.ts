/** Largest value a single version component may hold (2^64 - 1). */
export const MAX_COMPONENT = 18446744073709551615n;

export type ComponentInput = bigint | number;

/**
 * Normalize a component to a bigint, rejecting values a parsed version
 * could never hold.
 */
export function toComponent(value: ComponentInput, name: string): bigint {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new RangeError(`${name} must be a safe integer, got ${value}`);
  }
  const big = BigInt(value);
  if (big < 0n || big > MAX_COMPONENT) {
    throw new RangeError(`${name} must be between 0 and ${MAX_COMPONENT}, got ${big}`);
  }
  return big;
}

export function compareComponents(a: bigint, b: bigint): -1 | 0 | 1 {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

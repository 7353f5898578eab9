export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

const INTEGER = /^[+-]?\d+$/;

function inRange(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

/**
 * Parses a base-10 signed 64-bit integer. Surrounding whitespace is not
 * accepted; callers trim first.
 */
export function parseInt64(text: string): bigint | undefined {
  if (!INTEGER.test(text)) {
    return undefined;
  }
  const value = BigInt(text);
  return inRange(value) ? value : undefined;
}

export function checkedAdd(a: bigint, b: bigint): bigint | undefined {
  const sum = a + b;
  return inRange(sum) ? sum : undefined;
}

export function checkedSub(a: bigint, b: bigint): bigint | undefined {
  const difference = a - b;
  return inRange(difference) ? difference : undefined;
}

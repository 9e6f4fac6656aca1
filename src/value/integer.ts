export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;
export const U64_MAX = 2n ** 64n - 1n;
export const I128_MIN = -(2n ** 127n);
export const I128_MAX = 2n ** 127n - 1n;

export interface IntegerRange {
  readonly min: bigint;
  readonly max: bigint;
}

/** Default range: anything representable as either a signed or an unsigned 64-bit integer. */
export const defaultIntegerRange: IntegerRange = { min: I64_MIN, max: U64_MAX };
export const wideIntegerRange: IntegerRange = { min: I128_MIN, max: I128_MAX };

export function integerRangeFor(wideIntegers: boolean): IntegerRange {
  return wideIntegers ? wideIntegerRange : defaultIntegerRange;
}

export function isIntegerInRange(value: bigint, { min, max }: IntegerRange) {
  return value >= min && value <= max;
}

/** Exact non-negative ratio of two bigints. */
export interface Fraction {
  numerator: bigint;
  denominator: bigint;
}

/** 18 decimal places, used to turn bigint ratios into floats without losing precision. */
export const PRECISION = 10n ** 18n;

export const BASIS_POINTS_DIVISOR = 10000n;

export function fractionToNumber(value: Fraction): number {
  if (value.denominator === 0n) return 0;
  return Number((value.numerator * PRECISION) / value.denominator) / Number(PRECISION);
}

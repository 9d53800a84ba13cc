import type { Fraction } from "./fraction";

/**
 * Constant-product output: amountOut = effectiveInput * reserveOut / (reserveIn + effectiveInput).
 * The fee has already been removed from `effectiveInput`.
 *
 * Returns 0n for an empty pool.
 */
export function getConstantProductAmountOut(
  effectiveInput: bigint,
  reserveIn: bigint,
  reserveOut: bigint
): bigint {
  if (reserveIn <= 0n || reserveOut <= 0n || effectiveInput <= 0n) return 0n;
  return (effectiveInput * reserveOut) / (reserveIn + effectiveInput);
}

/**
 * Marginal price (output per unit of input) at the current reserves.
 */
export function getConstantProductSpotPrice(reserveIn: bigint, reserveOut: bigint): Fraction {
  return { numerator: reserveOut, denominator: reserveIn };
}

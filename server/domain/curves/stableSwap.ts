/**
 * Two-coin StableSwap (Curve style) math on 18-decimal normalized balances.
 *
 * Invariant, with Ann = A * n^n and n = 2:
 *   Ann * (x + y) + D = Ann * D + D^3 / (4xy)
 *
 * At A -> 0 it degenerates to constant product, at A -> infinity to constant sum.
 */

import type { Fraction } from "./fraction";

const N_COINS = 2n;
const MAX_ITERATIONS = 255;
const NORMALIZED_DECIMALS = 18;

export interface StableSwapResult {
  amountOut: bigint;
  spotPrice: Fraction;
}

function scaleFactor(decimals: number): Fraction {
  const diff = NORMALIZED_DECIMALS - decimals;
  return diff >= 0
    ? { numerator: 10n ** BigInt(diff), denominator: 1n }
    : { numerator: 1n, denominator: 10n ** BigInt(-diff) };
}

function normalize(amount: bigint, decimals: number): bigint {
  const factor = scaleFactor(decimals);
  return (amount * factor.numerator) / factor.denominator;
}

function denormalize(amount: bigint, decimals: number): bigint {
  const factor = scaleFactor(decimals);
  return (amount * factor.denominator) / factor.numerator;
}

export function amplificationCoefficient(amplification: number): bigint {
  const a = BigInt(Math.max(1, Math.round(amplification)));
  return a * N_COINS ** N_COINS;
}

/**
 * Newton iteration for D:
 *   D_next = (Ann * S + n * D_P) * D / ((Ann - 1) * D + (n + 1) * D_P)
 *   D_P = D^(n+1) / (n^n * x * y)
 */
export function computeInvariant(x: bigint, y: bigint, ann: bigint): bigint {
  const sum = x + y;
  if (sum === 0n || x <= 0n || y <= 0n) return 0n;

  let d = sum;
  for (let i = 0; i < MAX_ITERATIONS; i++) {
    let dP = d;
    dP = (dP * d) / (x * N_COINS);
    dP = (dP * d) / (y * N_COINS);

    const previous = d;
    const numerator = (ann * sum + N_COINS * dP) * d;
    const denominator = (ann - 1n) * d + (N_COINS + 1n) * dP;
    if (denominator === 0n) return 0n;
    d = numerator / denominator;

    const diff = d > previous ? d - previous : previous - d;
    if (diff <= 1n) return d;
  }
  return d;
}

/**
 * Solves the invariant for the other balance given `x`:
 *   y_next = (y^2 + c) / (2y + b - D)
 *   c = D^3 / (4 * Ann * x), b = x + D / Ann
 */
export function computeOtherBalance(x: bigint, d: bigint, ann: bigint): bigint {
  if (d <= 0n || ann <= 0n || x <= 0n) return 0n;

  let c = d;
  c = (c * d) / (x * N_COINS);
  c = (c * d) / (ann * N_COINS);
  const b = x + d / ann;

  let y = d;
  for (let i = 0; i < MAX_ITERATIONS; i++) {
    const previous = y;
    const denominator = 2n * y + b - d;
    if (denominator <= 0n) return 0n;
    y = (y * y + c) / denominator;

    const diff = y > previous ? y - previous : previous - y;
    if (diff <= 1n) return y;
  }
  return y;
}

/**
 * Output of a stable-swap hop for a fee-adjusted input, plus the marginal price
 * at the current balances, both in base units of the respective tokens.
 *
 * Marginal price from the invariant's partial derivatives:
 *   -dy/dx = y * (4 * Ann * x^2 * y + D^3) / (x * (4 * Ann * x * y^2 + D^3))
 */
export function getStableSwapQuote(
  effectiveInput: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  amplification: number,
  decimalsIn: number,
  decimalsOut: number
): StableSwapResult {
  const x = normalize(reserveIn, decimalsIn);
  const y = normalize(reserveOut, decimalsOut);
  const ann = amplificationCoefficient(amplification);
  const d = computeInvariant(x, y, ann);

  if (d === 0n) {
    return { amountOut: 0n, spotPrice: { numerator: 0n, denominator: 1n } };
  }

  const d3 = d * d * d;
  const factorIn = scaleFactor(decimalsIn);
  const factorOut = scaleFactor(decimalsOut);
  const spotPrice: Fraction = {
    numerator: y * (4n * ann * x * x * y + d3) * factorIn.numerator * factorOut.denominator,
    denominator: x * (4n * ann * x * y * y + d3) * factorIn.denominator * factorOut.numerator,
  };

  const dx = normalize(effectiveInput, decimalsIn);
  if (dx <= 0n) {
    return { amountOut: 0n, spotPrice };
  }

  const newY = computeOtherBalance(x + dx, d, ann);
  if (newY <= 0n || newY >= y) {
    return { amountOut: 0n, spotPrice };
  }

  return { amountOut: denormalize(y - newY, decimalsOut), spotPrice };
}

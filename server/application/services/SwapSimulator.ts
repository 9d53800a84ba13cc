/**
 * SwapSimulator - Exact per-hop AMM simulation
 *
 * RESPONSIBILITY:
 * - Walk a route hop by hop, feeding each hop's output into the next
 * - Take the pool fee BEFORE the curve is applied
 * - Report per-hop and cumulative price impact, and the total fee
 *
 * Pure and synchronous: reserves are read as they were before the trade and
 * never mutated.
 */

import {
  HopSimulation,
  LiquidityPool,
  Route,
  SwapSimulation,
  Token,
  orientPool,
} from '../../domain/types';
import { InsufficientLiquidityError, ZeroAmountError } from '../../domain/errors';
import { BASIS_POINTS_DIVISOR, Fraction, fractionToNumber } from '../../domain/curves/fraction';
import { getConstantProductAmountOut, getConstantProductSpotPrice } from '../../domain/curves/constantProduct';
import { getStableSwapQuote } from '../../domain/curves/stableSwap';
import { routingConfig } from '../../infrastructure/config/RoutingConfig';

export interface SwapSimulatorOptions {
  reserveFloorBps?: number;
}

interface CurveOutput {
  amountOut: bigint;
  spotPrice: Fraction;
}

export class SwapSimulator {
  private readonly reserveFloorBps: bigint;

  constructor(options: SwapSimulatorOptions = {}) {
    const floor = options.reserveFloorBps ?? routingConfig.RESERVE_FLOOR_BPS;
    this.reserveFloorBps = BigInt(Math.min(9999, Math.max(0, Math.floor(floor))));
  }

  /**
   * @throws ZeroAmountError when amountIn <= 0
   * @throws InsufficientLiquidityError when any hop cannot absorb its input
   */
  public simulate(route: Route, amountIn: bigint): SwapSimulation {
    if (amountIn <= 0n) {
      throw new ZeroAmountError(amountIn);
    }

    const hops: HopSimulation[] = [];
    let hopInput = amountIn;
    let retained = 1;
    let totalFee = 0n;

    route.pools.forEach((pool, i) => {
      const hop = this.simulateHop(pool, route.tokens[i], hopInput);
      hops.push(hop);

      retained *= 1 - hop.priceImpact;
      // Fee of this hop expressed in source-token units at the running rate
      totalFee += (hop.feeAmount * amountIn) / hopInput;
      hopInput = hop.amountOut;
    });

    return {
      route,
      amountIn,
      amountOut: hopInput,
      hops,
      priceImpact: Math.max(0, 1 - retained),
      totalFee,
    };
  }

  private simulateHop(pool: LiquidityPool, tokenIn: Token, amountIn: bigint): HopSimulation {
    const { tokenOut, reserveIn, reserveOut } = orientPool(pool, tokenIn);

    if (reserveIn === 0n || reserveOut === 0n) {
      throw new InsufficientLiquidityError(pool.address, 'pool has an empty reserve');
    }

    const effectiveInput = (amountIn * (BASIS_POINTS_DIVISOR - BigInt(pool.feeBps))) / BASIS_POINTS_DIVISOR;
    const feeAmount = amountIn - effectiveInput;

    const { amountOut, spotPrice } = this.applyCurve(pool, tokenIn, tokenOut, effectiveInput, reserveIn, reserveOut);

    if (amountOut <= 0n) {
      throw new InsufficientLiquidityError(pool.address, 'output rounds to zero');
    }
    if (amountOut >= reserveOut) {
      throw new InsufficientLiquidityError(pool.address, 'output would drain the reserve');
    }
    if ((reserveOut - amountOut) * BASIS_POINTS_DIVISOR < reserveOut * this.reserveFloorBps) {
      throw new InsufficientLiquidityError(pool.address, `output would leave less than ${this.reserveFloorBps} bps of the reserve`);
    }
    if (spotPrice.numerator === 0n || spotPrice.denominator === 0n) {
      throw new InsufficientLiquidityError(pool.address, 'no marginal price at current reserves');
    }

    // execution / spot = (out / effIn) / (num / den)
    const priceRatio = fractionToNumber({
      numerator: amountOut * spotPrice.denominator,
      denominator: effectiveInput * spotPrice.numerator,
    });

    return {
      poolAddress: pool.address,
      tokenIn,
      tokenOut,
      amountIn,
      feeAmount,
      effectiveInput,
      amountOut,
      spotPrice: fractionToNumber(spotPrice),
      executionPrice: fractionToNumber({ numerator: amountOut, denominator: effectiveInput }),
      priceImpact: Math.max(0, 1 - priceRatio),
    };
  }

  private applyCurve(
    pool: LiquidityPool,
    tokenIn: Token,
    tokenOut: Token,
    effectiveInput: bigint,
    reserveIn: bigint,
    reserveOut: bigint
  ): CurveOutput {
    const curve = pool.curve;
    switch (curve.type) {
      case 'constant-product':
        return {
          amountOut: getConstantProductAmountOut(effectiveInput, reserveIn, reserveOut),
          spotPrice: getConstantProductSpotPrice(reserveIn, reserveOut),
        };
      case 'stable-swap':
        return getStableSwapQuote(
          effectiveInput,
          reserveIn,
          reserveOut,
          curve.amplification,
          tokenIn.decimals,
          tokenOut.decimals
        );
    }
  }
}

import { describe, it, expect } from 'vitest';
import { SwapSimulator } from './SwapSimulator';
import { InsufficientLiquidityError, ZeroAmountError } from '../../domain/errors';
import type { LiquidityPool, Route, Token } from '../../domain/types';
import { E18, makePool, makeToken } from '../../test/fixtures';

const A = makeToken('A', 1);
const B = makeToken('B', 2);
const C = makeToken('C', 3);

function route(tokens: Token[], pools: LiquidityPool[]): Route {
  return { tokens, pools };
}

describe('SwapSimulator', () => {
  const simulator = new SwapSimulator({ reserveFloorBps: 0 });

  it('takes the fee before the constant-product curve', () => {
    const pool = makePool('0xab', A, B, 1_000_000n * E18, 500_000n * E18);

    const result = simulator.simulate(route([A, B], [pool]), 10_000n * E18);
    const [hop] = result.hops;

    expect(hop.feeAmount).toBe(30n * E18);
    expect(hop.effectiveInput).toBe(9_970n * E18);
    expect(hop.amountOut).toBe(4935790171985306494252n);
    expect(result.amountOut).toBe(4935790171985306494252n);
    expect(hop.spotPrice).toBe(0.5);
    expect(hop.executionPrice).toBeCloseTo(0.4950642, 6);
    expect(result.priceImpact).toBeCloseTo(0.0098716, 6);
    expect(result.totalFee).toBe(30n * E18);
  });

  it('orients the pool from the input side', () => {
    const pool = makePool('0xab', A, B, 1_000_000n * E18, 500_000n * E18);

    const [hop] = simulator.simulate(route([B, A], [pool]), 10n * E18).hops;

    expect(hop.tokenIn).toBe(B);
    expect(hop.tokenOut).toBe(A);
    expect(hop.spotPrice).toBe(2);
  });

  it('rejects zero and negative amounts', () => {
    const pool = makePool('0xab', A, B, E18, E18);

    expect(() => simulator.simulate(route([A, B], [pool]), 0n)).toThrow(ZeroAmountError);
    expect(() => simulator.simulate(route([A, B], [pool]), -1n)).toThrow(ZeroAmountError);
  });

  it('feeds each hop output into the next hop', () => {
    const ab = makePool('0xab', A, B, 1_000_000n * E18, 1_000_000n * E18);
    const bc = makePool('0xbc', B, C, 1_000_000n * E18, 1_000_000n * E18);

    const result = simulator.simulate(route([A, B, C], [ab, bc]), 1_000n * E18);

    expect(result.hops.map(h => h.amountOut)).toEqual([996006981039903216493n, 992033851673014363344n]);
    expect(result.hops[1].amountIn).toBe(996006981039903216493n);
    expect(result.hops[1].feeAmount).toBe(2988020943119709650n);
    expect(result.amountOut).toBe(992033851673014363344n);
    expect(result.totalFee).toBe(6n * E18);
  });

  it('compounds hop impacts multiplicatively', () => {
    const ab = makePool('0xab', A, B, 1_000n * E18, 1_000n * E18);
    const bc = makePool('0xbc', B, C, 2_000n * E18, 1_000n * E18);

    const result = simulator.simulate(route([A, B, C], [ab, bc]), 100n * E18);
    const [first, second] = result.hops;

    expect(first.priceImpact).toBeGreaterThan(0);
    expect(second.priceImpact).toBeGreaterThan(0);
    expect(result.priceImpact).toBeCloseTo(1 - (1 - first.priceImpact) * (1 - second.priceImpact), 12);
    expect(result.priceImpact).toBeLessThan(first.priceImpact + second.priceImpact);
  });

  it('loses value on a round trip through one pool', () => {
    const pool = makePool('0xab', A, B, 1_000_000n * E18, 1_000_000n * E18);

    const result = simulator.simulate(route([A, B, A], [pool, pool]), 1_000n * E18);

    expect(result.amountOut).toBe(992033851673014363344n);
    expect(result.amountOut).toBeLessThan(1_000n * E18);
  });

  it('prices stable-swap pools with their invariant', () => {
    const pool = makePool('0xstable', A, B, 1_000_000n * E18, 1_000_000n * E18, {
      feeBps: 0,
      curve: { type: 'stable-swap', amplification: 100 },
    });

    const result = simulator.simulate(route([A, B], [pool]), 1_000n * E18);

    expect(result.amountOut).toBe(999995024895447954851n);
    expect(result.hops[0].spotPrice).toBe(1);
    expect(result.priceImpact).toBeGreaterThan(0);
    expect(result.priceImpact).toBeLessThan(0.00001);
    expect(result.totalFee).toBe(0n);
  });

  it('rejects a pool with an empty reserve', () => {
    const pool = makePool('0xab', A, B, E18, 0n);

    expect(() => simulator.simulate(route([A, B], [pool]), E18)).toThrow(
      'Pool 0xab cannot absorb the trade: pool has an empty reserve'
    );
  });

  it('rejects a trade whose output rounds to zero', () => {
    const pool = makePool('0xab', A, B, 1_000n, 1_000n);

    expect(() => simulator.simulate(route([A, B], [pool]), 1n)).toThrow(InsufficientLiquidityError);
    expect(() => simulator.simulate(route([A, B], [pool]), 1n)).toThrow('output rounds to zero');
  });

  it('enforces the reserve floor', () => {
    const guarded = new SwapSimulator({ reserveFloorBps: 5000 });
    const pool = makePool('0xab', A, B, 1_000n * E18, 1_000n * E18, { feeBps: 0 });

    // Leaves exactly half the reserve
    expect(guarded.simulate(route([A, B], [pool]), 1_000n * E18).amountOut).toBe(500n * E18);
    expect(() => guarded.simulate(route([A, B], [pool]), 2_000n * E18)).toThrow(
      'Pool 0xab cannot absorb the trade: output would leave less than 5000 bps of the reserve'
    );
  });

  it('fails the whole route when a later hop fails', () => {
    const ab = makePool('0xab', A, B, 1_000n * E18, 1_000n * E18);
    const bc = makePool('0xbc', B, C, 1_000n * E18, 0n);

    let thrown: unknown;
    try {
      simulator.simulate(route([A, B, C], [ab, bc]), E18);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(InsufficientLiquidityError);
    expect(thrown).toMatchObject({ code: 'INSUFFICIENT_LIQUIDITY', poolAddress: '0xbc' });
  });
});

import { describe, it, expect } from 'vitest';
import { getConstantProductAmountOut, getConstantProductSpotPrice } from './constantProduct';
import { fractionToNumber } from './fraction';

const E18 = 10n ** 18n;

describe('getConstantProductAmountOut', () => {
  it('applies x * y = k to the fee-adjusted input', () => {
    // 10,000 X in at 30 bps leaves 9,970 X for the curve
    const out = getConstantProductAmountOut(9_970n * E18, 1_000_000n * E18, 500_000n * E18);
    expect(out).toBe(4935790171985306494252n);
  });

  it('rounds down', () => {
    expect(getConstantProductAmountOut(997n, 1000n, 500n)).toBe(249n);
  });

  it('returns 0 for an empty pool or no input', () => {
    expect(getConstantProductAmountOut(100n, 0n, 500n)).toBe(0n);
    expect(getConstantProductAmountOut(100n, 500n, 0n)).toBe(0n);
    expect(getConstantProductAmountOut(0n, 500n, 500n)).toBe(0n);
  });

  it('is strictly increasing with non-increasing marginal output', () => {
    const reserveIn = 1_000_000n * E18;
    const reserveOut = 2_000_000n * E18;
    const step = 10_000n * E18;

    let previousOut = 0n;
    let previousMarginal: bigint | null = null;
    for (let i = 1n; i <= 20n; i++) {
      const out = getConstantProductAmountOut(step * i, reserveIn, reserveOut);
      expect(out).toBeGreaterThan(previousOut);

      const marginal = out - previousOut;
      if (previousMarginal !== null) {
        expect(marginal).toBeLessThanOrEqual(previousMarginal);
      }
      previousMarginal = marginal;
      previousOut = out;
    }
  });
});

describe('getConstantProductSpotPrice', () => {
  it('is reserveOut / reserveIn', () => {
    const spot = getConstantProductSpotPrice(1_000_000n * E18, 500_000n * E18);
    expect(fractionToNumber(spot)).toBe(0.5);
  });
});

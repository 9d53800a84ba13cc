import { describe, it, expect, vi, afterEach } from 'vitest';
import { TokenRegistry } from './TokenRegistry';
import { StorageService } from './StorageService';
import { InvalidQuoteRequestError, TokenResolutionError } from '../../domain/errors';
import type { Token } from '../../domain/types';
import { makeToken } from '../../test/fixtures';

const USDC: Token = { ...makeToken('USDC', 1, 6), name: 'USD Coin' };
const WETH: Token = { ...makeToken('WETH', 2), name: 'Wrapped Ether' };
const DUP_1 = makeToken('DUP', 3);
const DUP_2 = makeToken('DUP', 4);
const UNLISTED = makeToken('NEW', 9, 8);

describe('TokenRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('search', () => {
    const registry = new TokenRegistry([USDC, WETH, DUP_1, DUP_2]);

    it('matches symbols case-insensitively', async () => {
      await expect(registry.search('usdc')).resolves.toEqual([USDC]);
      await expect(registry.search('DUP')).resolves.toEqual([DUP_1, DUP_2]);
    });

    it('falls back to exact names', async () => {
      await expect(registry.search('wrapped ether')).resolves.toEqual([WETH]);
      await expect(registry.search('wrapped')).rejects.toMatchObject({ code: 'TOKEN_NOT_FOUND' });
    });

    it('matches addresses', async () => {
      await expect(registry.search(WETH.address)).resolves.toEqual([WETH]);
    });

    it('requires a query', async () => {
      await expect(registry.search('  ')).rejects.toThrow(InvalidQuoteRequestError);
    });
  });

  describe('resolve', () => {
    it('resolves a unique symbol', async () => {
      const registry = new TokenRegistry([USDC, WETH]);

      await expect(registry.resolve(' weth ')).resolves.toEqual(WETH);
    });

    it('refuses a symbol shared by several tokens', async () => {
      const registry = new TokenRegistry([DUP_1, DUP_2]);

      const error = await registry.resolve('dup').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TokenResolutionError);
      expect(error).toMatchObject({
        code: 'AMBIGUOUS_TOKEN',
        candidates: [DUP_1.address, DUP_2.address],
        message: "Ambiguous symbol 'dup', use the token address instead",
      });
    });

    it('disambiguates by address', async () => {
      const registry = new TokenRegistry([DUP_1, DUP_2]);

      await expect(registry.resolve(DUP_2.address)).resolves.toEqual(DUP_2);
    });

    it('reads unlisted addresses through the metadata lookup once', async () => {
      const lookup = vi.fn(async (address: string): Promise<Token> => ({ ...UNLISTED, address }));
      const registry = new TokenRegistry([USDC], lookup);

      await expect(registry.resolve(UNLISTED.address)).resolves.toMatchObject({ symbol: 'NEW', decimals: 8 });
      await registry.resolve(UNLISTED.address);

      expect(lookup).toHaveBeenCalledTimes(1);
      expect(registry.size).toBe(2);
    });

    it('reports a failed lookup as not found', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const registry = new TokenRegistry([USDC], async () => {
        throw new Error('call reverted');
      });

      await expect(registry.resolve(UNLISTED.address)).rejects.toMatchObject({ code: 'TOKEN_NOT_FOUND' });
    });

    it('reports unknown symbols and unlisted addresses without a lookup as not found', async () => {
      const registry = new TokenRegistry([USDC]);

      await expect(registry.resolve('NOPE')).rejects.toThrow("Token 'NOPE' not found");
      await expect(registry.resolve(UNLISTED.address)).rejects.toMatchObject({ code: 'TOKEN_NOT_FOUND' });
    });

    it('rejects an empty identifier', async () => {
      const registry = new TokenRegistry([USDC]);

      await expect(registry.resolve('')).rejects.toThrow('Token identifier cannot be empty');
    });
  });

  describe('amounts', () => {
    const registry = new TokenRegistry([USDC]);

    it('converts between decimal strings and base units', () => {
      expect(registry.parseAmount('1.5', USDC)).toBe(1_500_000n);
      expect(registry.parseAmount('1000', USDC)).toBe(1_000_000_000n);
      expect(registry.formatAmount(1_500_000n, USDC)).toBe('1.5');
    });

    it('rejects amounts that are not numbers', () => {
      expect(() => registry.parseAmount('abc', USDC)).toThrow("Invalid amount 'abc' for a token with 6 decimals");
    });
  });

  it('loads the tokens of one chain from the token list', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    const registry = await TokenRegistry.load(new StorageService(), 137);

    expect(registry.size).toBe(6);
    await expect(registry.resolve('wmatic')).resolves.toMatchObject({
      address: '0x0d500B1d8E8eF31E21C99d1Db9A6444d3ADf1270',
      decimals: 18,
    });
    expect(registry.findByAddress('0x2791bca1f2de4661ed88a30c99a7a9449aa84174')?.symbol).toBe('USDC');
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Interface, ZeroAddress } from 'ethers';
import type { ContractRunner, Result, TransactionRequest } from 'ethers';
import { EthersAdapter, withRetry } from './EthersAdapter';
import { BalanceLookupError } from '../../domain/errors';
import {
  ERC20_ABI,
  STABLE_POOL_ABI,
  STABLE_REGISTRY_ABI,
  V2_FACTORY_ABI,
  V2_POOL_ABI,
  type ChainContracts,
} from '../config/ContractAddressConfig';

type Handler = (args: Result) => ReadonlyArray<unknown>;

interface FakeContract {
  iface: Interface;
  handlers: Record<string, Handler>;
}

const E18 = 10n ** 18n;

function addr(n: number): string {
  return `0x${String(n).padStart(40, '0')}`;
}

function argIndex(args: Result): number {
  const value: unknown = args[0];
  return typeof value === 'bigint' ? Number(value) : -1;
}

const TOKEN0 = addr(101);
const TOKEN1 = addr(102);
const TOKEN_NO_SYMBOL = addr(103);
const FACTORY_ALPHA = addr(201);
const FACTORY_BETA = addr(202);
const STABLE_REGISTRY = addr(301);
const PAIR = addr(401);
const STABLE_POOL = addr(402);
const WALLET = addr(501);

const CONTRACTS: ChainContracts = {
  v2Factories: [
    { name: 'Alpha', address: FACTORY_ALPHA, feeBps: 30 },
    { name: 'Beta', address: FACTORY_BETA, feeBps: 25 },
  ],
  stableRegistry: STABLE_REGISTRY,
};

/**
 * Answers eth_call from in-memory contracts, decoding calldata with each
 * contract's ABI. Unknown contracts and selectors revert.
 */
class FakeRunner implements ContractRunner {
  readonly provider = null;
  public calls: string[] = [];
  private contracts: Map<string, FakeContract> = new Map();

  deploy(address: string, abi: string[], handlers: Record<string, Handler>): void {
    this.contracts.set(address.toLowerCase(), { iface: new Interface(abi), handlers });
  }

  async call(tx: TransactionRequest): Promise<string> {
    const to = typeof tx.to === 'string' ? tx.to.toLowerCase() : '';
    const contract = this.contracts.get(to);
    const parsed = contract && typeof tx.data === 'string' ? contract.iface.parseTransaction({ data: tx.data }) : null;
    if (!contract || !parsed) {
      throw new Error(`execution reverted (${to})`);
    }

    this.calls.push(`${to}:${parsed.name}`);
    const handler = contract.handlers[parsed.name];
    if (!handler) {
      throw new Error(`execution reverted (${parsed.name})`);
    }
    return contract.iface.encodeFunctionResult(parsed.fragment, handler(parsed.args));
  }
}

function deployChain(runner: FakeRunner, options: { thirdCoin?: boolean } = {}): void {
  runner.deploy(TOKEN0, ERC20_ABI, {
    decimals: () => [18],
    symbol: () => ['AAA'],
    balanceOf: () => [42n * E18],
  });
  runner.deploy(TOKEN1, ERC20_ABI, {
    decimals: () => [6],
    symbol: () => ['BBB'],
  });
  runner.deploy(TOKEN_NO_SYMBOL, ERC20_ABI, {
    decimals: () => [8],
  });
  runner.deploy(FACTORY_ALPHA, V2_FACTORY_ABI, { getPair: () => [ZeroAddress] });
  runner.deploy(FACTORY_BETA, V2_FACTORY_ABI, { getPair: () => [PAIR] });
  runner.deploy(STABLE_REGISTRY, STABLE_REGISTRY_ABI, { find_pool_for_coins: () => [STABLE_POOL] });
  runner.deploy(PAIR, V2_POOL_ABI, {
    getReserves: () => [1_000n * E18, 2_000n * 10n ** 6n, 1_700_000_000],
    token0: () => [TOKEN0],
    token1: () => [TOKEN1],
  });
  runner.deploy(STABLE_POOL, STABLE_POOL_ABI, {
    A: () => [200n],
    fee: () => [4_000_000n],
    coins: args => {
      const i = argIndex(args);
      if (i === 0) return [TOKEN0];
      if (i === 1) return [TOKEN1];
      if (i === 2 && options.thirdCoin) return [TOKEN_NO_SYMBOL];
      throw new Error('execution reverted');
    },
    balances: args => [argIndex(args) === 0 ? 500n * E18 : 700n * 10n ** 6n],
  });
}

const TOKEN_A = { address: TOKEN0, decimals: 18, symbol: 'AAA' };
const TOKEN_B = { address: TOKEN1, decimals: 6, symbol: 'BBB' };

describe('EthersAdapter', () => {
  let runner: FakeRunner;
  let adapter: EthersAdapter;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    runner = new FakeRunner();
    deployChain(runner);
    adapter = new EthersAdapter(() => runner, { chainId: 1, contracts: CONTRACTS, baseDelayMs: 0 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('listPoolsForPair', () => {
    it('collects pairs from every factory and the stable registry', async () => {
      await expect(adapter.listPoolsForPair(TOKEN_A, TOKEN_B)).resolves.toEqual([PAIR, STABLE_POOL]);
    });

    it('skips stable pools holding more than two coins', async () => {
      const multiCoin = new FakeRunner();
      deployChain(multiCoin, { thirdCoin: true });
      const multiCoinAdapter = new EthersAdapter(() => multiCoin, { chainId: 1, contracts: CONTRACTS, baseDelayMs: 0 });

      await expect(multiCoinAdapter.listPoolsForPair(TOKEN_A, TOKEN_B)).resolves.toEqual([PAIR]);
    });

    it('skips the stable registry on chains without one', async () => {
      const v2Only = new EthersAdapter(() => runner, {
        chainId: 137,
        contracts: { ...CONTRACTS, stableRegistry: null },
        baseDelayMs: 0,
      });

      await expect(v2Only.listPoolsForPair(TOKEN_A, TOKEN_B)).resolves.toEqual([PAIR]);
      expect(runner.calls.some(call => call.endsWith(':find_pool_for_coins'))).toBe(false);
    });
  });

  describe('fetchPoolState', () => {
    it('reads a listed constant-product pair with its factory fee', async () => {
      await adapter.listPoolsForPair(TOKEN_A, TOKEN_B);

      await expect(adapter.fetchPoolState(PAIR)).resolves.toEqual({
        tokenA: TOKEN_A,
        tokenB: TOKEN_B,
        reserveA: 1_000n * E18,
        reserveB: 2_000n * 10n ** 6n,
        feeBps: 25,
        curve: { type: 'constant-product' },
      });
    });

    it('detects an unlisted pair and applies the first factory fee', async () => {
      const state = await adapter.fetchPoolState(PAIR);

      expect(state.feeBps).toBe(30);
      expect(state.curve).toEqual({ type: 'constant-product' });
    });

    it('reads a stable-swap pool', async () => {
      await expect(adapter.fetchPoolState(STABLE_POOL)).resolves.toEqual({
        tokenA: TOKEN_A,
        tokenB: TOKEN_B,
        reserveA: 500n * E18,
        reserveB: 700n * 10n ** 6n,
        feeBps: 4,
        curve: { type: 'stable-swap', amplification: 200 },
      });
    });

    it('rejects contracts that are neither kind of pool', async () => {
      await expect(adapter.fetchPoolState(TOKEN0)).rejects.toThrow(`Unsupported pool contract at ${TOKEN0}`);
    });

    it('rejects an invalid pool address', async () => {
      await expect(adapter.fetchPoolState('0xnot-a-pool')).rejects.toThrow('Unexpected pool address: 0xnot-a-pool');
    });
  });

  describe('getTokenMetadata', () => {
    it('reads decimals and symbol once per token', async () => {
      await expect(adapter.getTokenMetadata(TOKEN1)).resolves.toEqual(TOKEN_B);
      await adapter.getTokenMetadata(TOKEN1);

      expect(runner.calls.filter(call => call === `${TOKEN1}:decimals`)).toHaveLength(1);
    });

    it('leaves out a symbol the token does not provide', async () => {
      await expect(adapter.getTokenMetadata(TOKEN_NO_SYMBOL)).resolves.toEqual({ address: TOKEN_NO_SYMBOL, decimals: 8 });
    });
  });

  describe('getBalance', () => {
    it('reads the ERC20 balance', async () => {
      await expect(adapter.getBalance(WALLET, TOKEN_A)).resolves.toBe(42n * E18);
    });

    it('rejects a malformed wallet address', async () => {
      await expect(adapter.getBalance('not-a-wallet', TOKEN_A)).rejects.toThrow(
        `Balance lookup failed for not-a-wallet / ${TOKEN0}: Invalid wallet address`
      );
    });

    it('wraps upstream failures', async () => {
      const missing = { address: addr(999), decimals: 18 };

      const error = await adapter.getBalance(WALLET, missing).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BalanceLookupError);
      expect(error).toMatchObject({ code: 'BALANCE_LOOKUP_FAILED', retryable: true });
    });
  });
});

describe('withRetry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('retries rate-limited calls', async () => {
    let attempts = 0;
    const fn = async () => {
      attempts++;
      if (attempts < 3) throw new Error('429 Too Many Requests');
      return 'ok';
    };

    await expect(withRetry(fn, 'test', 3, 0)).resolves.toBe('ok');
    expect(attempts).toBe(3);
  });

  it('retries call exceptions', async () => {
    let attempts = 0;
    const fn = async () => {
      attempts++;
      if (attempts === 1) throw Object.assign(new Error('missing revert data'), { code: 'CALL_EXCEPTION' });
      return 7n;
    };

    await expect(withRetry(fn, 'test', 3, 0)).resolves.toBe(7n);
    expect(attempts).toBe(2);
  });

  it('does not retry other errors', async () => {
    let attempts = 0;
    const fn = async () => {
      attempts++;
      throw new Error('invalid argument');
    };

    await expect(withRetry(fn, 'test', 3, 0)).rejects.toThrow('invalid argument');
    expect(attempts).toBe(1);
  });

  it('gives up after the last attempt', async () => {
    let attempts = 0;
    const fn = async () => {
      attempts++;
      throw new Error('rate limit exceeded');
    };

    await expect(withRetry(fn, 'test', 3, 0)).rejects.toThrow('rate limit exceeded');
    expect(attempts).toBe(3);
  });
});

import type {
  BalanceProvider,
  ChainClient,
  LiquidityPool,
  PoolCurve,
  PoolStateResponse,
  Token,
} from '../domain/types';
import { pairKey } from '../domain/types';

export const E18 = 10n ** 18n;

export function makeToken(symbol: string, index: number, decimals = 18): Token {
  return { address: `0x${String(index).padStart(40, '0')}`, symbol, decimals };
}

export interface PoolOptions {
  feeBps?: number;
  curve?: PoolCurve;
  lastRefreshed?: number;
}

export function makePool(
  address: string,
  tokenA: Token,
  tokenB: Token,
  reserveA: bigint,
  reserveB: bigint,
  options: PoolOptions = {}
): LiquidityPool {
  return {
    address,
    tokenA,
    tokenB,
    reserveA,
    reserveB,
    feeBps: options.feeBps ?? 30,
    curve: options.curve ?? { type: 'constant-product' },
    lastRefreshed: options.lastRefreshed ?? Date.now(),
  };
}

export function toPoolState(pool: LiquidityPool): PoolStateResponse {
  return {
    tokenA: pool.tokenA,
    tokenB: pool.tokenB,
    reserveA: pool.reserveA,
    reserveB: pool.reserveB,
    feeBps: pool.feeBps,
    curve: pool.curve,
  };
}

/**
 * In-process chain feed. A pool answers with its state, an Error rejects,
 * and a missing pool never settles (a hung upstream call).
 */
export class FakeChainClient implements ChainClient {
  public states: Map<string, PoolStateResponse | Error> = new Map();
  public listings: Map<string, string[] | Error> = new Map();
  public fetchCalls: string[] = [];
  public gate: Promise<void> = Promise.resolve();

  setState(address: string, state: PoolStateResponse | Error): void {
    this.states.set(address.toLowerCase(), state);
  }

  setListing(tokenA: Token, tokenB: Token, listing: string[] | Error): void {
    this.listings.set(pairKey(tokenA, tokenB), listing);
  }

  async fetchPoolState(poolAddress: string): Promise<PoolStateResponse> {
    this.fetchCalls.push(poolAddress);
    await this.gate;
    const state = this.states.get(poolAddress.toLowerCase());
    if (state === undefined) {
      return new Promise<PoolStateResponse>(() => {});
    }
    if (state instanceof Error) throw state;
    return state;
  }

  async listPoolsForPair(tokenA: Token, tokenB: Token): Promise<string[]> {
    const listing = this.listings.get(pairKey(tokenA, tokenB)) ?? [];
    if (listing instanceof Error) throw listing;
    return listing;
  }
}

export class FakeBalanceProvider implements BalanceProvider {
  constructor(private readonly balances: Map<string, bigint | Error> = new Map()) {}

  set(walletId: string, token: Token, amount: bigint | Error): void {
    this.balances.set(`${walletId}:${token.address.toLowerCase()}`, amount);
  }

  async getBalance(walletId: string, token: Token): Promise<bigint> {
    const balance = this.balances.get(`${walletId}:${token.address.toLowerCase()}`) ?? 0n;
    if (balance instanceof Error) throw balance;
    return balance;
  }
}

/**
 * Resolves after pending microtasks and I/O callbacks have run.
 */
export function flushPromises(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

import {
  LiquidityPool,
  Token,
  normalizeAddress,
  pairKey,
} from '../../domain/types';

/**
 * Read side of the registry, shared by route finding and simulation.
 */
export interface PoolView {
  get(tokenA: Token, tokenB: Token): LiquidityPool[];
  getPool(address: string): LiquidityPool | undefined;
  getPoolsForToken(token: Token): LiquidityPool[];
}

/**
 * Immutable view of the registry taken at one instant.
 * A whole simulation pass reads from one snapshot, so a refresh landing
 * mid-computation never produces a torn read.
 */
export class PoolSnapshot implements PoolView {
  constructor(
    private readonly pools: ReadonlyMap<string, LiquidityPool>,
    private readonly pairIndex: ReadonlyMap<string, readonly string[]>,
    private readonly tokenIndex: ReadonlyMap<string, readonly string[]>,
    public readonly takenAt: number
  ) {}

  public get(tokenA: Token, tokenB: Token): LiquidityPool[] {
    const addresses = this.pairIndex.get(pairKey(tokenA, tokenB)) ?? [];
    return this.resolve(addresses);
  }

  public getPool(address: string): LiquidityPool | undefined {
    return this.pools.get(normalizeAddress(address));
  }

  public getPoolsForToken(token: Token): LiquidityPool[] {
    const addresses = this.tokenIndex.get(normalizeAddress(token.address)) ?? [];
    return this.resolve(addresses);
  }

  public get size(): number {
    return this.pools.size;
  }

  /**
   * Returns a new snapshot in which `overrides` replace the records with the
   * same address. Indexes are unchanged: overrides only carry fresher reserves.
   */
  public withOverrides(overrides: LiquidityPool[]): PoolSnapshot {
    if (overrides.length === 0) return this;
    const pools = new Map(this.pools);
    for (const pool of overrides) {
      const key = normalizeAddress(pool.address);
      if (pools.has(key)) {
        pools.set(key, pool);
      }
    }
    return new PoolSnapshot(pools, this.pairIndex, this.tokenIndex, this.takenAt);
  }

  private resolve(addresses: readonly string[]): LiquidityPool[] {
    const result: LiquidityPool[] = [];
    for (const address of addresses) {
      const pool = this.pools.get(address);
      if (pool) result.push(pool);
    }
    return result;
  }
}

/**
 * In-memory store of every known liquidity pool, keyed by address and indexed
 * by unordered token pair. Written only by PoolStateRefresher; everything else
 * reads through `snapshot()`.
 *
 * The registry does not judge freshness: `lastRefreshed` on each record is
 * what the quote layer compares against its staleness threshold.
 */
export class PoolRegistry implements PoolView {
  private pools: Map<string, LiquidityPool> = new Map();
  private pairIndex: Map<string, Set<string>> = new Map();
  private tokenIndex: Map<string, Set<string>> = new Map();

  /**
   * Order-independent pair lookup.
   * @returns Pools serving the pair, sorted by address.
   */
  public get(tokenA: Token, tokenB: Token): LiquidityPool[] {
    const addresses = this.pairIndex.get(pairKey(tokenA, tokenB));
    if (!addresses) return [];
    return this.resolve(addresses);
  }

  public getPool(address: string): LiquidityPool | undefined {
    return this.pools.get(normalizeAddress(address));
  }

  public getPoolsForToken(token: Token): LiquidityPool[] {
    const addresses = this.tokenIndex.get(normalizeAddress(token.address));
    if (!addresses) return [];
    return this.resolve(addresses);
  }

  public get size(): number {
    return this.pools.size;
  }

  /**
   * Replaces the pool's record in one step. The stored record is frozen so
   * snapshots can share it safely.
   */
  public upsert(pool: LiquidityPool): void {
    if (pool.reserveA < 0n || pool.reserveB < 0n) {
      throw new Error(`Pool ${pool.address} has negative reserves`);
    }
    const key = normalizeAddress(pool.address);
    const previous = this.pools.get(key);
    if (previous && pairKey(previous.tokenA, previous.tokenB) !== pairKey(pool.tokenA, pool.tokenB)) {
      this.unindex(key, previous);
    }

    this.pools.set(key, Object.freeze({ ...pool }));
    this.index(key, pool);
  }

  /**
   * Removes a pool from the registry.
   * @returns true if the pool was known.
   */
  public evict(address: string): boolean {
    const key = normalizeAddress(address);
    const pool = this.pools.get(key);
    if (!pool) return false;
    this.pools.delete(key);
    this.unindex(key, pool);
    return true;
  }

  public snapshot(): PoolSnapshot {
    return new PoolSnapshot(
      new Map(this.pools),
      this.freezeIndex(this.pairIndex),
      this.freezeIndex(this.tokenIndex),
      Date.now()
    );
  }

  private index(key: string, pool: LiquidityPool): void {
    this.addTo(this.pairIndex, pairKey(pool.tokenA, pool.tokenB), key);
    this.addTo(this.tokenIndex, normalizeAddress(pool.tokenA.address), key);
    this.addTo(this.tokenIndex, normalizeAddress(pool.tokenB.address), key);
  }

  private unindex(key: string, pool: LiquidityPool): void {
    this.removeFrom(this.pairIndex, pairKey(pool.tokenA, pool.tokenB), key);
    this.removeFrom(this.tokenIndex, normalizeAddress(pool.tokenA.address), key);
    this.removeFrom(this.tokenIndex, normalizeAddress(pool.tokenB.address), key);
  }

  private addTo(index: Map<string, Set<string>>, indexKey: string, poolKey: string): void {
    let entries = index.get(indexKey);
    if (!entries) {
      entries = new Set();
      index.set(indexKey, entries);
    }
    entries.add(poolKey);
  }

  private removeFrom(index: Map<string, Set<string>>, indexKey: string, poolKey: string): void {
    const entries = index.get(indexKey);
    if (!entries) return;
    entries.delete(poolKey);
    if (entries.size === 0) index.delete(indexKey);
  }

  private freezeIndex(index: Map<string, Set<string>>): Map<string, readonly string[]> {
    const copy = new Map<string, readonly string[]>();
    index.forEach((entries, key) => {
      copy.set(key, Array.from(entries).sort());
    });
    return copy;
  }

  private resolve(addresses: Iterable<string>): LiquidityPool[] {
    const result: LiquidityPool[] = [];
    for (const address of Array.from(addresses).sort()) {
      const pool = this.pools.get(address);
      if (pool) result.push(pool);
    }
    return result;
  }
}

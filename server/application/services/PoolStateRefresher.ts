/**
 * PoolStateRefresher - Single-writer for the PoolRegistry
 *
 * RESPONSIBILITY:
 * - Fetch current reserves from the Chain/RPC client and upsert them
 * - Coalesce concurrent refreshes of the same pool into ONE upstream call
 * - Discover the pools serving a pair and evict pools that stop being listed
 * - Optionally keep watched pairs warm with a background loop
 *
 * SINGLE-FLIGHT:
 * - `inFlight` is the pending-request table, keyed by lower-cased pool address
 * - The first caller starts the fetch; later callers attach to the same promise
 * - The entry is dropped when the fetch settles, success or failure
 * - Aborting a caller's signal only releases that caller
 *
 * FAILURE:
 * - Upstream errors surface as DataFeedUnavailableError
 * - The previous record stays in the registry with its older lastRefreshed
 */

import { PoolRegistry } from './PoolRegistry';
import {
  ChainClient,
  LiquidityPool,
  PoolStateResponse,
  Token,
  describeToken,
  normalizeAddress,
  pairKey,
} from '../../domain/types';
import { DataFeedUnavailableError } from '../../domain/errors';
import { raceAbort } from '../utils/abort';
import { timingConfig } from '../../infrastructure/config/TimingConfig';

export interface PoolStateRefresherOptions {
  refreshIntervalMs?: number;
  evictionMissedCycles?: number;
}

export type RefreshOutcome =
  | { address: string; ok: true; pool: LiquidityPool }
  | { address: string; ok: false; error: Error };

export interface PairSyncResult {
  pair: string;
  listed: number;
  refreshed: number;
  failed: number;
  evicted: string[];
  skipped: boolean; // listing failed, nothing counted
}

interface WatchedPair {
  tokenA: Token;
  tokenB: Token;
}

export class PoolStateRefresher {
  private inFlight: Map<string, Promise<LiquidityPool>> = new Map();
  private missCounts: Map<string, number> = new Map();
  private watchedPairs: Map<string, WatchedPair> = new Map();

  private isRunning = false;
  private loopTimer: NodeJS.Timeout | null = null;
  private upstreamCalls = 0;
  private lastCycleDurationMs = 0;

  private readonly refreshIntervalMs: number;
  private readonly evictionMissedCycles: number;

  constructor(
    private readonly registry: PoolRegistry,
    private readonly chainClient: ChainClient,
    options: PoolStateRefresherOptions = {}
  ) {
    this.refreshIntervalMs = options.refreshIntervalMs ?? timingConfig.POOL_REFRESH_INTERVAL_MS;
    this.evictionMissedCycles = Math.max(1, options.evictionMissedCycles ?? timingConfig.POOL_EVICTION_MISSED_CYCLES);
  }

  /**
   * Refresh one pool. Concurrent calls for the same pool share one upstream fetch.
   *
   * @param signal Releases this caller only; the shared fetch keeps running.
   * @throws DataFeedUnavailableError when the upstream fetch fails
   */
  public refreshPool(address: string, signal?: AbortSignal): Promise<LiquidityPool> {
    const key = normalizeAddress(address);
    let pending = this.inFlight.get(key);

    if (!pending) {
      pending = this.fetchAndStore(address);
      this.inFlight.set(key, pending);
      const release = () => {
        this.inFlight.delete(key);
      };
      pending.then(release, release);
    }

    return raceAbort(pending, signal);
  }

  /**
   * Refresh several pools in parallel. Never rejects; each pool reports its own outcome.
   */
  public async refreshPools(addresses: string[], signal?: AbortSignal): Promise<RefreshOutcome[]> {
    const unique = Array.from(new Map(addresses.map(a => [normalizeAddress(a), a])).values());
    const settled = await Promise.allSettled(unique.map(address => this.refreshPool(address, signal)));

    return settled.map((result, i): RefreshOutcome => {
      if (result.status === 'fulfilled') {
        return { address: unique[i], ok: true, pool: result.value };
      }
      const reason: unknown = result.reason;
      return {
        address: unique[i],
        ok: false,
        error: reason instanceof Error ? reason : new Error(String(reason)),
      };
    });
  }

  /**
   * Discover the pools serving a pair, refresh all of them, and count a miss
   * for every known pool of the pair that was not listed. A pool missing for
   * `evictionMissedCycles` consecutive cycles is evicted.
   */
  public async syncPair(tokenA: Token, tokenB: Token): Promise<PairSyncResult> {
    const pair = `${describeToken(tokenA)}/${describeToken(tokenB)}`;

    let listed: string[];
    try {
      listed = await this.chainClient.listPoolsForPair(tokenA, tokenB);
    } catch (error) {
      console.warn(`⚠️ [REFRESHER] Pool listing failed for ${pair}, skipping cycle:`, error instanceof Error ? error.message : error);
      return { pair, listed: 0, refreshed: 0, failed: 0, evicted: [], skipped: true };
    }

    const listedKeys = new Set(listed.map(normalizeAddress));
    const outcomes = await this.refreshPools(listed);
    const failed = outcomes.filter(o => !o.ok).length;

    for (const key of listedKeys) {
      this.missCounts.delete(key);
    }

    const evicted: string[] = [];
    for (const pool of this.registry.get(tokenA, tokenB)) {
      const key = normalizeAddress(pool.address);
      if (listedKeys.has(key)) continue;

      const misses = (this.missCounts.get(key) ?? 0) + 1;
      if (misses >= this.evictionMissedCycles) {
        this.registry.evict(pool.address);
        this.missCounts.delete(key);
        evicted.push(pool.address);
        console.log(`🗑️ [REFRESHER] Evicted ${pool.address.slice(0, 10)}... (${pair}) after ${misses} missed cycle(s)`);
      } else {
        this.missCounts.set(key, misses);
      }
    }

    return { pair, listed: listedKeys.size, refreshed: outcomes.length - failed, failed, evicted, skipped: false };
  }

  public watchPair(tokenA: Token, tokenB: Token): void {
    this.watchedPairs.set(pairKey(tokenA, tokenB), { tokenA, tokenB });
  }

  public unwatchPair(tokenA: Token, tokenB: Token): void {
    this.watchedPairs.delete(pairKey(tokenA, tokenB));
  }

  /**
   * One discovery/refresh pass over every watched pair.
   */
  public async runCycle(): Promise<PairSyncResult[]> {
    const startTime = Date.now();
    const pairs = Array.from(this.watchedPairs.values());
    const results = await Promise.all(pairs.map(p => this.syncPair(p.tokenA, p.tokenB)));
    this.lastCycleDurationMs = Date.now() - startTime;

    const refreshed = results.reduce((sum, r) => sum + r.refreshed, 0);
    const failed = results.reduce((sum, r) => sum + r.failed, 0);
    console.log(`⚡ [REFRESHER] Cycle complete: ${pairs.length} pair(s), ${refreshed} pool(s) refreshed, ${failed} failed in ${this.lastCycleDurationMs}ms`);
    return results;
  }

  /**
   * Start the background loop. Each cycle is scheduled after the previous one settles.
   */
  public start(): void {
    if (this.isRunning) {
      console.log('⚠️ [REFRESHER] Already running');
      return;
    }

    console.log(`🚀 [REFRESHER] Starting background refresh (every ${this.refreshIntervalMs}ms, ${this.watchedPairs.size} pair(s))`);
    this.isRunning = true;

    const scheduleNext = (delayMs: number) => {
      if (!this.isRunning) return;
      this.loopTimer = setTimeout(() => {
        void this.runCycle()
          .catch(error => {
            console.error('❌ [REFRESHER] Error in refresh cycle:', error);
          })
          .finally(() => {
            scheduleNext(this.refreshIntervalMs);
          });
      }, delayMs);
    };

    scheduleNext(0);
  }

  public stop(): void {
    if (!this.isRunning) return;
    if (this.loopTimer) {
      clearTimeout(this.loopTimer);
      this.loopTimer = null;
    }
    this.isRunning = false;
    console.log('🛑 [REFRESHER] Stopped');
  }

  public isActive(): boolean {
    return this.isRunning;
  }

  public getStats() {
    return {
      isRunning: this.isRunning,
      registeredPools: this.registry.size,
      watchedPairs: this.watchedPairs.size,
      inFlightRefreshes: this.inFlight.size,
      upstreamCalls: this.upstreamCalls,
      poolsPendingEviction: this.missCounts.size,
      refreshIntervalMs: this.refreshIntervalMs,
      lastCycleDurationMs: this.lastCycleDurationMs,
    };
  }

  private async fetchAndStore(address: string): Promise<LiquidityPool> {
    this.upstreamCalls++;

    let state: PoolStateResponse;
    try {
      state = await this.chainClient.fetchPoolState(address);
    } catch (error) {
      console.warn(`⚠️ [REFRESHER] Fetch failed for ${address.slice(0, 10)}..., keeping cached state`);
      throw new DataFeedUnavailableError(address, error);
    }

    if (state.reserveA < 0n || state.reserveB < 0n || state.feeBps < 0 || state.feeBps >= 10000) {
      throw new DataFeedUnavailableError(address, new Error('Malformed pool state (negative reserve or fee out of range)'));
    }

    const pool: LiquidityPool = Object.freeze({
      address,
      tokenA: state.tokenA,
      tokenB: state.tokenB,
      reserveA: state.reserveA,
      reserveB: state.reserveB,
      feeBps: state.feeBps,
      curve: state.curve,
      lastRefreshed: Date.now(),
    });
    this.registry.upsert(pool);
    return pool;
  }
}

/**
 * QuoteAggregator - Orchestrates one quote request
 *
 * FLOW:
 * 1. Validate (zero amount first, then slippage / hop bounds)
 * 2. Start the request deadline (request-scoped AbortController)
 * 3. Snapshot the registry, ask RouteFinder for candidates; when none exist,
 *    discover the pairs the tokens could trade through and search again
 * 4. Simulate candidates whose pools are all fresh
 * 5. Refresh the stale pools of the remaining candidates; each candidate is
 *    simulated as soon as its own pools settle, against the snapshot overlaid
 *    with this request's refresh results
 * 6. Select the best simulation, apply slippage, check balance and oracle
 *
 * A candidate failing on its own never fails the request; only when every
 * candidate failed does an error surface.
 */

import { formatUnits, parseUnits } from 'ethers';
import { PoolRegistry, PoolSnapshot } from './PoolRegistry';
import { PoolStateRefresher } from './PoolStateRefresher';
import { RouteFinder } from './RouteFinder';
import { SwapSimulator } from './SwapSimulator';
import {
  BalanceProvider,
  LiquidityPool,
  PriceCheck,
  PriceOracle,
  Quote,
  QuoteRequest,
  Route,
  SwapSimulation,
  Token,
  describeToken,
  normalizeAddress,
  pairKey,
  sameToken,
} from '../../domain/types';
import {
  InsufficientLiquidityError,
  InvalidQuoteRequestError,
  NoRouteFoundError,
  QuoteTimeoutError,
  StaleDataRejectedError,
  ZeroAmountError,
} from '../../domain/errors';
import { BASIS_POINTS_DIVISOR, fractionToNumber } from '../../domain/curves/fraction';
import { createRequestController, raceAbort } from '../utils/abort';
import { routingConfig } from '../../infrastructure/config/RoutingConfig';
import { timingConfig } from '../../infrastructure/config/TimingConfig';

export interface QuoteAggregatorOptions {
  deadlineMs?: number;
  stalenessThresholdMs?: number;
  maxCandidates?: number;
  maxFrontierNodes?: number;
  oracleMaxDeviation?: number;
  /** Tokens paired with both sides of a request during on-demand discovery */
  baseTokens?: Token[];
}

export interface QuoteCollaborators {
  balanceProvider?: BalanceProvider;
  priceOracle?: PriceOracle;
}

export interface QuoteCallOptions {
  deadlineMs?: number;
}

interface Candidate {
  route: Route;
  rank: number;
  stalePools: string[];
}

interface RankedSimulation {
  simulation: SwapSimulation;
  rank: number;
}

interface EvaluationState {
  results: RankedSimulation[];
  evaluated: number;
  liquidityFailures: InsufficientLiquidityError[];
  stalePools: Set<string>;
  partial: boolean;
}

export class QuoteAggregator {
  private readonly deadlineMs: number;
  private readonly stalenessThresholdMs: number;
  private readonly maxCandidates: number;
  private readonly maxFrontierNodes: number;
  private readonly oracleMaxDeviation: number;
  private readonly baseTokens: Token[];

  constructor(
    private readonly registry: PoolRegistry,
    private readonly refresher: PoolStateRefresher,
    private readonly routeFinder: RouteFinder,
    private readonly simulator: SwapSimulator,
    private readonly collaborators: QuoteCollaborators = {},
    options: QuoteAggregatorOptions = {}
  ) {
    this.deadlineMs = options.deadlineMs ?? timingConfig.QUOTE_DEADLINE_MS;
    this.stalenessThresholdMs = options.stalenessThresholdMs ?? timingConfig.STALENESS_THRESHOLD_MS;
    this.maxCandidates = options.maxCandidates ?? routingConfig.MAX_ROUTE_CANDIDATES;
    this.maxFrontierNodes = options.maxFrontierNodes ?? routingConfig.MAX_FRONTIER_NODES;
    this.oracleMaxDeviation = options.oracleMaxDeviation ?? routingConfig.ORACLE_MAX_DEVIATION;
    this.baseTokens = options.baseTokens ?? [];
  }

  /**
   * Best executable quote for the request.
   *
   * @throws ZeroAmountError, InvalidQuoteRequestError before any work is done
   * @throws NoRouteFoundError when no candidate route exists
   * @throws InsufficientLiquidityError, StaleDataRejectedError or QuoteTimeoutError
   *         when every candidate failed (in that order of precedence)
   */
  public async quote(request: QuoteRequest, options: QuoteCallOptions = {}): Promise<Quote> {
    this.validate(request);

    const deadlineMs = options.deadlineMs ?? this.deadlineMs;
    const controller = createRequestController();
    const deadlineAt = Date.now() + deadlineMs;
    const timer = setTimeout(() => controller.abort(new QuoteTimeoutError(deadlineMs)), deadlineMs);

    try {
      return await this.execute(request, controller.signal, deadlineAt, deadlineMs);
    } finally {
      clearTimeout(timer);
    }
  }

  private validate(request: QuoteRequest): void {
    if (request.amountIn <= 0n) {
      throw new ZeroAmountError(request.amountIn);
    }

    const slippage = request.slippageToleranceBps;
    if (!Number.isInteger(slippage) || slippage < 0 || slippage > 10000) {
      throw new InvalidQuoteRequestError(
        `slippageToleranceBps must be an integer between 0 and 10000 (got ${slippage})`,
        'slippageToleranceBps'
      );
    }

    const maxHops = request.maxHops;
    if (maxHops !== undefined && (!Number.isInteger(maxHops) || maxHops < 1 || maxHops > routingConfig.MAX_HOPS_LIMIT)) {
      throw new InvalidQuoteRequestError(
        `maxHops must be an integer between 1 and ${routingConfig.MAX_HOPS_LIMIT} (got ${maxHops})`,
        'maxHops'
      );
    }
  }

  private async execute(
    request: QuoteRequest,
    signal: AbortSignal,
    deadlineAt: number,
    deadlineMs: number
  ): Promise<Quote> {
    const startTime = Date.now();
    const { sourceToken, destinationToken, amountIn } = request;

    let snapshot = this.registry.snapshot();
    let routes: Route[];
    try {
      routes = this.findRoutes(request, snapshot);
    } catch (error) {
      if (!(error instanceof NoRouteFoundError)) throw error;
      const discovered = await this.discoverPairs(sourceToken, destinationToken, signal);
      if (discovered === 0) throw error;
      snapshot = this.registry.snapshot();
      routes = this.findRoutes(request, snapshot);
    }

    const ready: Candidate[] = [];
    const pending: Candidate[] = [];
    routes.forEach((route, rank) => {
      const stalePools = route.pools.filter(pool => this.isStale(pool, snapshot.takenAt)).map(pool => pool.address);
      (stalePools.length === 0 ? ready : pending).push({ route, rank, stalePools });
    });

    const state: EvaluationState = {
      results: [],
      evaluated: 0,
      liquidityFailures: [],
      stalePools: new Set(),
      partial: false,
    };

    for (const candidate of ready) {
      if (!this.evaluate(candidate.route, candidate.rank, amountIn, state, deadlineAt)) break;
    }

    if (pending.length > 0 && !state.partial) {
      await this.evaluatePending(pending, snapshot, amountIn, state, signal, deadlineAt);
    }

    if (state.results.length === 0) {
      throw this.aggregateFailure(state, deadlineMs);
    }

    const best = state.results.sort((a, b) => this.compare(a, b))[0].simulation;

    const [executable, priceCheck] = await Promise.all([
      request.walletId ? this.checkBalance(request.walletId, sourceToken, amountIn, signal) : Promise.resolve(undefined),
      this.checkPrice(sourceToken, destinationToken, amountIn, best.amountOut, signal),
    ]);

    const quote: Quote = {
      sourceToken,
      destinationToken,
      amountIn,
      amountOut: best.amountOut,
      route: best.route,
      hops: best.hops,
      priceImpact: best.priceImpact,
      totalFee: best.totalFee,
      minimumAmountOut:
        (best.amountOut * (BASIS_POINTS_DIVISOR - BigInt(request.slippageToleranceBps))) / BASIS_POINTS_DIVISOR,
      slippageToleranceBps: request.slippageToleranceBps,
      candidatesEvaluated: state.evaluated,
      partial: state.partial,
    };
    if (executable !== undefined) quote.executable = executable;
    if (priceCheck) quote.priceCheck = priceCheck;

    console.log(
      `💱 [QUOTE] ${describeToken(sourceToken)} -> ${describeToken(destinationToken)}: ` +
      `${routes.length} candidate(s), ${state.evaluated} simulated, best ${best.hops.length} hop(s)` +
      `${state.partial ? ' (partial)' : ''} in ${Date.now() - startTime}ms`
    );

    return quote;
  }

  private findRoutes(request: QuoteRequest, snapshot: PoolSnapshot): Route[] {
    return this.routeFinder.findRoutes(request.sourceToken, request.destinationToken, snapshot, {
      maxHops: request.maxHops ?? routingConfig.DEFAULT_MAX_HOPS,
      maxCandidates: this.maxCandidates,
      maxFrontierNodes: this.maxFrontierNodes,
    });
  }

  /**
   * Syncs the pair itself and each side against every base token. Pairs that
   * list at least one pool are watched so the background loop keeps them warm.
   *
   * @returns how many pairs listed a pool
   */
  private async discoverPairs(source: Token, destination: Token, signal: AbortSignal): Promise<number> {
    if (sameToken(source, destination)) return 0;

    const pairs = new Map<string, [Token, Token]>();
    const addPair = (a: Token, b: Token) => {
      if (!sameToken(a, b)) pairs.set(pairKey(a, b), [a, b]);
    };
    addPair(source, destination);
    for (const base of this.baseTokens) {
      addPair(source, base);
      addPair(destination, base);
    }

    const candidates = Array.from(pairs.values());
    console.log(`🔍 [QUOTE] No known route for ${describeToken(source)} -> ${describeToken(destination)}, discovering ${candidates.length} pair(s)`);

    const results = await raceAbort(
      Promise.all(candidates.map(([a, b]) => this.refresher.syncPair(a, b))),
      signal
    );

    let discovered = 0;
    results.forEach((result, i) => {
      if (result.listed === 0) return;
      const [a, b] = candidates[i];
      this.refresher.watchPair(a, b);
      discovered++;
    });
    return discovered;
  }

  private async evaluatePending(
    pending: Candidate[],
    snapshot: PoolSnapshot,
    amountIn: bigint,
    state: EvaluationState,
    signal: AbortSignal,
    deadlineAt: number
  ): Promise<void> {
    const addresses = new Set(pending.flatMap(c => c.stalePools.map(normalizeAddress)));
    console.log(`🔄 [QUOTE] Refreshing ${addresses.size} stale pool(s) for ${pending.length} candidate(s)`);

    await Promise.all(
      pending.map(candidate => this.evaluateWhenRefreshed(candidate, snapshot, amountIn, state, signal, deadlineAt))
    );
  }

  /**
   * Waits for this candidate's stale pools only, then simulates it. A refresh
   * shared with other candidates is fetched once by the refresher.
   */
  private async evaluateWhenRefreshed(
    candidate: Candidate,
    snapshot: PoolSnapshot,
    amountIn: bigint,
    state: EvaluationState,
    signal: AbortSignal,
    deadlineAt: number
  ): Promise<void> {
    const settled = await Promise.allSettled(
      candidate.stalePools.map(address => this.refresher.refreshPool(address, signal))
    );

    if (signal.aborted) {
      state.partial = true;
      return;
    }

    const refreshed: LiquidityPool[] = [];
    const failedPools: string[] = [];
    settled.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        refreshed.push(result.value);
      } else {
        failedPools.push(candidate.stalePools[i]);
      }
    });

    if (failedPools.length > 0) {
      failedPools.forEach(address => state.stalePools.add(address));
      return;
    }

    const view = snapshot.withOverrides(refreshed);
    const route: Route = {
      tokens: candidate.route.tokens,
      pools: candidate.route.pools.map(pool => view.getPool(pool.address) ?? pool),
    };
    this.evaluate(route, candidate.rank, amountIn, state, deadlineAt);
  }

  /**
   * Simulates one candidate. Returns false once the deadline has passed.
   */
  private evaluate(route: Route, rank: number, amountIn: bigint, state: EvaluationState, deadlineAt: number): boolean {
    if (Date.now() >= deadlineAt) {
      state.partial = true;
      return false;
    }

    state.evaluated++;
    try {
      state.results.push({ simulation: this.simulator.simulate(route, amountIn), rank });
    } catch (error) {
      if (!(error instanceof InsufficientLiquidityError)) throw error;
      state.liquidityFailures.push(error);
    }
    return true;
  }

  private aggregateFailure(state: EvaluationState, deadlineMs: number): Error {
    if (state.liquidityFailures.length > 0) {
      return state.liquidityFailures[0];
    }
    if (state.stalePools.size > 0) {
      return new StaleDataRejectedError(Array.from(state.stalePools));
    }
    return new QuoteTimeoutError(deadlineMs);
  }

  private compare(a: RankedSimulation, b: RankedSimulation): number {
    if (a.simulation.amountOut !== b.simulation.amountOut) {
      return a.simulation.amountOut > b.simulation.amountOut ? -1 : 1;
    }
    if (a.simulation.hops.length !== b.simulation.hops.length) {
      return a.simulation.hops.length - b.simulation.hops.length;
    }
    if (a.simulation.priceImpact !== b.simulation.priceImpact) {
      return a.simulation.priceImpact - b.simulation.priceImpact;
    }
    return a.rank - b.rank;
  }

  private isStale(pool: LiquidityPool, now: number): boolean {
    return now - pool.lastRefreshed > this.stalenessThresholdMs;
  }

  /**
   * Returns undefined when no provider is configured or the lookup fails;
   * a balance problem never fails the quote.
   */
  private async checkBalance(
    walletId: string,
    token: Token,
    amountIn: bigint,
    signal: AbortSignal
  ): Promise<boolean | undefined> {
    const provider = this.collaborators.balanceProvider;
    if (!provider || signal.aborted) return undefined;

    try {
      const balance = await raceAbort(provider.getBalance(walletId, token), signal);
      return balance >= amountIn;
    } catch (error) {
      console.warn(`⚠️ [QUOTE] Balance check skipped for ${walletId}:`, error instanceof Error ? error.message : error);
      return undefined;
    }
  }

  private async checkPrice(
    sourceToken: Token,
    destinationToken: Token,
    amountIn: bigint,
    amountOut: bigint,
    signal: AbortSignal
  ): Promise<PriceCheck | undefined> {
    const oracle = this.collaborators.priceOracle;
    if (!oracle || signal.aborted) return undefined;

    try {
      const [sourcePriceUsd, destinationPriceUsd] = await raceAbort(
        Promise.all([oracle.spotPrice(sourceToken), oracle.spotPrice(destinationToken)]),
        signal
      );
      if (!(sourcePriceUsd > 0) || !(destinationPriceUsd > 0)) return undefined;

      const referenceWhole = (Number(formatUnits(amountIn, sourceToken.decimals)) * sourcePriceUsd) / destinationPriceUsd;
      const referenceAmountOut = parseUnits(
        referenceWhole.toFixed(destinationToken.decimals),
        destinationToken.decimals
      );
      if (referenceAmountOut <= 0n) return undefined;

      const deviation = 1 - fractionToNumber({ numerator: amountOut, denominator: referenceAmountOut });
      return {
        sourcePriceUsd,
        destinationPriceUsd,
        referenceAmountOut,
        deviation,
        withinBounds: deviation <= this.oracleMaxDeviation,
      };
    } catch (error) {
      console.warn('⚠️ [QUOTE] Price check skipped:', error instanceof Error ? error.message : error);
      return undefined;
    }
  }
}

/**
 * Immutable token identity. Two tokens are the same token when their
 * addresses match case-insensitively (see `sameToken`).
 */
export interface Token {
  address: string;
  decimals: number;
  symbol?: string;
  name?: string;
  logoURI?: string;
  coingeckoId?: string; // Used by the price oracle only
}

/**
 * Pricing curve of a pool. Each variant carries exactly what its formula needs.
 */
export type PoolCurve =
  | { type: "constant-product" }
  | { type: "stable-swap"; amplification: number };

/**
 * Live state of a liquidity pool as last observed on-chain.
 * Records are frozen; a refresh replaces the whole record.
 */
export interface LiquidityPool {
  address: string;
  tokenA: Token;
  tokenB: Token;
  reserveA: bigint;
  reserveB: bigint;
  feeBps: number;
  curve: PoolCurve;
  lastRefreshed: number; // epoch ms of the fetch that produced this record
}

/**
 * An ordered path through pools. `tokens[i]` -> `tokens[i + 1]` goes through `pools[i]`.
 */
export interface Route {
  tokens: Token[];
  pools: LiquidityPool[];
}

export interface HopSimulation {
  poolAddress: string;
  tokenIn: Token;
  tokenOut: Token;
  amountIn: bigint;
  feeAmount: bigint;
  effectiveInput: bigint;
  amountOut: bigint;
  spotPrice: number; // marginal output per unit input, in base units
  executionPrice: number; // amountOut / effectiveInput
  priceImpact: number; // fraction, 0..1
}

export interface SwapSimulation {
  route: Route;
  amountIn: bigint;
  amountOut: bigint;
  hops: HopSimulation[];
  priceImpact: number;
  totalFee: bigint; // in source token base units
}

/**
 * Optional comparison of the simulated rate against reference oracle prices.
 */
export interface PriceCheck {
  sourcePriceUsd: number;
  destinationPriceUsd: number;
  referenceAmountOut: bigint;
  deviation: number; // 1 - amountOut / referenceAmountOut; negative when better than reference
  withinBounds: boolean;
}

export interface Quote {
  sourceToken: Token;
  destinationToken: Token;
  amountIn: bigint;
  amountOut: bigint;
  route: Route;
  hops: HopSimulation[];
  priceImpact: number;
  totalFee: bigint;
  minimumAmountOut: bigint;
  slippageToleranceBps: number;
  executable?: boolean; // only present when a balance check ran and succeeded
  candidatesEvaluated: number;
  partial: boolean; // deadline expired before every candidate was evaluated
  priceCheck?: PriceCheck;
}

export interface QuoteRequest {
  sourceToken: Token;
  destinationToken: Token;
  amountIn: bigint;
  slippageToleranceBps: number;
  maxHops?: number;
  walletId?: string;
}

/**
 * Read-only balance snapshot, valid for one request only.
 */
export interface WalletBalance {
  walletId: string;
  token: Token;
  amount: bigint;
}

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

export interface PoolStateResponse {
  tokenA: Token;
  tokenB: Token;
  reserveA: bigint;
  reserveB: bigint;
  feeBps: number;
  curve: PoolCurve;
}

/**
 * Source of pool reserve data. Retry policy belongs to implementations.
 */
export interface ChainClient {
  fetchPoolState(poolAddress: string): Promise<PoolStateResponse>;
  listPoolsForPair(tokenA: Token, tokenB: Token): Promise<string[]>;
}

export interface BalanceProvider {
  getBalance(walletId: string, token: Token): Promise<bigint>;
}

export interface PriceOracle {
  spotPrice(token: Token): Promise<number>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function normalizeAddress(address: string): string {
  return address.toLowerCase();
}

export function sameToken(a: Token, b: Token): boolean {
  return normalizeAddress(a.address) === normalizeAddress(b.address);
}

/**
 * Order-independent key for a token pair.
 */
export function pairKey(a: Token, b: Token): string {
  const x = normalizeAddress(a.address);
  const y = normalizeAddress(b.address);
  return x < y ? `${x}:${y}` : `${y}:${x}`;
}

/**
 * Orients a pool for a trade entering with `tokenIn`.
 */
export function orientPool(
  pool: LiquidityPool,
  tokenIn: Token
): { tokenOut: Token; reserveIn: bigint; reserveOut: bigint } {
  if (sameToken(pool.tokenA, tokenIn)) {
    return { tokenOut: pool.tokenB, reserveIn: pool.reserveA, reserveOut: pool.reserveB };
  }
  if (sameToken(pool.tokenB, tokenIn)) {
    return { tokenOut: pool.tokenA, reserveIn: pool.reserveB, reserveOut: pool.reserveA };
  }
  throw new Error(`Pool ${pool.address} does not trade ${tokenIn.address}`);
}

export function describeToken(token: Token): string {
  return token.symbol ?? `${token.address.slice(0, 8)}...`;
}

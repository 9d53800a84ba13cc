/**
 * Error taxonomy for quote requests.
 *
 * Every error carries a stable `code` that the HTTP layer maps to a status,
 * and a `retryable` hint for callers. Candidate-local failures (e.g. one pool
 * that cannot absorb the size) are absorbed by the aggregator; these classes
 * only reach the caller when the whole request fails.
 */

export type QuoteErrorCode =
  | "NO_ROUTE_FOUND"
  | "INSUFFICIENT_LIQUIDITY"
  | "ZERO_AMOUNT"
  | "DATA_FEED_UNAVAILABLE"
  | "STALE_DATA_REJECTED"
  | "QUOTE_TIMEOUT"
  | "BALANCE_LOOKUP_FAILED"
  | "INVALID_REQUEST"
  | "TOKEN_NOT_FOUND"
  | "AMBIGUOUS_TOKEN";

export class QuoteError extends Error {
  constructor(
    message: string,
    public readonly code: QuoteErrorCode,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = "QuoteError";
    // Keep instanceof working across module boundaries
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NoRouteFoundError extends QuoteError {
  constructor(
    public readonly sourceAddress: string,
    public readonly destinationAddress: string,
    public readonly maxHops: number
  ) {
    super(
      `No route from ${sourceAddress} to ${destinationAddress} within ${maxHops} hop(s)`,
      "NO_ROUTE_FOUND"
    );
    this.name = "NoRouteFoundError";
  }
}

export class InsufficientLiquidityError extends QuoteError {
  constructor(public readonly poolAddress: string, reason: string) {
    super(`Pool ${poolAddress} cannot absorb the trade: ${reason}`, "INSUFFICIENT_LIQUIDITY");
    this.name = "InsufficientLiquidityError";
  }
}

export class ZeroAmountError extends QuoteError {
  constructor(amount: bigint) {
    super(`Input amount must be strictly positive (got ${amount.toString()})`, "ZERO_AMOUNT");
    this.name = "ZeroAmountError";
  }
}

export class DataFeedUnavailableError extends QuoteError {
  constructor(public readonly poolAddress: string, public readonly upstreamError?: unknown) {
    super(
      `Pool state feed unavailable for ${poolAddress}${upstreamError instanceof Error ? `: ${upstreamError.message}` : ""}`,
      "DATA_FEED_UNAVAILABLE",
      true
    );
    this.name = "DataFeedUnavailableError";
  }
}

export class StaleDataRejectedError extends QuoteError {
  constructor(public readonly stalePools: string[]) {
    super(
      `No route could be formed from sufficiently fresh pool data (${stalePools.length} pool(s) failed to refresh)`,
      "STALE_DATA_REJECTED",
      true
    );
    this.name = "StaleDataRejectedError";
  }
}

export class QuoteTimeoutError extends QuoteError {
  constructor(public readonly timeoutMs: number) {
    super(`Quote deadline of ${timeoutMs}ms expired before any candidate completed`, "QUOTE_TIMEOUT", true);
    this.name = "QuoteTimeoutError";
  }
}

export class BalanceLookupError extends QuoteError {
  constructor(public readonly walletId: string, public readonly tokenAddress: string, public readonly upstreamError?: unknown) {
    super(
      `Balance lookup failed for ${walletId} / ${tokenAddress}${upstreamError instanceof Error ? `: ${upstreamError.message}` : ""}`,
      "BALANCE_LOOKUP_FAILED",
      true
    );
    this.name = "BalanceLookupError";
  }
}

export class InvalidQuoteRequestError extends QuoteError {
  constructor(message: string, public readonly field?: string) {
    super(message, "INVALID_REQUEST");
    this.name = "InvalidQuoteRequestError";
  }
}

export class TokenResolutionError extends QuoteError {
  constructor(
    public readonly identifier: string,
    code: "TOKEN_NOT_FOUND" | "AMBIGUOUS_TOKEN",
    public readonly candidates: string[] = []
  ) {
    super(
      code === "AMBIGUOUS_TOKEN"
        ? `Ambiguous symbol '${identifier}', use the token address instead`
        : `Token '${identifier}' not found`,
      code
    );
    this.name = "TokenResolutionError";
  }
}

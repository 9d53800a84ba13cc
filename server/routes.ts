import type { Express, Response } from "express";
import { ZodError } from "zod";
import {
  balanceQuerySchema,
  quoteRequestSchema,
  tokenSearchQuerySchema,
} from "@shared/schema";
import type {
  BalanceResponse,
  ErrorResponse,
  QuoteDto,
  QuoteRequestBody,
  QuoteResponse,
  TokenDto,
} from "@shared/schema";
import { QuoteAggregator } from "./application/services/QuoteAggregator";
import { TokenRegistry } from "./application/services/TokenRegistry";
import { PoolStateRefresher } from "./application/services/PoolStateRefresher";
import { BalanceProvider, Quote, Token, WalletBalance } from "./domain/types";
import { QuoteError, QuoteErrorCode } from "./domain/errors";
import { getApiCallLogger } from "./infrastructure/logging/ApiCallLogger";

export interface RouteDependencies {
  quoteAggregator: QuoteAggregator;
  tokenRegistry: TokenRegistry;
  refresher: PoolStateRefresher;
  balanceProvider: BalanceProvider;
  rpcStatus?: () => { providers: string[]; counters: Record<number, number> };
}

const STATUS_BY_CODE: Record<QuoteErrorCode, number> = {
  INVALID_REQUEST: 400,
  ZERO_AMOUNT: 400,
  TOKEN_NOT_FOUND: 404,
  NO_ROUTE_FOUND: 404,
  AMBIGUOUS_TOKEN: 422,
  INSUFFICIENT_LIQUIDITY: 422,
  DATA_FEED_UNAVAILABLE: 502,
  BALANCE_LOOKUP_FAILED: 502,
  STALE_DATA_REJECTED: 503,
  QUOTE_TIMEOUT: 504,
};

/**
 * HTTP status and body for any error thrown by a handler.
 */
export function toErrorResponse(error: unknown): { status: number; body: ErrorResponse } {
  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const field = issue?.path.join(".");
    return {
      status: 400,
      body: {
        success: false,
        code: "INVALID_REQUEST",
        message: field ? `${field}: ${issue.message}` : issue?.message ?? "Invalid request",
      },
    };
  }

  if (error instanceof QuoteError) {
    return {
      status: STATUS_BY_CODE[error.code],
      body: { success: false, code: error.code, message: error.message },
    };
  }

  return {
    status: 500,
    body: { success: false, code: "INTERNAL_ERROR", message: "Internal server error" },
  };
}

function toTokenDto(token: Token): TokenDto {
  const dto: TokenDto = { address: token.address, decimals: token.decimals };
  if (token.symbol) dto.symbol = token.symbol;
  if (token.name) dto.name = token.name;
  if (token.logoURI) dto.logoURI = token.logoURI;
  return dto;
}

export function toQuoteDto(quote: Quote, tokens: TokenRegistry): QuoteDto {
  const dto: QuoteDto = {
    inputToken: toTokenDto(quote.sourceToken),
    outputToken: toTokenDto(quote.destinationToken),
    amountIn: quote.amountIn.toString(),
    amountInFormatted: tokens.formatAmount(quote.amountIn, quote.sourceToken),
    amountOut: quote.amountOut.toString(),
    amountOutFormatted: tokens.formatAmount(quote.amountOut, quote.destinationToken),
    minimumAmountOut: quote.minimumAmountOut.toString(),
    minimumAmountOutFormatted: tokens.formatAmount(quote.minimumAmountOut, quote.destinationToken),
    totalFee: quote.totalFee.toString(),
    priceImpact: quote.priceImpact,
    slippageBps: quote.slippageToleranceBps,
    route: quote.route.tokens.map(t => t.symbol ?? t.address),
    pools: quote.route.pools.map(p => p.address),
    hops: quote.hops.map(hop => ({
      pool: hop.poolAddress,
      tokenIn: hop.tokenIn.address,
      tokenOut: hop.tokenOut.address,
      amountIn: hop.amountIn.toString(),
      feeAmount: hop.feeAmount.toString(),
      amountOut: hop.amountOut.toString(),
      spotPrice: hop.spotPrice,
      executionPrice: hop.executionPrice,
      priceImpact: hop.priceImpact,
    })),
    candidatesEvaluated: quote.candidatesEvaluated,
    partial: quote.partial,
  };

  if (quote.executable !== undefined) dto.executable = quote.executable;
  if (quote.priceCheck) {
    dto.priceCheck = {
      ...quote.priceCheck,
      referenceAmountOut: quote.priceCheck.referenceAmountOut.toString(),
    };
  }
  return dto;
}

export function registerRoutes(app: Express, deps: RouteDependencies): Express {
  const { quoteAggregator, tokenRegistry, refresher, balanceProvider, rpcStatus } = deps;
  const apiLogger = getApiCallLogger();

  const sendError = (res: Response, error: unknown, service: string, endpoint: string, startTime: number) => {
    const { status, body } = toErrorResponse(error);
    if (status === 500) {
      console.error(`❌ [API] ${endpoint}:`, error);
    }
    apiLogger.logError(service, endpoint, Date.now() - startTime, body.code);
    res.status(status).json(body);
  };

  /**
   * POST /api/swap/quote
   * Best route and simulated output for selling `amount` of inputToken.
   */
  app.post("/api/swap/quote", async (req, res) => {
    const startTime = Date.now();
    try {
      const body: QuoteRequestBody = quoteRequestSchema.parse(req.body);

      const [inputToken, outputToken] = await Promise.all([
        tokenRegistry.resolve(body.inputToken),
        tokenRegistry.resolve(body.outputToken),
      ]);
      const amountIn = tokenRegistry.parseAmount(body.amount, inputToken);

      const quote = await quoteAggregator.quote({
        sourceToken: inputToken,
        destinationToken: outputToken,
        amountIn,
        slippageToleranceBps: body.slippageBps,
        maxHops: body.maxHops,
        walletId: body.walletAddress,
      });

      apiLogger.logSuccess("QuoteAggregator", "/api/swap/quote", Date.now() - startTime, {
        hops: quote.hops.length,
        candidatesEvaluated: quote.candidatesEvaluated,
        partial: quote.partial,
      });

      const response: QuoteResponse = { success: true, quote: toQuoteDto(quote, tokenRegistry) };
      res.json(response);
    } catch (error) {
      sendError(res, error, "QuoteAggregator", "/api/swap/quote", startTime);
    }
  });

  /**
   * GET /api/tokens?query=USDC
   * Search by symbol, name or address
   */
  app.get("/api/tokens", async (req, res) => {
    const startTime = Date.now();
    try {
      const { query } = tokenSearchQuerySchema.parse(req.query);
      const tokens = await tokenRegistry.search(query);

      apiLogger.logSuccess("TokenRegistry", "/api/tokens", Date.now() - startTime, { matches: tokens.length });
      res.json({ tokens: tokens.map(toTokenDto) });
    } catch (error) {
      sendError(res, error, "TokenRegistry", "/api/tokens", startTime);
    }
  });

  /**
   * GET /api/balance?wallet=0x...&token=USDC
   */
  app.get("/api/balance", async (req, res) => {
    const startTime = Date.now();
    try {
      const { wallet, token: identifier } = balanceQuerySchema.parse(req.query);
      const token = await tokenRegistry.resolve(identifier);
      const balance: WalletBalance = {
        walletId: wallet,
        token,
        amount: await balanceProvider.getBalance(wallet, token),
      };

      apiLogger.logSuccess("BalanceProvider", "/api/balance", Date.now() - startTime);
      const response: BalanceResponse = {
        wallet: balance.walletId,
        token: toTokenDto(balance.token),
        amount: balance.amount.toString(),
        formatted: tokenRegistry.formatAmount(balance.amount, balance.token),
      };
      res.json(response);
    } catch (error) {
      sendError(res, error, "BalanceProvider", "/api/balance", startTime);
    }
  });

  /**
   * GET /api/pools/stats
   * Registry, refresher and RPC rotation state (for debugging/monitoring)
   */
  app.get("/api/pools/stats", (_req, res) => {
    res.json({
      refresher: refresher.getStats(),
      tokens: tokenRegistry.size,
      ...(rpcStatus ? { rpc: rpcStatus() } : {}),
    });
  });

  /**
   * GET /api/logs/status
   * API call logging statistics
   */
  app.get("/api/logs/status", (_req, res) => {
    res.json(apiLogger.getStats());
  });

  /**
   * GET /api/logs/recent?count=50
   */
  app.get("/api/logs/recent", (req, res) => {
    const count = req.query.count ? Number(req.query.count) : 50;
    res.json(apiLogger.getRecentLogs(Number.isNaN(count) ? 50 : count));
  });

  return app;
}

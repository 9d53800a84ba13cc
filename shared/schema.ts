/**
 * HTTP request schemas and response shapes of the quote API.
 *
 * Amounts travel as decimal strings: raw base-unit integers for bigint
 * fields, human decimals for the `*Formatted` fields.
 */

import { z } from 'zod';

// ============================================================================
// Requests
// ============================================================================

/**
 * POST /api/swap/quote - Body validation
 */
export const quoteRequestSchema = z.object({
  inputToken: z.string().trim().min(1, 'inputToken is required'),
  outputToken: z.string().trim().min(1, 'outputToken is required'),
  amount: z
    .string()
    .trim()
    .regex(/^\d+(\.\d+)?$/, 'amount must be a positive decimal string'),
  slippageBps: z.coerce.number().int().min(0).max(10000).default(50),
  maxHops: z.coerce.number().int().min(1).optional(),
  walletAddress: z.string().trim().min(1).optional(),
});

export type QuoteRequestBody = z.infer<typeof quoteRequestSchema>;

/**
 * GET /api/tokens - Query validation
 */
export const tokenSearchQuerySchema = z.object({
  query: z.string().trim().min(1, 'Query parameter is required'),
});

/**
 * GET /api/balance - Query validation
 */
export const balanceQuerySchema = z.object({
  wallet: z.string().regex(/^0x[a-fA-F0-9]{40}$/, 'Invalid wallet address'),
  token: z.string().trim().min(1, 'token is required'),
});

// ============================================================================
// Responses
// ============================================================================

export interface TokenDto {
  address: string;
  decimals: number;
  symbol?: string;
  name?: string;
  logoURI?: string;
}

export interface HopDto {
  pool: string;
  tokenIn: string;
  tokenOut: string;
  amountIn: string;
  feeAmount: string;
  amountOut: string;
  spotPrice: number;
  executionPrice: number;
  priceImpact: number;
}

export interface PriceCheckDto {
  sourcePriceUsd: number;
  destinationPriceUsd: number;
  referenceAmountOut: string;
  deviation: number;
  withinBounds: boolean;
}

export interface QuoteDto {
  inputToken: TokenDto;
  outputToken: TokenDto;
  amountIn: string;
  amountInFormatted: string;
  amountOut: string;
  amountOutFormatted: string;
  minimumAmountOut: string;
  minimumAmountOutFormatted: string;
  totalFee: string;
  priceImpact: number;
  slippageBps: number;
  route: string[];
  pools: string[];
  hops: HopDto[];
  executable?: boolean;
  candidatesEvaluated: number;
  partial: boolean;
  priceCheck?: PriceCheckDto;
}

export interface QuoteResponse {
  success: true;
  quote: QuoteDto;
}

export interface BalanceResponse {
  wallet: string;
  token: TokenDto;
  amount: string;
  formatted: string;
}

export interface ErrorResponse {
  success: false;
  code: string;
  message: string;
}

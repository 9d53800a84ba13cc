import { z } from "zod";
import { PriceOracle, Token, normalizeAddress } from "../../domain/types";
import { timingConfig } from "../config/TimingConfig";

const PLATFORMS: Record<number, string> = {
  1: "ethereum",
  137: "polygon-pos",
};

const CACHE_TTL_MS = 60 * 1000;

// { "<id or address>": { "usd": 1.0 } }
const priceResponseSchema = z.record(z.object({ usd: z.number().optional() }));

export interface CoinGeckoPriceOracleOptions {
  chainId: number;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

interface CachedPrice {
  price: number;
  fetchedAt: number;
}

/**
 * USD spot prices from the CoinGecko simple-price API. Tokens with a
 * `coingeckoId` are looked up by id, all others by contract address on the
 * chain's platform. Prices are cached for a minute.
 */
export class CoinGeckoPriceOracle implements PriceOracle {
  private readonly baseUrl: string;
  private readonly platform: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private cache: Map<string, CachedPrice> = new Map();

  constructor(options: CoinGeckoPriceOracleOptions) {
    this.baseUrl = (options.baseUrl ?? "https://api.coingecko.com/api/v3").replace(/\/+$/, "");
    this.platform = PLATFORMS[options.chainId] ?? "ethereum";
    this.timeoutMs = options.timeoutMs ?? timingConfig.PRICE_ORACLE_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async spotPrice(token: Token): Promise<number> {
    const key = token.coingeckoId ?? normalizeAddress(token.address);
    const cached = this.cache.get(key);
    if (cached && Date.now() - cached.fetchedAt < CACHE_TTL_MS) {
      return cached.price;
    }

    const url = token.coingeckoId
      ? `${this.baseUrl}/simple/price?ids=${encodeURIComponent(token.coingeckoId)}&vs_currencies=usd`
      : `${this.baseUrl}/simple/token_price/${this.platform}?contract_addresses=${key}&vs_currencies=usd`;

    const response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!response.ok) {
      throw new Error(`CoinGecko responded ${response.status} for ${key}`);
    }

    const body: unknown = await response.json();
    const parsed = priceResponseSchema.parse(body);
    const price = parsed[key]?.usd;
    if (price === undefined || !(price > 0)) {
      throw new Error(`No USD price for ${key}`);
    }

    this.cache.set(key, { price, fetchedAt: Date.now() });
    return price;
  }
}

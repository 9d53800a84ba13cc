import { Contract, ContractRunner, JsonRpcProvider, ZeroAddress, getAddress, isAddress } from "ethers";
import {
  BalanceProvider,
  ChainClient,
  PoolStateResponse,
  Token,
  normalizeAddress,
} from "../../domain/types";
import { BalanceLookupError } from "../../domain/errors";
import {
  ChainContracts,
  ERC20_ABI,
  STABLE_FEE_DENOMINATOR,
  STABLE_POOL_ABI,
  STABLE_REGISTRY_ABI,
  V2_FACTORY_ABI,
  V2_POOL_ABI,
  getChainContracts,
} from "../config/ContractAddressConfig";

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;

async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function errorCode(error: unknown): unknown {
  return typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRateLimited(error: unknown): boolean {
  let rpcCode: unknown;
  if (typeof error === "object" && error !== null && "info" in error) {
    const info = error.info;
    if (typeof info === "object" && info !== null && "error" in info) {
      rpcCode = errorCode(info.error);
    }
  }
  const message = errorMessage(error);
  return (
    rpcCode === 429 ||
    errorCode(error) === 429 ||
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("compute units")
  );
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  context: string,
  maxRetries = MAX_RETRIES,
  baseDelayMs = BASE_DELAY_MS
): Promise<T> {
  let lastError: unknown = new Error(`${context}: no attempt made`);

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      const retryable = isRateLimited(error) || errorCode(error) === "CALL_EXCEPTION";
      if (retryable && attempt < maxRetries - 1) {
        const delayMs = baseDelayMs * Math.pow(2, attempt);
        console.warn(`⚠️ [RPC] ${context} failed (${errorMessage(error)}), retry ${attempt + 1} in ${delayMs}ms`);
        await sleep(delayMs);
        continue;
      }

      throw error;
    }
  }

  throw lastError;
}

function toBigInt(value: unknown, label: string): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  throw new Error(`Unexpected ${label}: ${String(value)}`);
}

function toAddress(value: unknown, label: string): string {
  if (typeof value === "string" && isAddress(value)) return getAddress(value);
  throw new Error(`Unexpected ${label}: ${String(value)}`);
}

function tupleItem(value: unknown, index: number, label: string): unknown {
  if (!Array.isArray(value) || value.length <= index) {
    throw new Error(`Unexpected ${label} result`);
  }
  const item: unknown = value[index];
  return item;
}

type PoolKind =
  | { type: "constant-product"; feeBps: number }
  | { type: "stable-swap" };

export interface EthersAdapterOptions {
  chainId: number;
  contracts?: ChainContracts;
  maxRetries?: number;
  baseDelayMs?: number;
}

/**
 * Chain access through ethers. Implements the pool-state feed for
 * constant-product (UniswapV2-style) pairs and two-coin stable-swap
 * (Curve-style) pools, and ERC20 balance lookups.
 *
 * `getRunner` is called per request, so a round-robin over several RPC
 * providers can sit behind it.
 */
export class EthersAdapter implements ChainClient, BalanceProvider {
  private readonly contracts: ChainContracts;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private poolKinds: Map<string, PoolKind> = new Map();
  private tokenCache: Map<string, Token> = new Map();

  constructor(private readonly getRunner: () => ContractRunner, options: EthersAdapterOptions) {
    this.contracts = options.contracts ?? getChainContracts(options.chainId);
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
  }

  /**
   * One JsonRpcProvider per endpoint, picked by `nextEndpoint` on every call.
   */
  static fromEndpoints(chainId: number, nextEndpoint: () => string): EthersAdapter {
    const providers: Map<string, JsonRpcProvider> = new Map();
    return new EthersAdapter(() => {
      const url = nextEndpoint();
      let provider = providers.get(url);
      if (!provider) {
        provider = new JsonRpcProvider(url, chainId, { staticNetwork: true });
        providers.set(url, provider);
      }
      return provider;
    }, { chainId });
  }

  async getTokenMetadata(tokenAddress: string): Promise<Token> {
    const key = normalizeAddress(tokenAddress);
    const cached = this.tokenCache.get(key);
    if (cached) return cached;

    const address = toAddress(tokenAddress, "token address");
    const tokenContract = new Contract(address, ERC20_ABI, this.getRunner());
    const decimals = await this.retry(
      async () => Number(toBigInt(await tokenContract.getFunction("decimals")(), "decimals")),
      `decimals(${address.slice(0, 8)})`
    );

    // Some tokens return bytes32 symbols; a symbol is optional
    const symbol = await tokenContract.getFunction("symbol")()
      .then((value: unknown) => (typeof value === "string" ? value : undefined))
      .catch(() => undefined);

    const token: Token = symbol ? { address, decimals, symbol } : { address, decimals };
    this.tokenCache.set(key, token);
    return token;
  }

  async listPoolsForPair(tokenA: Token, tokenB: Token): Promise<string[]> {
    const a = toAddress(tokenA.address, "token address");
    const b = toAddress(tokenB.address, "token address");
    const runner = this.getRunner();

    const v2Lookups = this.contracts.v2Factories.map(async factory => {
      const contract = new Contract(factory.address, V2_FACTORY_ABI, runner);
      const pair = await this.retry(
        async () => toAddress(await contract.getFunction("getPair")(a, b), "pair address"),
        `getPair(${factory.name})`
      );
      if (pair === ZeroAddress) return null;
      this.poolKinds.set(normalizeAddress(pair), { type: "constant-product", feeBps: factory.feeBps });
      return pair;
    });

    const stableLookup = this.findStablePool(a, b, runner);

    const found = await Promise.all([...v2Lookups, stableLookup]);
    return found.filter((address): address is string => address !== null);
  }

  async fetchPoolState(poolAddress: string): Promise<PoolStateResponse> {
    const address = toAddress(poolAddress, "pool address");
    const kind = this.poolKinds.get(normalizeAddress(address)) ?? (await this.detectPoolKind(address));

    return kind.type === "constant-product"
      ? this.fetchConstantProductState(address, kind.feeBps)
      : this.fetchStableSwapState(address);
  }

  async getBalance(walletId: string, token: Token): Promise<bigint> {
    if (!isAddress(walletId)) {
      throw new BalanceLookupError(walletId, token.address, new Error("Invalid wallet address"));
    }

    try {
      const tokenContract = new Contract(token.address, ERC20_ABI, this.getRunner());
      return await this.retry(
        async () => toBigInt(await tokenContract.getFunction("balanceOf")(walletId), "balance"),
        `balanceOf(${token.address.slice(0, 8)})`
      );
    } catch (error) {
      throw new BalanceLookupError(walletId, token.address, error);
    }
  }

  private retry<T>(fn: () => Promise<T>, context: string): Promise<T> {
    return withRetry(fn, context, this.maxRetries, this.baseDelayMs);
  }

  private async findStablePool(a: string, b: string, runner: ContractRunner): Promise<string | null> {
    if (!this.contracts.stableRegistry) return null;

    const registry = new Contract(this.contracts.stableRegistry, STABLE_REGISTRY_ABI, runner);
    const pool = await this.retry(
      async () => toAddress(await registry.getFunction("find_pool_for_coins")(a, b, 0), "pool address"),
      "find_pool_for_coins"
    );
    if (pool === ZeroAddress) return null;

    // Only two-coin pools match the two-coin invariant
    const contract = new Contract(pool, STABLE_POOL_ABI, runner);
    const hasThirdCoin = await contract.getFunction("coins")(2).then(() => true, () => false);
    if (hasThirdCoin) {
      console.log(`⏭️  [RPC] Skipping multi-coin stable pool ${pool.slice(0, 10)}...`);
      return null;
    }

    this.poolKinds.set(normalizeAddress(pool), { type: "stable-swap" });
    return pool;
  }

  /**
   * A pool that was never listed: a V2 pair answers getReserves, a stable pool answers A.
   */
  private async detectPoolKind(address: string): Promise<PoolKind> {
    const runner = this.getRunner();
    const pair = new Contract(address, V2_POOL_ABI, runner);
    const isPair = await pair.getFunction("getReserves")().then(() => true, () => false);
    if (isPair) {
      const kind: PoolKind = { type: "constant-product", feeBps: this.contracts.v2Factories[0]?.feeBps ?? 30 };
      this.poolKinds.set(normalizeAddress(address), kind);
      return kind;
    }

    const stable = new Contract(address, STABLE_POOL_ABI, runner);
    const isStable = await stable.getFunction("A")().then(() => true, () => false);
    if (isStable) {
      const kind: PoolKind = { type: "stable-swap" };
      this.poolKinds.set(normalizeAddress(address), kind);
      return kind;
    }

    throw new Error(`Unsupported pool contract at ${address}`);
  }

  private async fetchConstantProductState(address: string, feeBps: number): Promise<PoolStateResponse> {
    const pair = new Contract(address, V2_POOL_ABI, this.getRunner());
    const [reserves, token0, token1] = await this.retry(
      async () => {
        const results: unknown[] = await Promise.all([
          pair.getFunction("getReserves")(),
          pair.getFunction("token0")(),
          pair.getFunction("token1")(),
        ]);
        return results;
      },
      `getPoolState(${address.slice(0, 8)})`
    );

    const [tokenA, tokenB] = await Promise.all([
      this.getTokenMetadata(toAddress(token0, "token0")),
      this.getTokenMetadata(toAddress(token1, "token1")),
    ]);

    return {
      tokenA,
      tokenB,
      reserveA: toBigInt(tupleItem(reserves, 0, "getReserves"), "reserve0"),
      reserveB: toBigInt(tupleItem(reserves, 1, "getReserves"), "reserve1"),
      feeBps,
      curve: { type: "constant-product" },
    };
  }

  private async fetchStableSwapState(address: string): Promise<PoolStateResponse> {
    const pool = new Contract(address, STABLE_POOL_ABI, this.getRunner());
    const [amplification, fee, coin0, coin1, balance0, balance1] = await this.retry(
      async () => {
        const results: unknown[] = await Promise.all([
          pool.getFunction("A")(),
          pool.getFunction("fee")(),
          pool.getFunction("coins")(0),
          pool.getFunction("coins")(1),
          pool.getFunction("balances")(0),
          pool.getFunction("balances")(1),
        ]);
        return results;
      },
      `getStablePoolState(${address.slice(0, 8)})`
    );

    const [tokenA, tokenB] = await Promise.all([
      this.getTokenMetadata(toAddress(coin0, "coins(0)")),
      this.getTokenMetadata(toAddress(coin1, "coins(1)")),
    ]);

    return {
      tokenA,
      tokenB,
      reserveA: toBigInt(balance0, "balances(0)"),
      reserveB: toBigInt(balance1, "balances(1)"),
      feeBps: Number((toBigInt(fee, "fee") * 10000n) / STABLE_FEE_DENOMINATOR),
      curve: { type: "stable-swap", amplification: Number(toBigInt(amplification, "A")) },
    };
  }
}

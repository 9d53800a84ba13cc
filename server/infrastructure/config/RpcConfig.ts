/**
 * RpcConfig - RPC Endpoint Configuration
 *
 * RESPONSIBILITY: Manage RPC endpoints with round-robin load balancing
 * - Endpoints come from RPC_URLS (comma-separated) and RPC_URL
 * - All endpoints serve the chain named by CHAIN_ID
 * - Round-robin selection for redundancy and load distribution
 *
 * ADDING NEW RPCS:
 * 1. Append the URL to RPC_URLS in .env
 * 2. Done - round-robin automatically includes it
 */

import { safeParseInt } from './env';

export interface RpcProvider {
  name: string;
  endpoints: {
    [chainId: number]: string;
  };
}

class RpcConfig {
  private static instance: RpcConfig;

  private providers: RpcProvider[] = [];

  // Round-robin counters per chain
  private roundRobinCounters: Map<number, number> = new Map();

  private initialized: boolean = false;

  private constructor() {
    // Lazy: env may not be loaded yet
  }

  public static getInstance(): RpcConfig {
    if (!RpcConfig.instance) {
      RpcConfig.instance = new RpcConfig();
    }
    if (!RpcConfig.instance.initialized) {
      RpcConfig.instance.initializeProviders(process.env);
      RpcConfig.instance.initialized = true;
    }
    return RpcConfig.instance;
  }

  /**
   * Rebuild the endpoint list from `env` (process.env by default).
   */
  public reinitialize(env: NodeJS.ProcessEnv = process.env): void {
    this.initializeProviders(env);
    this.initialized = true;
  }

  private initializeProviders(env: NodeJS.ProcessEnv): void {
    const chainId = safeParseInt(env.CHAIN_ID, 1);
    const urls = [...(env.RPC_URLS ?? '').split(','), env.RPC_URL ?? '']
      .map(url => url.trim())
      .filter(url => url.length > 0);

    const unique = Array.from(new Set(urls));
    this.providers = unique.map((url, i) => ({
      name: this.providerName(url, i),
      endpoints: { [chainId]: url },
    }));
    this.roundRobinCounters = new Map([[chainId, 0]]);

    if (this.providers.length === 0) {
      console.warn('⚠️ RpcConfig: No RPC endpoints configured. Set RPC_URLS or RPC_URL.');
    } else {
      console.log(`✓ RpcConfig: Initialized ${this.providers.length} RPC endpoint(s): ${this.getAvailableProviders().join(', ')}`);
    }
  }

  private providerName(url: string, index: number): string {
    try {
      return new URL(url).hostname;
    } catch {
      return `rpc-${index + 1}`;
    }
  }

  /**
   * Next RPC endpoint for the chain, round-robin.
   */
  public getNextRpcEndpoint(chainId: number): string {
    const available = this.providers.filter(p => p.endpoints[chainId]);
    if (available.length === 0) {
      throw new Error(`No RPC provider available for chain ${chainId}`);
    }

    const counter = this.roundRobinCounters.get(chainId) ?? 0;
    const provider = available[counter % available.length];

    this.roundRobinCounters.set(chainId, (counter + 1) % available.length);

    return provider.endpoints[chainId];
  }

  public getAvailableProviders(): string[] {
    return this.providers.map(p => p.name);
  }

  public getStatus(): {
    providers: string[];
    counters: Record<number, number>;
  } {
    const counters: Record<number, number> = {};
    this.roundRobinCounters.forEach((value, key) => {
      counters[key] = value;
    });

    return {
      providers: this.getAvailableProviders(),
      counters,
    };
  }
}

export function getRpcConfig(): RpcConfig {
  return RpcConfig.getInstance();
}

export { RpcConfig };

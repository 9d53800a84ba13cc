import type { Token } from "../../domain/types";
/**
 * NetworkConfig - Network Definitions and Constants
 *
 * RESPONSIBILITY: Define all network-specific constants
 * - Chain IDs, names, native symbols
 * - Stablecoins and wrapped native token (base tokens)
 * - Base tokens are paired with every listed token to seed the routing graph
 *
 * IMPORTANT: Different from RpcConfig
 * - RpcConfig: WHERE to get data (endpoints)
 * - NetworkConfig: WHAT networks exist and their properties
 */

export enum ChainId {
  ETHEREUM = 1,
  POLYGON = 137,
}

export interface NetworkDefinition {
  chainId: ChainId;
  name: string;
  symbol: string;

  // Reference stablecoins
  stablecoins: Token[];

  wrappedNative: Token;
}

class NetworkConfig {
  private static instance: NetworkConfig;
  private networks: Map<number, NetworkDefinition>;

  private constructor() {
    this.networks = new Map<number, NetworkDefinition>([
      [ChainId.ETHEREUM, this.getEthereumConfig()],
      [ChainId.POLYGON, this.getPolygonConfig()],
    ]);
  }

  public static getInstance(): NetworkConfig {
    if (!NetworkConfig.instance) {
      NetworkConfig.instance = new NetworkConfig();
    }
    return NetworkConfig.instance;
  }

  /**
   * Ethereum Mainnet configuration
   */
  private getEthereumConfig(): NetworkDefinition {
    return {
      chainId: ChainId.ETHEREUM,
      name: 'Ethereum',
      symbol: 'ETH',
      stablecoins: [
        {
          address: '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48', // USDC
          symbol: 'USDC',
          name: "USD Coin",
          decimals: 6,
          coingeckoId: 'usd-coin',
        },
        {
          address: '0x6B175474E89094C44Da98b954EedeAC495271d0F', // DAI
          symbol: 'DAI',
          name: "Dai",
          decimals: 18,
          coingeckoId: 'dai',
        },
        {
          address: '0xdAC17F958D2ee523a2206206994597C13D831ec7', // USDT
          symbol: 'USDT',
          name: "Tether",
          decimals: 6,
          coingeckoId: 'tether',
        },
      ],
      wrappedNative: {
        address: '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2', // WETH
        symbol: 'WETH',
        name: "Wrapped Ether",
        decimals: 18,
        coingeckoId: 'weth',
      },
    };
  }

  /**
   * Polygon Mainnet configuration
   */
  private getPolygonConfig(): NetworkDefinition {
    return {
      chainId: ChainId.POLYGON,
      name: 'Polygon',
      symbol: 'MATIC',
      stablecoins: [
        {
          address: '0x2791Bca1f2de4661ED88A30C99A7a9449Aa84174', // USDC (Polygon)
          symbol: 'USDC',
          name: "USD Coin",
          decimals: 6,
          coingeckoId: 'usd-coin',
        },
        {
          address: '0xc2132D05D31c914a87C6611C10748AEb04B58e8F', // USDT (Polygon)
          symbol: 'USDT',
          name: "Tether",
          decimals: 6,
          coingeckoId: 'tether',
        },
        {
          address: '0x8f3Cf7ad23Cd3CaDbD9735AFf958023239c6A063',
          symbol: 'DAI',
          name: 'Dai',
          decimals: 18,
          coingeckoId: 'dai',
        },
      ],
      wrappedNative: {
        address: '0x0d500B1d8E8eF31E21C99d1Db9A6444d3ADf1270', // WMATIC
        symbol: 'WMATIC',
        name: "Wrapped Matic",
        decimals: 18,
        coingeckoId: 'wmatic',
      },
    };
  }

  /**
   * @param chainId Network chain ID (1 = Ethereum, 137 = Polygon)
   */
  public getNetwork(chainId: number): NetworkDefinition {
    const network = this.networks.get(chainId);
    if (!network) {
      throw new Error(`Network with chain ID ${chainId} not found`);
    }
    return network;
  }

  public isChainSupported(chainId: number): boolean {
    return this.networks.has(chainId);
  }

  public getSupportedChainIds(): number[] {
    return Array.from(this.networks.keys());
  }

  /**
   * Stablecoins plus the wrapped native token.
   */
  public getBaseTokens(chainId: number): Token[] {
    const network = this.getNetwork(chainId);
    return [...network.stablecoins, network.wrappedNative];
  }
}

export const networkConfig = NetworkConfig.getInstance();

export { NetworkConfig };

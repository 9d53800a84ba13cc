/**
 * ContractAddressConfig
 *
 * Centralized configuration for protocol contract addresses and ABIs.
 * Organized by network and purpose.
 */

import { networkConfig } from "./NetworkConfig";

// ------------------
// ABIs
// ------------------

export const ERC20_ABI = [
  "function name() view returns (string)",
  "function symbol() view returns (string)",
  "function decimals() view returns (uint8)",
  "function balanceOf(address owner) view returns (uint256)",
];

// Constant-product (UniswapV2-style) pair and factory
export const V2_POOL_ABI = [
  "function getReserves() view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)",
  "function token0() view returns (address)",
  "function token1() view returns (address)",
];
export const V2_FACTORY_ABI = ['function getPair(address tokenA, address tokenB) view returns (address pair)'];

// Stable-swap (Curve-style) pool and registry
export const STABLE_POOL_ABI = [
  "function A() view returns (uint256)",
  "function fee() view returns (uint256)",
  "function coins(uint256 i) view returns (address)",
  "function balances(uint256 i) view returns (uint256)",
];
export const STABLE_REGISTRY_ABI = [
  "function find_pool_for_coins(address from, address to, uint256 i) view returns (address)",
];

// Curve expresses fees with 10 decimals: 4000000 = 0.04% = 4 bps
export const STABLE_FEE_DENOMINATOR = 10n ** 10n;

// ------------------
// Addresses
// ------------------

export interface V2FactoryDefinition {
  name: string;
  address: string;
  feeBps: number;
}

export interface ChainContracts {
  v2Factories: V2FactoryDefinition[];
  stableRegistry: string | null;
}

// DEX factories by chain ID
export const FACTORIES: Record<number, ChainContracts> = {
  [1]: { // Ethereum
    v2Factories: [
      { name: 'Uniswap V2', address: '0x5C69bEe701ef814a2B6a3EDD4B1652CB9cc5aA6f', feeBps: 30 },
      { name: 'SushiSwap V2', address: '0xC0AEe478e3658e2610c5F7A4A2E1777cE9e4f2Ac', feeBps: 30 },
    ],
    stableRegistry: '0x90E00ACe148ca3b23Ac1bC8C240C2a7Dd9c2d7f5', // Curve main registry
  },
  [137]: { // Polygon
    v2Factories: [
      { name: 'QuickSwap', address: '0x5757371414417b8C6CAad45bAeF941aBc7d3Ab32', feeBps: 30 },
      { name: 'SushiSwap V2', address: '0xc35DADB65012eC5796536bD9864eD8773aBc74C4', feeBps: 30 },
    ],
    stableRegistry: null,
  },
};

// ------------------
// Utility Functions
// ------------------

function parseChainId(chainId: number | string): number {
  if (typeof chainId === "number") return chainId;
  if (chainId.startsWith("0x") || chainId.startsWith("0X")) {
    return parseInt(chainId, 16);
  }
  return parseInt(chainId, 10);
}

export function getChainContracts(chainId: number | string): ChainContracts {
  const id = parseChainId(chainId);
  if (!networkConfig.isChainSupported(id)) {
    throw new Error(`Unsupported chainId: ${id}.`);
  }

  const contracts = FACTORIES[id];
  if (!contracts) {
    throw new Error(`No contracts configured for network '${networkConfig.getNetwork(id).name}'`);
  }
  return contracts;
}

import { describe, it, expect } from 'vitest';
import { ChainId, networkConfig } from './NetworkConfig';
import { getChainContracts } from './ContractAddressConfig';

describe('NetworkConfig', () => {
  it('lists the supported chains', () => {
    expect(networkConfig.getSupportedChainIds()).toEqual([ChainId.ETHEREUM, ChainId.POLYGON]);
    expect(networkConfig.isChainSupported(56)).toBe(false);
    expect(() => networkConfig.getNetwork(56)).toThrow('Network with chain ID 56 not found');
  });

  it('uses stablecoins and the wrapped native token as base tokens', () => {
    expect(networkConfig.getBaseTokens(1).map(t => t.symbol)).toEqual(['USDC', 'DAI', 'USDT', 'WETH']);
    expect(networkConfig.getBaseTokens(137).map(t => t.symbol)).toEqual(['USDC', 'USDT', 'DAI', 'WMATIC']);
  });
});

describe('getChainContracts', () => {
  it('returns the factories and stable registry of a chain', () => {
    const mainnet = getChainContracts(1);

    expect(mainnet.v2Factories.map(f => f.name)).toEqual(['Uniswap V2', 'SushiSwap V2']);
    expect(mainnet.stableRegistry).not.toBeNull();
    expect(getChainContracts(137).stableRegistry).toBeNull();
  });

  it('accepts hex chain ids', () => {
    expect(getChainContracts('0x89')).toBe(getChainContracts(137));
  });

  it('rejects unsupported chains', () => {
    expect(() => getChainContracts(56)).toThrow('Unsupported chainId: 56.');
  });
});

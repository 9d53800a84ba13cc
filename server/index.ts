// Load .env FIRST: config modules read process.env when they are evaluated
import 'dotenv/config';

import express from 'express';
import http from 'http';
import { registerRoutes } from './routes';
import { EthersAdapter } from './infrastructure/adapters/EthersAdapter';
import { CoinGeckoPriceOracle } from './infrastructure/adapters/CoinGeckoPriceOracle';
import { StorageService } from './application/services/StorageService';
import { TokenRegistry } from './application/services/TokenRegistry';
import { PoolRegistry } from './application/services/PoolRegistry';
import { PoolStateRefresher } from './application/services/PoolStateRefresher';
import { RouteFinder } from './application/services/RouteFinder';
import { SwapSimulator } from './application/services/SwapSimulator';
import { QuoteAggregator } from './application/services/QuoteAggregator';
import { getRpcConfig } from './infrastructure/config/RpcConfig';
import { networkConfig } from './infrastructure/config/NetworkConfig';
import { safeParseBool, safeParseInt } from './infrastructure/config/env';
import { sameToken } from './domain/types';

const chainId = safeParseInt(process.env.CHAIN_ID, 1);
const rpcConfig = getRpcConfig();

if (!networkConfig.isChainSupported(chainId)) {
  console.error(`Unsupported CHAIN_ID ${chainId}. Supported: ${networkConfig.getSupportedChainIds().join(', ')}. Exiting.`);
  process.exit(1);
}
if (rpcConfig.getAvailableProviders().length === 0) {
  console.error('No RPC endpoint configured. Set RPC_URLS or RPC_URL. Exiting.');
  process.exit(1);
}

const ethersAdapter = EthersAdapter.fromEndpoints(chainId, () => rpcConfig.getNextRpcEndpoint(chainId));
const storageService = new StorageService();

const poolRegistry = new PoolRegistry();
const refresher = new PoolStateRefresher(poolRegistry, ethersAdapter);

const priceOracle = safeParseBool(process.env.ENABLE_PRICE_CHECK, false)
  ? new CoinGeckoPriceOracle({ chainId, baseUrl: process.env.COINGECKO_API_URL })
  : undefined;

const quoteAggregator = new QuoteAggregator(
  poolRegistry,
  refresher,
  new RouteFinder(),
  new SwapSimulator(),
  { balanceProvider: ethersAdapter, priceOracle },
  { baseTokens: networkConfig.getBaseTokens(chainId) }
);

async function main(): Promise<void> {
  const tokenRegistry = await TokenRegistry.load(storageService, chainId, address =>
    ethersAdapter.getTokenMetadata(address)
  );

  const app = express();
  const server = http.createServer(app);
  app.use(express.json());

  registerRoutes(app, {
    quoteAggregator,
    tokenRegistry,
    refresher,
    balanceProvider: ethersAdapter,
    rpcStatus: () => rpcConfig.getStatus(),
  });

  // Every listed token is paired with every base token; those pairs form the routing graph
  if (process.env.SKIP_DISCOVERY !== 'true') {
    const baseTokens = networkConfig.getBaseTokens(chainId);
    for (const token of tokenRegistry.list()) {
      for (const base of baseTokens) {
        if (!sameToken(token, base)) refresher.watchPair(token, base);
      }
    }
    refresher.start();
  } else {
    console.log('⏭️  Pool discovery skipped (SKIP_DISCOVERY=true)');
  }

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down...`);
    refresher.stop();
    server.close();
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  const port = safeParseInt(process.env.PORT, 3002);
  server.listen(port, () =>
    console.log(`Server is running on port ${port}`)
  );
}

main().catch(error => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});

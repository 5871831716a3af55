/**
 * External provider adapters: node RPC (balance, nonce, tx status, gas, latest block), Etherscan (history), CoinGecko (prices).
 */

import { NETWORKS, getNodeRpcUrl, type NetworkName } from '../chains';
import type { AppConfig } from '../config';
import { createInfuraAdapter } from './infura';
import { createEtherscanAdapter } from './etherscan';
import { createCoinGeckoAdapter } from './coingecko';
import type { ExplorerAdapter, MarketAdapter, NodeProviderAdapter } from './types';

export { createInfuraAdapter } from './infura';
export { createEtherscanAdapter, type EtherscanEndpoint } from './etherscan';
export { createCoinGeckoAdapter, type CoinGeckoEndpoint } from './coingecko';
export { runOperation, sendWireRequest, redactUrl, type FetchFn, type TransportOptions } from './http';
export type * from './types';

/**
 * Builds adapters once the keys a query needs are known.
 */
export interface ProviderFactories {
  node(nodeKey: string): NodeProviderAdapter;
  explorer(scanKey: string): ExplorerAdapter;
  market(): MarketAdapter;
}

export function createProviderFactories(
  config: Pick<AppConfig, 'rpcUrlOverride' | 'etherscanApiUrl' | 'coingeckoApiUrl' | 'coingeckoApiKey'>,
  network: NetworkName,
): ProviderFactories {
  return {
    node: (nodeKey) => createInfuraAdapter(getNodeRpcUrl(network, nodeKey, config.rpcUrlOverride)),
    explorer: (scanKey) =>
      createEtherscanAdapter({
        apiUrl: config.etherscanApiUrl,
        chainId: NETWORKS[network].chainId,
        apiKey: scanKey,
      }),
    market: () => createCoinGeckoAdapter({ apiUrl: config.coingeckoApiUrl, apiKey: config.coingeckoApiKey }),
  };
}

/**
 * Supported networks - single source of truth for chain IDs and endpoints.
 * Reuse everywhere: config, adapters, CLI.
 */

import type { Chain } from 'viem';
import { mainnet, sepolia, holesky } from 'viem/chains';

export const NETWORK_NAMES = ['mainnet', 'sepolia', 'holesky'] as const;

export type NetworkName = typeof NETWORK_NAMES[number];

export interface NetworkConfig {
  name: NetworkName;
  chain: Chain;
  chainId: number;
  label: string;
  /** Infura RPC URL prefix; the project key is appended */
  infuraRpcPrefix: string;
  explorer: string;
}

/**
 * Supported network configurations keyed by network name.
 */
export const NETWORKS: Record<NetworkName, NetworkConfig> = {
  mainnet: {
    name: 'mainnet',
    chain: mainnet,
    chainId: mainnet.id,
    label: 'Ethereum Mainnet',
    infuraRpcPrefix: 'https://mainnet.infura.io/v3/',
    explorer: 'https://etherscan.io',
  },
  sepolia: {
    name: 'sepolia',
    chain: sepolia,
    chainId: sepolia.id,
    label: 'Sepolia',
    infuraRpcPrefix: 'https://sepolia.infura.io/v3/',
    explorer: 'https://sepolia.etherscan.io',
  },
  holesky: {
    name: 'holesky',
    chain: holesky,
    chainId: holesky.id,
    label: 'Holesky',
    infuraRpcPrefix: 'https://holesky.infura.io/v3/',
    explorer: 'https://holesky.etherscan.io',
  },
};

export function isNetworkName(value: string): value is NetworkName {
  return (NETWORK_NAMES as readonly string[]).includes(value);
}

/**
 * Node provider RPC URL for a network. An explicit override (ETHQ_RPC_URL) wins;
 * `{key}` inside the override is replaced by the node key.
 */
export function getNodeRpcUrl(network: NetworkName, nodeKey: string, override?: string): string {
  if (override) {
    return override.replace('{key}', encodeURIComponent(nodeKey));
  }
  return `${NETWORKS[network].infuraRpcPrefix}${encodeURIComponent(nodeKey)}`;
}

/** Native currency of a network (symbol and decimals for balance display). */
export function getNativeCurrency(network: NetworkName): { symbol: string; decimals: number } {
  const { symbol, decimals } = NETWORKS[network].chain.nativeCurrency;
  return { symbol, decimals };
}

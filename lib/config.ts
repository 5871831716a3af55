/**
 * Runtime configuration, read from the environment (after scripts/helpers/load-env).
 *
 * Environment variables:
 *   ETHQ_CONFIG_DIR        - Directory holding credentials.json (default: $XDG_CONFIG_HOME/ethq or ~/.config/ethq)
 *   ETHQ_NETWORK           - mainnet | sepolia | holesky (default: mainnet)
 *   ETHQ_RPC_URL           - Node provider URL override; `{key}` is replaced by the stored node key
 *   ETHQ_TIMEOUT_MS        - Per-request timeout (default: 10000)
 *   ETHQ_RETRIES           - Retries for transient failures, applied by the CLI (default: 0)
 *   ETHERSCAN_API_URL      - Etherscan API base (default: v2 endpoint)
 *   COINGECKO_API_URL      - CoinGecko API base
 *   COINGECKO_DEMO_API_KEY - Optional CoinGecko demo API key
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { NETWORK_NAMES, type NetworkName } from './chains';

/** Upper bound for `account transactions --limit`; larger values are rejected, not clamped. */
export const MAX_TRANSACTION_LIMIT = 100;

export const DEFAULT_TIMEOUT_MS = 10_000;

export const CREDENTIALS_FILE_NAME = 'credentials.json';

const ETHERSCAN_API_URL = 'https://api.etherscan.io/v2/api';
const COINGECKO_API_URL = 'https://api.coingecko.com/api/v3';

const EnvSchema = z.object({
  ETHQ_CONFIG_DIR: z.string().min(1).optional(),
  XDG_CONFIG_HOME: z.string().min(1).optional(),
  ETHQ_NETWORK: z.enum(NETWORK_NAMES).default('mainnet'),
  ETHQ_RPC_URL: z.string().url().optional(),
  ETHQ_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  ETHQ_RETRIES: z.coerce.number().int().min(0).max(10).default(0),
  ETHERSCAN_API_URL: z.string().url().default(ETHERSCAN_API_URL),
  COINGECKO_API_URL: z.string().url().default(COINGECKO_API_URL),
  COINGECKO_DEMO_API_KEY: z.string().min(1).optional(),
});

export interface AppConfig {
  configDir: string;
  credentialsPath: string;
  network: NetworkName;
  rpcUrlOverride?: string;
  timeoutMs: number;
  retries: number;
  maxTransactionLimit: number;
  etherscanApiUrl: string;
  coingeckoApiUrl: string;
  coingeckoApiKey?: string;
}

type Env = Record<string, string | undefined>;

/** Empty strings count as unset, the way shells and .env files produce them. */
function withoutEmpty(env: Env): Env {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
}

/**
 * Parse the environment into a typed config. Throws with every offending variable listed.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;
  const configDir = vars.ETHQ_CONFIG_DIR
    ?? join(vars.XDG_CONFIG_HOME ?? join(homedir(), '.config'), 'ethq');

  return {
    configDir,
    credentialsPath: join(configDir, CREDENTIALS_FILE_NAME),
    network: vars.ETHQ_NETWORK,
    rpcUrlOverride: vars.ETHQ_RPC_URL,
    timeoutMs: vars.ETHQ_TIMEOUT_MS,
    retries: vars.ETHQ_RETRIES,
    maxTransactionLimit: MAX_TRANSACTION_LIMIT,
    etherscanApiUrl: vars.ETHERSCAN_API_URL,
    coingeckoApiUrl: vars.COINGECKO_API_URL,
    coingeckoApiKey: vars.COINGECKO_DEMO_API_KEY,
  };
}

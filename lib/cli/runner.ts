/**
 * Builds the orchestrator for one command from the global options
 * (--network, --retries) and runs the query under the retry policy.
 */

import type { Command } from 'commander';
import type { AppConfig } from '../config';
import type { CredentialStore } from '../credentials/store';
import { createProviderFactories, type FetchFn } from '../providers';
import { QueryOrchestrator } from '../query/orchestrator';
import { validateNetwork } from '../validation/params';
import { GlobalOptionsSchema, parseRetries } from './options';
import { withRetry, type RetryBackoff } from './retry';

export interface CliDependencies {
  config: AppConfig;
  store: CredentialStore;
  /** Replaces global fetch (tests) */
  fetchFn?: FetchFn;
  retryBackoff?: RetryBackoff;
}

export type QueryRunner = <T>(command: Command, query: (orchestrator: QueryOrchestrator) => Promise<T>) => Promise<T>;

export function createQueryRunner(deps: CliDependencies): QueryRunner {
  return async (command, query) => {
    const globals = GlobalOptionsSchema.parse(command.optsWithGlobals());
    const network = globals.network === undefined ? deps.config.network : validateNetwork(globals.network);
    const retries = globals.retries === undefined ? deps.config.retries : parseRetries(globals.retries);

    const orchestrator = new QueryOrchestrator(deps.store, createProviderFactories(deps.config, network), {
      network,
      maxTransactionLimit: deps.config.maxTransactionLimit,
      transport: { timeoutMs: deps.config.timeoutMs, fetchFn: deps.fetchFn },
    });

    return withRetry(() => query(orchestrator), retries, deps.retryBackoff);
  };
}

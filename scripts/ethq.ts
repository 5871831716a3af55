/**
 * ethq entry point
 *
 * Usage:
 *   npm run ethq -- account set --address <address> --nodekey <key> --scankey <key>
 *   npm run ethq -- account balance [--address <address>] [--block <block>]
 *   npm run ethq -- account transactions --limit 5 --sort asc
 *   npm run ethq -- tx status <hash>
 *   npm run ethq -- network price --coin btc --currency eur
 *   npm run ethq -- --network sepolia network gas
 *   npm run ethq -- network block
 */

import './helpers/load-env';
import { loadConfig } from '../lib/config';
import { FileCredentialStore } from '../lib/credentials/store';
import { runCli } from '../lib/cli/program';

async function main(): Promise<number> {
  const config = loadConfig();
  const store = new FileCredentialStore(config.credentialsPath);
  return runCli(process.argv.slice(2), { config, store });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('\nError:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });

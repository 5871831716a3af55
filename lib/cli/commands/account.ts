// Account commands: stored identity (set, unset, path) and per-address queries

import type { Command } from 'commander';
import { QueryError, QueryErrorKind } from '../../errors';
import {
  AccountQueryOptionsSchema,
  AccountSetOptionsSchema,
  AccountUnsetOptionsSchema,
  TransactionsOptionsSchema,
} from '../options';
import {
  formatBalanceResult,
  formatCredentials,
  formatNonceResult,
  formatTransactionHistory,
} from '../output';
import type { QueryRunner } from '../runner';

/**
 * Register the account command with all subcommands.
 *
 * Structure:
 *   account set           - Store address and API keys (no flags: show what is stored)
 *   account unset         - Remove stored values
 *   account path          - Print the credentials file location
 *   account balance       - Native balance at a block
 *   account nonce         - Transaction count at a block
 *   account transactions  - Recent transaction history
 */
export function registerAccountCommand(program: Command, run: QueryRunner): void {
  const account = program.command('account').description('Manage the stored account and query it');

  account
    .command('set')
    .description('Store the default address and API keys; without options, show what is stored')
    .option('--address <address>', 'Default account address')
    .option('--nodekey <key>', 'Node provider (Infura) API key')
    .option('--scankey <key>', 'Etherscan API key')
    .action(async (rawOptions: unknown, command: Command) => {
      const options = AccountSetOptionsSchema.parse(rawOptions);
      const view = await run(command, (q) =>
        q.setCredentials({ address: options.address, nodeKey: options.nodekey, scanKey: options.scankey }),
      );
      console.log(formatCredentials(view));
    });

  account
    .command('unset')
    .description('Remove stored values')
    .option('--address', 'Remove the default address')
    .option('--nodekey', 'Remove the node provider key')
    .option('--scankey', 'Remove the Etherscan key')
    .action(async (rawOptions: unknown, command: Command) => {
      const options = AccountUnsetOptionsSchema.parse(rawOptions);
      if (!options.address && !options.nodekey && !options.scankey) {
        throw new QueryError(
          QueryErrorKind.MISSING_PARAMETER,
          'Nothing to unset. Pass --address, --nodekey or --scankey.',
          { parameter: 'field' },
        );
      }
      const view = await run(command, (q) =>
        q.setCredentials({
          address: options.address ? null : undefined,
          nodeKey: options.nodekey ? null : undefined,
          scanKey: options.scankey ? null : undefined,
        }),
      );
      console.log(formatCredentials(view));
    });

  account
    .command('path')
    .description('Print where credentials are stored')
    .action(async (_rawOptions: unknown, command: Command) => {
      console.log(await run(command, async (q) => q.credentialsLocation()));
    });

  account
    .command('balance')
    .description('Show the native balance of an address')
    .option('--address <address>', 'Address to query (default: stored address)')
    .option('--block <block>', 'Block tag or number (default: latest)')
    .action(async (rawOptions: unknown, command: Command) => {
      const options = AccountQueryOptionsSchema.parse(rawOptions);
      console.log(formatBalanceResult(await run(command, (q) => q.balance(options))));
    });

  account
    .command('nonce')
    .description('Show the transaction count (nonce) of an address')
    .option('--address <address>', 'Address to query (default: stored address)')
    .option('--block <block>', 'Block tag or number (default: latest)')
    .action(async (rawOptions: unknown, command: Command) => {
      const options = AccountQueryOptionsSchema.parse(rawOptions);
      console.log(formatNonceResult(await run(command, (q) => q.nonce(options))));
    });

  account
    .command('transactions')
    .description('List recent transactions of an address')
    .option('--address <address>', 'Address to query (default: stored address)')
    .option('--limit <count>', 'Number of transactions, 1 to 100 (default: 10)')
    .option('--sort <order>', 'asc or desc (default: desc)')
    .action(async (rawOptions: unknown, command: Command) => {
      const options = TransactionsOptionsSchema.parse(rawOptions);
      console.log(formatTransactionHistory(await run(command, (q) => q.transactions(options))));
    });
}

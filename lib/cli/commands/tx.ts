// Transaction commands

import type { Command } from 'commander';
import { formatTransactionLookup } from '../output';
import type { QueryRunner } from '../runner';

export function registerTxCommand(program: Command, run: QueryRunner): void {
  const tx = program.command('tx').description('Look up transactions');

  tx.command('status')
    .description('Show whether a transaction is pending, succeeded or failed')
    .argument('<hash>', 'Transaction hash')
    .action(async (hash: string, _rawOptions: unknown, command: Command) => {
      // Not found is a normal answer, not an error
      console.log(formatTransactionLookup(await run(command, (q) => q.transactionStatus(hash))));
    });
}

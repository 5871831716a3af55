/**
 * ethq command-line program.
 *
 * runCli() parses argv, runs one command and resolves with the process exit
 * code; it never calls process.exit itself.
 */

import { Command, CommanderError } from 'commander';
import { NETWORK_NAMES } from '../chains';
import { ExitCode, exitCodeFor, isQueryError } from '../errors';
import { registerAccountCommand } from './commands/account';
import { registerNetworkCommand } from './commands/network';
import { registerTxCommand } from './commands/tx';
import { MAX_RETRIES } from './options';
import { createQueryRunner, type CliDependencies } from './runner';

export const VERSION = '0.1.0';

export function createProgram(deps: CliDependencies): Command {
  const program = new Command();

  // Inherited by every subcommand added below
  program
    .exitOverride()
    .configureOutput({
      writeOut: (text) => console.log(text.trimEnd()),
      writeErr: (text) => console.error(text.trimEnd()),
    });

  program
    .name('ethq')
    .description('Query Ethereum accounts, transactions and prices')
    .version(VERSION)
    .option('-n, --network <name>', `Network: ${NETWORK_NAMES.join(', ')} (default: ${deps.config.network})`)
    .option('--retries <count>', `Retries for transient failures, 0 to ${MAX_RETRIES} (default: ${deps.config.retries})`);

  const run = createQueryRunner(deps);
  registerAccountCommand(program, run);
  registerNetworkCommand(program, run);
  registerTxCommand(program, run);

  return program;
}

/**
 * Run one command. Query errors are printed as "Error [<kind>]: <message>";
 * usage errors have already been printed by commander.
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  const program = createProgram(deps);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return ExitCode.SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit with 0
      return error.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.INVALID_INPUT;
    }
    if (isQueryError(error)) {
      console.error(`Error [${error.kind}]: ${error.message}`);
    } else {
      console.error('Unexpected error:', error);
    }
    return exitCodeFor(error);
  }
}

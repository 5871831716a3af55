// Network commands: market price, gas price and the latest block

import type { Command } from 'commander';
import { PriceOptionsSchema } from '../options';
import { formatBlockInfo, formatGasPrice, formatPriceQuote } from '../output';
import type { QueryRunner } from '../runner';

export function registerNetworkCommand(program: Command, run: QueryRunner): void {
  const network = program.command('network').description('Network-wide data');

  network
    .command('price')
    .description('Spot price of a coin from CoinGecko')
    .option('--coin <coin>', 'Coin id or ticker symbol (default: ethereum)')
    .option('--currency <currency>', 'Quote currency (default: usd)')
    .action(async (rawOptions: unknown, command: Command) => {
      const options = PriceOptionsSchema.parse(rawOptions);
      console.log(formatPriceQuote(await run(command, (q) => q.price(options))));
    });

  network
    .command('gas')
    .description('Current gas price')
    .action(async (_rawOptions: unknown, command: Command) => {
      console.log(formatGasPrice(await run(command, (q) => q.gasPrice())));
    });

  network
    .command('block')
    .description('Summary of the latest block')
    .action(async (_rawOptions: unknown, command: Command) => {
      console.log(formatBlockInfo(await run(command, (q) => q.latestBlock())));
    });
}

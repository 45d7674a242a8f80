#!/usr/bin/env node
import 'dotenv/config';
import chalk from 'chalk';
import { describeError, mapError, redactApiKey } from './errors.js';
import { runPriceCheck } from './priceCheck.js';

async function main() {
  // WARNING: mainnet. Read-only calls, no funds move.
  await runPriceCheck(process.env);
}

main().catch((err: unknown) => {
  console.error(chalk.red(describeError(err)));
  const { details } = mapError(err);
  if (process.env.DEX_DEBUG === 'true' && details) {
    console.error(chalk.gray(redactApiKey(JSON.stringify(details, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value instanceof Error ? value.message : value, 2))));
  }
  process.exitCode = 1;
});

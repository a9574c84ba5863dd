#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import dotenv from 'dotenv';
import { parseCliArgs } from './args.js';
import { loadEnvConfig } from './config.js';
import { PriceCollector } from './core/collector.js';
import { comparePrices } from './core/comparison.js';
import { formatReport } from './core/report.js';
import { describeError } from './errors.js';
import { createProviders } from './providers/index.js';
import { logger } from './util/logger.js';

const main = async (): Promise<void> => {
  dotenv.config();
  const config = loadEnvConfig();
  const args = parseCliArgs(process.argv.slice(2));
  const listText = await readFile(args.file, 'utf8');

  const collector = new PriceCollector(createProviders(config), undefined, config.providerTimeoutMs);
  const { result } = await comparePrices(listText, collector, {
    allocation: { ...config.allocation, ...args.allocation },
    providers: args.providers
  });

  process.stdout.write(`${formatReport(result).join('\n')}\n`);
};

main().catch((error) => {
  logger.error('Price comparison failed', { error: describeError(error) });
  process.exitCode = 1;
});

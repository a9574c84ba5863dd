import { parseArgs } from 'node:util';
import type { AllocationConfig } from './core/types.js';
import { ConfigError } from './errors.js';

export const USAGE = 'Usage: card-prices <list-file> [--min-cards N] [--override X] [--no-filter] [--providers a,b]';

export type CliArgs = {
  file: string;
  allocation: Partial<AllocationConfig>;
  providers?: string[];
};

const parseFlagNumber = (flag: string, value: string | undefined): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`--${flag} must be a number, got "${value}"`);
  }
  return parsed;
};

export const parseCliArgs = (argv: string[]): CliArgs => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'min-cards': { type: 'string' },
      override: { type: 'string' },
      'no-filter': { type: 'boolean' },
      providers: { type: 'string' }
    }
  });

  const [file] = positionals;
  if (!file) {
    throw new ConfigError(USAGE);
  }

  const allocation: Partial<AllocationConfig> = {};
  const minCards = parseFlagNumber('min-cards', values['min-cards']);
  if (minCards !== undefined) {
    allocation.minCardsPerVendor = minCards;
  }
  const override = parseFlagNumber('override', values.override);
  if (override !== undefined) {
    allocation.priceOverrideThreshold = override;
  }
  if (values['no-filter']) {
    allocation.enableFiltering = false;
  }

  const args: CliArgs = { file, allocation };
  if (values.providers) {
    args.providers = values.providers
      .split(',')
      .map((name) => name.trim())
      .filter(Boolean);
  }
  return args;
};

import { ConfigError } from './errors.js';
import type { AllocationConfig } from './core/types.js';

export const DEFAULT_ALLOCATION_CONFIG: Readonly<AllocationConfig> = {
  minCardsPerVendor: 3,
  priceOverrideThreshold: 5.0,
  enableFiltering: true
};

export const DEFAULT_PROVIDER_TIMEOUT_MS = 30_000;
export const DEFAULT_CACHE_TTL_SECONDS = 300;

export const DEFAULT_PROVIDER_URLS = {
  cryptmtg: 'https://cryptmtg.com/apps/deck-builder/api/decklist',
  magicarte: 'https://magicartestore.com/apps/deck-builder/api/decklist',
  facetoface: 'https://facetofacegames.com/apps/deck-builder/api/decklist'
} as const;

export type ProviderUrls = Record<keyof typeof DEFAULT_PROVIDER_URLS, string>;

export type AppConfig = {
  allocation: AllocationConfig;
  providerTimeoutMs: number;
  cacheTtlSeconds: number;
  urls: ProviderUrls;
};

/**
 * Fills in defaults and rejects values the allocation engine cannot work with.
 * Runs before any provider is contacted.
 */
export const resolveAllocationConfig = (partial: Partial<AllocationConfig> = {}): AllocationConfig => {
  const config: AllocationConfig = {
    minCardsPerVendor: partial.minCardsPerVendor ?? DEFAULT_ALLOCATION_CONFIG.minCardsPerVendor,
    priceOverrideThreshold: partial.priceOverrideThreshold ?? DEFAULT_ALLOCATION_CONFIG.priceOverrideThreshold,
    enableFiltering: partial.enableFiltering ?? DEFAULT_ALLOCATION_CONFIG.enableFiltering
  };

  if (!Number.isInteger(config.minCardsPerVendor) || config.minCardsPerVendor < 1) {
    throw new ConfigError(`minCardsPerVendor must be an integer >= 1, got ${config.minCardsPerVendor}`);
  }
  if (!Number.isFinite(config.priceOverrideThreshold) || config.priceOverrideThreshold < 0) {
    throw new ConfigError(
      `priceOverrideThreshold must be a finite number >= 0, got ${config.priceOverrideThreshold}`
    );
  }
  return config;
};

const parseNumber = (name: string, value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
};

const parseBoolean = (name: string, value: string | undefined): boolean | undefined => {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      throw new ConfigError(`${name} must be a boolean, got "${value}"`);
  }
};

const positiveOr = (name: string, value: number | undefined, fallback: number): number => {
  if (value === undefined) {
    return fallback;
  }
  if (value <= 0) {
    throw new ConfigError(`${name} must be greater than 0, got ${value}`);
  }
  return value;
};

export const loadEnvConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const allocation = resolveAllocationConfig({
    minCardsPerVendor: parseNumber('MIN_CARDS_PER_VENDOR', env.MIN_CARDS_PER_VENDOR),
    priceOverrideThreshold: parseNumber('PRICE_OVERRIDE_THRESHOLD', env.PRICE_OVERRIDE_THRESHOLD),
    enableFiltering: parseBoolean('ENABLE_VENDOR_FILTERING', env.ENABLE_VENDOR_FILTERING)
  });

  return {
    allocation,
    providerTimeoutMs: positiveOr(
      'PROVIDER_TIMEOUT_MS',
      parseNumber('PROVIDER_TIMEOUT_MS', env.PROVIDER_TIMEOUT_MS),
      DEFAULT_PROVIDER_TIMEOUT_MS
    ),
    cacheTtlSeconds: positiveOr(
      'CACHE_TTL_SECONDS',
      parseNumber('CACHE_TTL_SECONDS', env.CACHE_TTL_SECONDS),
      DEFAULT_CACHE_TTL_SECONDS
    ),
    urls: {
      cryptmtg: env.CRYPTMTG_URL || DEFAULT_PROVIDER_URLS.cryptmtg,
      magicarte: env.MAGICARTE_URL || DEFAULT_PROVIDER_URLS.magicarte,
      facetoface: env.FACETOFACE_URL || DEFAULT_PROVIDER_URLS.facetoface
    }
  };
};

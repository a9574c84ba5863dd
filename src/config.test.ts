import { describe, expect, it } from 'vitest';
import { DEFAULT_PROVIDER_URLS, loadEnvConfig, resolveAllocationConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('resolveAllocationConfig', () => {
  it('applies defaults', () => {
    expect(resolveAllocationConfig()).toEqual({ minCardsPerVendor: 3, priceOverrideThreshold: 5, enableFiltering: true });
  });

  it('keeps provided values', () => {
    expect(resolveAllocationConfig({ minCardsPerVendor: 1, priceOverrideThreshold: 0, enableFiltering: false })).toEqual({
      minCardsPerVendor: 1,
      priceOverrideThreshold: 0,
      enableFiltering: false
    });
  });

  it.each([0, -2, 1.5, Number.NaN])('rejects minCardsPerVendor %s', (minCardsPerVendor) => {
    expect(() => resolveAllocationConfig({ minCardsPerVendor })).toThrow(ConfigError);
  });

  it.each([-0.01, Number.POSITIVE_INFINITY, Number.NaN])('rejects priceOverrideThreshold %s', (priceOverrideThreshold) => {
    expect(() => resolveAllocationConfig({ priceOverrideThreshold })).toThrow(ConfigError);
  });
});

describe('loadEnvConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadEnvConfig({})).toEqual({
      allocation: { minCardsPerVendor: 3, priceOverrideThreshold: 5, enableFiltering: true },
      providerTimeoutMs: 30_000,
      cacheTtlSeconds: 300,
      urls: { ...DEFAULT_PROVIDER_URLS }
    });
  });

  it('reads allocation settings and provider urls', () => {
    const config = loadEnvConfig({
      MIN_CARDS_PER_VENDOR: '4',
      PRICE_OVERRIDE_THRESHOLD: '2.5',
      ENABLE_VENDOR_FILTERING: 'off',
      PROVIDER_TIMEOUT_MS: '5000',
      CRYPTMTG_URL: 'http://localhost:8080/decklist'
    });

    expect(config.allocation).toEqual({ minCardsPerVendor: 4, priceOverrideThreshold: 2.5, enableFiltering: false });
    expect(config.providerTimeoutMs).toBe(5000);
    expect(config.urls.cryptmtg).toBe('http://localhost:8080/decklist');
    expect(config.urls.magicarte).toBe(DEFAULT_PROVIDER_URLS.magicarte);
  });

  it('rejects malformed values', () => {
    expect(() => loadEnvConfig({ MIN_CARDS_PER_VENDOR: 'three' })).toThrow('MIN_CARDS_PER_VENDOR must be a number, got "three"');
    expect(() => loadEnvConfig({ ENABLE_VENDOR_FILTERING: 'maybe' })).toThrow(ConfigError);
    expect(() => loadEnvConfig({ CACHE_TTL_SECONDS: '0' })).toThrow('CACHE_TTL_SECONDS must be greater than 0, got 0');
  });
});

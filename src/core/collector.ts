import Bottleneck from 'bottleneck';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from '../config.js';
import { describeError, TimeoutError } from '../errors.js';
import { logger } from '../util/logger.js';
import { createLimiter, createVendorLimiter } from '../util/rate.js';
import { itemKey } from './normalize.js';
import { notFoundObservation, notFoundObservations } from './observations.js';
import type { PriceObservation, Provider, RequestedItem } from './types.js';

const withTimeout = async <T>(promise: Promise<T>, timeoutMs: number): Promise<T> => {
  let timeoutHandle: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
};

export type ProviderExecution = {
  provider: string;
  found: number;
  durationMs: number;
  timedOut: boolean;
  error?: string;
};

export type CollectedPrices = {
  observations: PriceObservation[];
  executions: ProviderExecution[];
};

/**
 * Coerces a provider's answer to exactly one observation per requested item: observations
 * for unknown items or repeated items are dropped, missing items become not-found.
 */
export const reconcileObservations = (
  vendor: string,
  items: readonly RequestedItem[],
  observations: readonly PriceObservation[]
): PriceObservation[] => {
  const byKey = new Map<string, PriceObservation>();
  for (const observation of observations) {
    if (!byKey.has(observation.requestedKey)) {
      byKey.set(observation.requestedKey, { ...observation, vendor });
    }
  }

  const missing = items.filter((item) => !byKey.has(itemKey(item))).length;
  const extra = observations.length - (items.length - missing);
  if (missing > 0 || extra > 0) {
    logger.warn(`Provider ${vendor} omitted ${missing} item(s) and sent ${extra} unexpected observation(s)`);
  }
  return items.map((item) => byKey.get(itemKey(item)) ?? notFoundObservation(vendor, item));
};

export class PriceCollector {
  private readonly providerLimiters = new Map<string, Bottleneck>();

  constructor(
    private readonly providers: Provider[],
    private readonly globalLimiter: Bottleneck = createLimiter(),
    private readonly timeoutMs: number = DEFAULT_PROVIDER_TIMEOUT_MS
  ) {}

  get providerNames(): string[] {
    return this.providers.map((provider) => provider.name);
  }

  private getLimiter(provider: Provider): Bottleneck {
    const existing = this.providerLimiters.get(provider.name);
    if (existing) {
      return existing;
    }
    const limiter = createVendorLimiter();
    this.providerLimiters.set(provider.name, limiter);
    return limiter;
  }

  resolveProviders(requested?: readonly string[]): Provider[] {
    if (!requested || requested.length === 0) {
      return this.providers;
    }

    const normalized = new Set(requested.map((name) => name.toLowerCase()));
    const selected = this.providers.filter(
      (provider) => normalized.has(provider.id) || normalized.has(provider.name.toLowerCase())
    );

    if (selected.length === 0) {
      logger.warn('No matching providers for request, using all providers', { requested });
      return this.providers;
    }

    return selected;
  }

  private async run(provider: Provider, items: readonly RequestedItem[]): Promise<CollectedPrices> {
    const providerLimiter = this.getLimiter(provider);
    const start = Date.now();

    try {
      const observations = await withTimeout(
        this.globalLimiter.schedule(() => providerLimiter.schedule(() => provider.queryPrices(items))),
        this.timeoutMs
      );
      const reconciled = reconcileObservations(provider.name, items, observations);
      const found = reconciled.filter((observation) => observation.status === 'found').length;
      logger.info(`Provider ${provider.name} found ${found} of ${items.length} item(s)`);
      return {
        observations: reconciled,
        executions: [{ provider: provider.name, found, durationMs: Date.now() - start, timedOut: false }]
      };
    } catch (error) {
      const timedOut = error instanceof TimeoutError;
      const message = describeError(error);
      if (timedOut) {
        logger.warn(`Provider ${provider.name} timed out`, { timeoutMs: this.timeoutMs });
      } else {
        logger.warn(`Provider ${provider.name} failed`, { error: message });
      }
      return {
        observations: notFoundObservations(provider.name, items),
        executions: [
          { provider: provider.name, found: 0, durationMs: Date.now() - start, timedOut, error: message }
        ]
      };
    }
  }

  /**
   * Queries every selected provider for the full item list. A failing provider degrades to
   * not-found for each item; output keeps provider order whatever order they finish in.
   */
  async collect(items: readonly RequestedItem[], providerNames?: readonly string[]): Promise<CollectedPrices> {
    const providers = this.resolveProviders(providerNames);
    const runs = await Promise.all(providers.map((provider) => this.run(provider, items)));
    return {
      observations: runs.flatMap((run) => run.observations),
      executions: runs.flatMap((run) => run.executions)
    };
  }
}

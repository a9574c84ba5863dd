import { beforeAll, describe, expect, it, vi } from 'vitest';
import { createLimiter } from '../util/rate.js';
import { setLogLevel } from '../util/logger.js';
import { PriceCollector, reconcileObservations } from './collector.js';
import { notFoundObservations, observeListings } from './observations.js';
import type { PriceObservation, Provider, RequestedItem } from './types.js';

const items: RequestedItem[] = [
  { name: 'Sol Ring', quantity: 1 },
  { name: 'Counterspell', quantity: 2 }
];

const fakeProvider = (
  id: string,
  name: string,
  queryPrices: (requested: readonly RequestedItem[]) => Promise<PriceObservation[]>
): Provider => ({ id, name, queryPrices });

const listingProvider = (id: string, name: string, price: number, delayMs = 0): Provider =>
  fakeProvider(id, name, async (requested) => {
    if (delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
    return observeListings(name, requested, [{ name: 'Sol Ring', unitPrice: price, availableQuantity: 2 }]);
  });

const fastLimiter = () => createLimiter({ minTime: 0, maxConcurrent: 10 });

beforeAll(() => {
  setLogLevel('error');
});

describe('reconcileObservations', () => {
  it('fills gaps with not-found and drops repeated or unknown keys', () => {
    const reconciled = reconcileObservations('X', items, [
      { status: 'found', requestedKey: 'sol ring', vendor: 'X', matchedName: 'Sol Ring', unitPrice: 1, availableQuantity: 1 },
      { status: 'found', requestedKey: 'sol ring', vendor: 'X', matchedName: 'Sol Ring', unitPrice: 0.5, availableQuantity: 1 },
      { status: 'not-found', requestedKey: 'mox pearl', vendor: 'X' }
    ]);

    expect(reconciled).toEqual([
      { status: 'found', requestedKey: 'sol ring', vendor: 'X', matchedName: 'Sol Ring', unitPrice: 1, availableQuantity: 1 },
      { status: 'not-found', requestedKey: 'counterspell', vendor: 'X' }
    ]);
  });

  it('stamps the provider name as vendor', () => {
    const [observation] = reconcileObservations('CryptMTG', items.slice(0, 1), [
      { status: 'not-found', requestedKey: 'sol ring', vendor: 'somebody else' }
    ]);
    expect(observation.vendor).toBe('CryptMTG');
  });
});

describe('PriceCollector', () => {
  it('returns observations in provider order', async () => {
    const collector = new PriceCollector(
      [listingProvider('slow', 'Slow', 2, 30), listingProvider('fast', 'Fast', 1)],
      fastLimiter()
    );

    const { observations, executions } = await collector.collect(items);

    expect(observations.map((observation) => [observation.vendor, observation.requestedKey])).toEqual([
      ['Slow', 'sol ring'],
      ['Slow', 'counterspell'],
      ['Fast', 'sol ring'],
      ['Fast', 'counterspell']
    ]);
    expect(executions.map((execution) => [execution.provider, execution.found, execution.timedOut])).toEqual([
      ['Slow', 1, false],
      ['Fast', 1, false]
    ]);
  });

  it('turns a failing provider into not-found observations', async () => {
    const collector = new PriceCollector(
      [
        fakeProvider('broken', 'Broken', async () => {
          throw new Error('HTTP 503');
        }),
        listingProvider('ok', 'Ok', 1)
      ],
      fastLimiter()
    );

    const { observations, executions } = await collector.collect(items);

    expect(observations.slice(0, 2)).toEqual(notFoundObservations('Broken', items));
    expect(executions[0]).toMatchObject({ provider: 'Broken', found: 0, timedOut: false, error: 'HTTP 503' });
    expect(executions[1]).toMatchObject({ provider: 'Ok', found: 1 });
  });

  it('gives up on providers that exceed the timeout', async () => {
    const collector = new PriceCollector(
      [fakeProvider('stuck', 'Stuck', () => new Promise<PriceObservation[]>(() => undefined))],
      fastLimiter(),
      20
    );

    const { observations, executions } = await collector.collect(items);

    expect(observations).toEqual(notFoundObservations('Stuck', items));
    expect(executions[0]).toMatchObject({ provider: 'Stuck', timedOut: true, error: 'timed out after 20ms' });
  });

  it('queries only the requested providers, by id or name', async () => {
    const first = vi.fn(async (requested: readonly RequestedItem[]) => notFoundObservations('First', requested));
    const second = vi.fn(async (requested: readonly RequestedItem[]) => notFoundObservations('Second Shop', requested));
    const collector = new PriceCollector(
      [fakeProvider('first', 'First', first), fakeProvider('second', 'Second Shop', second)],
      fastLimiter()
    );

    await collector.collect(items, ['second shop']);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);

    expect(collector.resolveProviders(['FIRST']).map((provider) => provider.id)).toEqual(['first']);
    expect(collector.resolveProviders(['nowhere']).map((provider) => provider.id)).toEqual(['first', 'second']);
  });
});

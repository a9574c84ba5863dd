import { itemKey } from './normalize.js';
import type {
  AggregatedPrices,
  FoundObservation,
  ItemPriceOptions,
  PriceObservation,
  RequestedItem
} from './types.js';

const byUnitPrice = (a: FoundObservation, b: FoundObservation): number => a.unitPrice - b.unitPrice;

export const groupByRequestedKey = (
  observations: readonly PriceObservation[]
): Map<string, PriceObservation[]> => {
  const groups = new Map<string, PriceObservation[]>();
  for (const observation of observations) {
    const group = groups.get(observation.requestedKey);
    if (group) {
      group.push(observation);
    } else {
      groups.set(observation.requestedKey, [observation]);
    }
  }
  return groups;
};

/**
 * Ranks every requested item's found observations by unit price.
 *
 * Items without a single found observation land in `notFound`. Both outputs follow the
 * order of `items`; ties on price keep observation order (Array#sort is stable).
 */
export const aggregatePrices = (
  items: readonly RequestedItem[],
  observations: readonly PriceObservation[]
): AggregatedPrices => {
  const groups = groupByRequestedKey(observations);
  const priced: ItemPriceOptions[] = [];
  const notFound: RequestedItem[] = [];

  for (const item of items) {
    const group = groups.get(itemKey(item)) ?? [];
    const found = group.filter((observation): observation is FoundObservation => observation.status === 'found');
    if (found.length === 0) {
      notFound.push(item);
      continue;
    }
    priced.push({ item, options: [...found].sort(byUnitPrice) });
  }

  return { priced, notFound };
};

import { itemKey, matchListing, normalizeText } from './normalize.js';
import type { FoundObservation, NotFoundObservation, PriceObservation, RequestedItem } from './types.js';

export type Listing = {
  name: string;
  unitPrice: number;
  availableQuantity: number;
};

export const notFoundObservation = (vendor: string, item: RequestedItem): NotFoundObservation => ({
  status: 'not-found',
  requestedKey: itemKey(item),
  vendor
});

export const notFoundObservations = (vendor: string, items: readonly RequestedItem[]): PriceObservation[] =>
  items.map((item) => notFoundObservation(vendor, item));

/**
 * Keys listings by normalized name. When a vendor lists the same card several times
 * (printings, conditions) the cheapest one is kept, in the position of its first appearance.
 */
export const indexListings = (listings: readonly Listing[]): Map<string, Listing> => {
  const index = new Map<string, Listing>();
  for (const listing of listings) {
    const key = normalizeText(listing.name);
    if (!key) {
      continue;
    }
    const existing = index.get(key);
    if (!existing || listing.unitPrice < existing.unitPrice) {
      index.set(key, listing);
    }
  }
  return index;
};

/** Produces exactly one observation per requested item from a vendor's listings. */
export const observeListings = (
  vendor: string,
  items: readonly RequestedItem[],
  listings: readonly Listing[]
): PriceObservation[] => {
  const index = indexListings(listings);
  return items.map((item) => {
    const listing = matchListing(item.name, index);
    if (!listing) {
      return notFoundObservation(vendor, item);
    }
    return {
      status: 'found',
      requestedKey: itemKey(item),
      vendor,
      matchedName: listing.name,
      unitPrice: listing.unitPrice,
      availableQuantity: listing.availableQuantity
    } satisfies FoundObservation;
  });
};

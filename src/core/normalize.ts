import type { RequestedItem } from './types.js';

export const CONDITIONS: readonly string[] = [
  'Near Mint',
  'Lightly Played',
  'Moderately Played',
  'Heavily Played',
  'Damaged'
] as const;

const CONDITION_SUFFIX = new RegExp(`\\s*(?:${CONDITIONS.join('|')}).*$`, 'i');

export const normalizeText = (text: string): string =>
  text.trim().toLowerCase().replace(/\s+/g, ' ');

export const itemKey = (item: Pick<RequestedItem, 'name'>): string => normalizeText(item.name);

/**
 * Reduces a vendor listing title such as `Sol Ring [Commander Masters] Near Mint Foil`
 * to the bare card name.
 */
export const stripListingTitle = (title: string): string =>
  title.replace(CONDITION_SUFFIX, '').replace(/\s*\[.*?\]/g, '').trim();

export const parsePriceText = (text: string | number | undefined): number | undefined => {
  if (typeof text === 'number') {
    return Number.isFinite(text) && text >= 0 ? text : undefined;
  }
  if (!text) {
    return undefined;
  }
  const cleaned = text.replace(/[^\d.,]/g, '').replace(/,/g, '');
  if (!cleaned) {
    return undefined;
  }
  const value = Number.parseFloat(cleaned);
  return Number.isFinite(value) ? value : undefined;
};

/** Accepts `1 / 3` (in cart / in stock), `(5)` or a bare count. */
export const parseStockText = (text: string | number | undefined): number => {
  if (typeof text === 'number') {
    return Number.isInteger(text) && text > 0 ? text : 0;
  }
  if (!text) {
    return 0;
  }
  const match = text.match(/\/\s*(\d+)/) ?? text.match(/\((\d+)\)/) ?? text.match(/^\s*(\d+)\s*$/);
  return match ? Number.parseInt(match[1], 10) : 0;
};

/**
 * Finds the listing answering a requested name: an exact case-folded match first, then the
 * first listing whose name contains, or is contained in, the requested name.
 * The containment fallback can over-match short names; keep every fuzzy rule in here.
 */
export const matchListing = <T>(requestedName: string, listings: ReadonlyMap<string, T>): T | undefined => {
  const key = normalizeText(requestedName);
  if (!key) {
    return undefined;
  }
  const exact = listings.get(key);
  if (exact !== undefined) {
    return exact;
  }
  for (const [listingKey, listing] of listings) {
    if (listingKey.includes(key) || key.includes(listingKey)) {
      return listing;
    }
  }
  return undefined;
};

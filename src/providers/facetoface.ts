import axios from 'axios';
import { DEFAULT_CACHE_TTL_SECONDS, DEFAULT_PROVIDER_TIMEOUT_MS } from '../config.js';
import { ProviderError } from '../errors.js';
import { MemoryCache } from '../core/cache.js';
import { parsePriceText, parseStockText, stripListingTitle } from '../core/normalize.js';
import { observeListings, type Listing } from '../core/observations.js';
import { formatItemList } from '../core/parser.js';
import type { PriceObservation, Provider, RequestedItem } from '../core/types.js';
import type { VendorOptions } from './deckbuilder.js';

type FaceToFaceVariant = {
  condition?: string;
  price?: string | number;
  quantity?: string | number;
};

type FaceToFaceHit = {
  title?: string;
  variants?: FaceToFaceVariant[];
};

type FaceToFaceResponse = {
  hits?: FaceToFaceHit[];
};

type PricedVariant = {
  unitPrice: number;
  availableQuantity: number;
};

// Each hit groups every printing and condition of one card; only variants in stock count.
export const cheapestInStock = (variants: readonly FaceToFaceVariant[]): PricedVariant | undefined => {
  let best: PricedVariant | undefined;
  for (const variant of variants) {
    const unitPrice = parsePriceText(variant.price);
    const availableQuantity = parseStockText(variant.quantity);
    if (unitPrice === undefined || availableQuantity <= 0) {
      continue;
    }
    if (!best || unitPrice < best.unitPrice) {
      best = { unitPrice, availableQuantity };
    }
  }
  return best;
};

const mapHitToListing = (hit: FaceToFaceHit): Listing | null => {
  const name = stripListingTitle(hit.title ?? '');
  if (!name) {
    return null;
  }
  const variant = cheapestInStock(hit.variants ?? []);
  if (!variant) {
    return null;
  }
  return { name, ...variant };
};

export class FaceToFaceProvider implements Provider {
  readonly id = 'facetoface';
  readonly name = 'Face to Face Games';
  private readonly cache: MemoryCache<Listing[]>;

  constructor(private readonly options: VendorOptions) {
    this.cache = new MemoryCache<Listing[]>(options.cacheTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS);
  }

  private async fetchListings(decklist: string): Promise<Listing[]> {
    const response = await axios.post<FaceToFaceResponse>(
      this.options.url,
      { qb: decklist },
      {
        timeout: this.options.requestTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS,
        headers: {
          Accept: 'application/json',
          'User-Agent': 'card-price-compare/0.1'
        }
      }
    );

    const hits = response.data?.hits;
    if (!Array.isArray(hits)) {
      throw new ProviderError(this.name, 'search response has no hits');
    }
    return hits.map((hit) => mapHitToListing(hit)).filter((listing): listing is Listing => listing !== null);
  }

  async queryPrices(items: readonly RequestedItem[]): Promise<PriceObservation[]> {
    const decklist = formatItemList(items);
    const listings = await this.cache.withTtl(decklist, undefined, () => this.fetchListings(decklist));
    return observeListings(this.name, items, listings);
  }
}

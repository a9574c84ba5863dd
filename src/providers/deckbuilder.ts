import axios from 'axios';
import { DEFAULT_CACHE_TTL_SECONDS, DEFAULT_PROVIDER_TIMEOUT_MS } from '../config.js';
import { ProviderError } from '../errors.js';
import { MemoryCache } from '../core/cache.js';
import { parsePriceText, parseStockText, stripListingTitle } from '../core/normalize.js';
import { observeListings, type Listing } from '../core/observations.js';
import { formatItemList } from '../core/parser.js';
import type { PriceObservation, Provider, RequestedItem } from '../core/types.js';
import { logger } from '../util/logger.js';

type DeckBuilderEntry = {
  title?: string;
  price?: string | number;
  quantity?: string | number;
};

type DeckBuilderResponse = {
  items?: DeckBuilderEntry[];
  data?: {
    items?: DeckBuilderEntry[];
  };
};

export type VendorOptions = {
  url: string;
  cacheTtlSeconds?: number;
  requestTimeoutMs?: number;
};

export type DeckBuilderOptions = VendorOptions & {
  id: string;
  name: string;
};

const mapEntryToListing = (entry: DeckBuilderEntry): Listing | null => {
  const name = stripListingTitle(entry.title ?? '');
  const unitPrice = parsePriceText(entry.price);
  if (!name || unitPrice === undefined) {
    return null;
  }
  return {
    name,
    unitPrice,
    availableQuantity: parseStockText(entry.quantity)
  };
};

/**
 * Vendors running the shared Shopify deck-builder widget: the whole list is submitted at
 * once and every matched listing comes back with text price and stock fields.
 */
export class DeckBuilderProvider implements Provider {
  readonly id: string;
  readonly name: string;
  private readonly cache: MemoryCache<Listing[]>;

  constructor(private readonly options: DeckBuilderOptions) {
    this.id = options.id;
    this.name = options.name;
    this.cache = new MemoryCache<Listing[]>(options.cacheTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS);
  }

  private async fetchListings(decklist: string): Promise<Listing[]> {
    const response = await axios.post<DeckBuilderResponse>(
      this.options.url,
      { decklist },
      {
        timeout: this.options.requestTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS,
        headers: {
          Accept: 'application/json',
          'User-Agent': 'card-price-compare/0.1'
        }
      }
    );

    const entries = response.data?.items ?? response.data?.data?.items;
    if (!Array.isArray(entries)) {
      throw new ProviderError(this.name, 'deck builder response has no item list');
    }
    const listings = entries
      .map((entry) => mapEntryToListing(entry))
      .filter((listing): listing is Listing => listing !== null);
    logger.debug(`${this.name} returned ${listings.length} priced listing(s) of ${entries.length}`);
    return listings;
  }

  async queryPrices(items: readonly RequestedItem[]): Promise<PriceObservation[]> {
    const decklist = formatItemList(items);
    const listings = await this.cache.withTtl(decklist, undefined, () => this.fetchListings(decklist));
    return observeListings(this.name, items, listings);
  }
}

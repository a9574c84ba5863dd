export type RequestedItem = {
  name: string;
  quantity: number;
  setCode?: string;
  collectorNumber?: string;
  foil?: boolean;
};

export type FoundObservation = {
  status: 'found';
  requestedKey: string;
  vendor: string;
  matchedName: string;
  unitPrice: number;
  availableQuantity: number;
};

export type NotFoundObservation = {
  status: 'not-found';
  requestedKey: string;
  vendor: string;
};

export type PriceObservation = FoundObservation | NotFoundObservation;

export type ItemPriceOptions = {
  item: RequestedItem;
  /** Found observations, cheapest first. Ties keep the order the providers reported them in. */
  options: readonly FoundObservation[];
};

export type AggregatedPrices = {
  priced: readonly ItemPriceOptions[];
  notFound: readonly RequestedItem[];
};

export type AllocationConfig = {
  minCardsPerVendor: number;
  priceOverrideThreshold: number;
  enableFiltering: boolean;
};

export type BestPrice = {
  vendor: string;
  unitPrice: number;
  quantityNeeded: number;
  quantityAvailable: number;
};

export type BuyListLine = {
  item: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
};

export type VendorSummary = {
  itemCount: number;
  vendorTotal: number;
};

export type AllocationDecision =
  | { kind: 'best-price'; item: string; vendor: string; unitPrice: number }
  | { kind: 'override-kept'; item: string; vendor: string; unitPrice: number; gap: number }
  | {
      kind: 'reassigned';
      item: string;
      fromVendor: string;
      fromPrice: number;
      vendor: string;
      unitPrice: number;
    }
  | { kind: 'sole-source-kept'; item: string; vendor: string; unitPrice: number };

export type AssignmentResult = {
  bestPrices: ReadonlyMap<string, Readonly<BestPrice>>;
  buyLists: ReadonlyMap<string, readonly Readonly<BuyListLine>[]>;
  summary: ReadonlyMap<string, Readonly<VendorSummary>>;
  notFound: readonly string[];
  grandTotal: number;
  filteredVendors: readonly string[];
  decisions: readonly AllocationDecision[];
};

export interface Provider {
  /** Short lowercase identifier used to select the provider. */
  readonly id: string;
  /** Vendor name as it appears in buy lists. */
  readonly name: string;
  queryPrices(items: readonly RequestedItem[]): Promise<PriceObservation[]>;
}

import { logger } from '../util/logger.js';
import type {
  AggregatedPrices,
  AllocationConfig,
  AllocationDecision,
  AssignmentResult,
  BestPrice,
  BuyListLine,
  FoundObservation,
  ItemPriceOptions,
  VendorSummary
} from './types.js';

type VendorAssignment = {
  entry: ItemPriceOptions;
  chosen: FoundObservation;
  decision: AllocationDecision;
};

export const roundMoney = (value: number): number => Math.round(value * 100) / 100;

const naiveDecision = (entry: ItemPriceOptions): VendorAssignment => {
  const [best] = entry.options;
  return {
    entry,
    chosen: best,
    decision: { kind: 'best-price', item: entry.item.name, vendor: best.vendor, unitPrice: best.unitPrice }
  };
};

const countItemsByVendor = (assignments: readonly VendorAssignment[]): Map<string, number> => {
  const counts = new Map<string, number>();
  for (const { chosen } of assignments) {
    counts.set(chosen.vendor, (counts.get(chosen.vendor) ?? 0) + 1);
  }
  return counts;
};

const applyVendorFilter = (
  naive: readonly VendorAssignment[],
  config: AllocationConfig
): { assignments: VendorAssignment[]; filteredVendors: string[] } => {
  const filteredVendors: string[] = [];
  for (const [vendor, count] of countItemsByVendor(naive)) {
    if (count < config.minCardsPerVendor) {
      filteredVendors.push(vendor);
      logger.debug(`Vendor ${vendor} has ${count} item(s), below minimum of ${config.minCardsPerVendor}`);
    }
  }
  const filtered = new Set(filteredVendors);

  // One pass: the receiving vendor is not re-checked against the minimum afterwards.
  const assignments = naive.map((assignment): VendorAssignment => {
    const { entry, chosen } = assignment;
    if (!filtered.has(chosen.vendor)) {
      return assignment;
    }

    const item = entry.item.name;
    const runnerUp = entry.options[1];
    if (!runnerUp) {
      logger.debug(`Keeping ${item} at ${chosen.vendor}, no other vendor carries it`);
      return {
        entry,
        chosen,
        decision: { kind: 'sole-source-kept', item, vendor: chosen.vendor, unitPrice: chosen.unitPrice }
      };
    }

    const gap = runnerUp.unitPrice - chosen.unitPrice;
    if (gap >= config.priceOverrideThreshold) {
      logger.debug(`Keeping ${item} at ${chosen.vendor}, ${gap.toFixed(2)} cheaper than ${runnerUp.vendor}`);
      return {
        entry,
        chosen,
        decision: { kind: 'override-kept', item, vendor: chosen.vendor, unitPrice: chosen.unitPrice, gap }
      };
    }

    logger.debug(
      `Moving ${item}: ${chosen.vendor} (${chosen.unitPrice.toFixed(2)}) -> ${runnerUp.vendor} (${runnerUp.unitPrice.toFixed(2)})`
    );
    return {
      entry,
      chosen: runnerUp,
      decision: {
        kind: 'reassigned',
        item,
        fromVendor: chosen.vendor,
        fromPrice: chosen.unitPrice,
        vendor: runnerUp.vendor,
        unitPrice: runnerUp.unitPrice
      }
    };
  });

  return { assignments, filteredVendors };
};

const buildResult = (
  assignments: readonly VendorAssignment[],
  aggregated: AggregatedPrices,
  filteredVendors: readonly string[]
): AssignmentResult => {
  const bestPrices = new Map<string, BestPrice>();
  const buyLists = new Map<string, BuyListLine[]>();

  for (const { entry, chosen } of assignments) {
    const { item } = entry;
    bestPrices.set(item.name, {
      vendor: chosen.vendor,
      unitPrice: chosen.unitPrice,
      quantityNeeded: item.quantity,
      quantityAvailable: chosen.availableQuantity
    });

    const line: BuyListLine = {
      item: item.name,
      quantity: item.quantity,
      unitPrice: chosen.unitPrice,
      lineTotal: chosen.unitPrice * item.quantity
    };
    const list = buyLists.get(chosen.vendor);
    if (list) {
      list.push(line);
    } else {
      buyLists.set(chosen.vendor, [line]);
    }
  }

  const summary = new Map<string, VendorSummary>();
  let grandTotal = 0;
  for (const [vendor, lines] of buyLists) {
    const vendorTotal = roundMoney(lines.reduce((sum, line) => sum + line.lineTotal, 0));
    summary.set(vendor, { itemCount: lines.length, vendorTotal });
    grandTotal += vendorTotal;
  }

  return {
    bestPrices,
    buyLists,
    summary,
    notFound: aggregated.notFound.map((item) => item.name),
    grandTotal: roundMoney(grandTotal),
    filteredVendors,
    decisions: assignments.map((assignment) => assignment.decision)
  };
};

/**
 * Turns ranked price options into per-vendor buy lists.
 *
 * With filtering disabled every item goes to its cheapest vendor. With filtering enabled,
 * vendors that would receive fewer than `minCardsPerVendor` items lose each item to its
 * next-cheapest vendor, unless that would cost at least `priceOverrideThreshold` more per
 * unit or no other vendor carries the item. Expects a config that already passed
 * `resolveAllocationConfig`.
 */
export const allocateVendors = (aggregated: AggregatedPrices, config: AllocationConfig): AssignmentResult => {
  const naive = aggregated.priced.map(naiveDecision);
  if (!config.enableFiltering) {
    return buildResult(naive, aggregated, []);
  }
  const { assignments, filteredVendors } = applyVendorFilter(naive, config);
  return buildResult(assignments, aggregated, filteredVendors);
};

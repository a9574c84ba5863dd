import { resolveAllocationConfig } from '../config.js';
import { InputError } from '../errors.js';
import { logger } from '../util/logger.js';
import { aggregatePrices } from './aggregator.js';
import { allocateVendors } from './allocation.js';
import type { PriceCollector, ProviderExecution } from './collector.js';
import { parseItemList } from './parser.js';
import type { AllocationConfig, AssignmentResult, PriceObservation, RequestedItem } from './types.js';

export type CompareOptions = {
  allocation?: Partial<AllocationConfig>;
  providers?: readonly string[];
};

export type Comparison = {
  items: RequestedItem[];
  skipped: string[];
  duplicates: string[];
  config: AllocationConfig;
  result: AssignmentResult;
  observations: PriceObservation[];
  executions: ProviderExecution[];
};

export const comparePrices = async (
  listText: string,
  collector: PriceCollector,
  options: CompareOptions = {}
): Promise<Comparison> => {
  const config = resolveAllocationConfig(options.allocation);

  const { items, skipped, duplicates } = parseItemList(listText);
  if (skipped.length > 0) {
    logger.warn(`Skipped ${skipped.length} unreadable line(s)`, { skipped });
  }
  if (duplicates.length > 0) {
    logger.warn(`Ignored ${duplicates.length} repeated item(s)`, { duplicates });
  }
  if (items.length === 0) {
    throw new InputError('The item list contains no readable lines (expected "<quantity> <name>").');
  }
  logger.info(`Comparing prices for ${items.length} item(s)`);

  const { observations, executions } = await collector.collect(items, options.providers);
  const aggregated = aggregatePrices(items, observations);
  const result = allocateVendors(aggregated, config);

  logger.info(
    `Allocated ${result.bestPrices.size} item(s) across ${result.buyLists.size} vendor(s), ${result.notFound.length} not found`
  );

  return { items, skipped, duplicates, config, result, observations, executions };
};

import { ChatInputCommandInteraction, EmbedBuilder } from 'discord.js';
import { PriceCompareError } from '../errors.js';
import type { ProviderExecution, PriceCollector } from '../core/collector.js';
import { comparePrices, type CompareOptions, type Comparison } from '../core/comparison.js';
import { describeDecision, formatBuyList, formatMoney } from '../core/report.js';
import type { AllocationConfig } from '../core/types.js';

const DEFAULT_COLOR = 0x5865f2;
const WARNING_COLOR = 0xe67e22;
const FIELD_LIMIT = 1024;
const DESCRIPTION_LIMIT = 4096;
const MESSAGE_LIMIT = 6000;
const MAX_VENDOR_EMBEDS = 9;
const MIN_SECTION_LENGTH = 64;

const isNonEmpty = (value: string | undefined): value is string => Boolean(value);

/** Discord rejects embed fields over 1024 characters. */
export const clampLines = (lines: readonly string[], limit = FIELD_LIMIT): string => {
  const kept: string[] = [];
  let length = 0;
  for (const [index, line] of lines.entries()) {
    const remaining = lines.length - index;
    const suffix = `… and ${remaining} more`;
    if (length + line.length + 1 > limit - suffix.length - 1) {
      kept.push(suffix);
      return kept.join('\n');
    }
    kept.push(line);
    length += line.length + 1;
  }
  return kept.join('\n');
};

const formatDuration = (durationMs: number): string => {
  if (durationMs >= 1000) {
    const seconds = durationMs / 1000;
    return `${seconds >= 10 ? seconds.toFixed(0) : seconds.toFixed(1)}s`;
  }
  return `${durationMs}ms`;
};

export const buildOptionsFromInteraction = (
  interaction: ChatInputCommandInteraction
): { listText: string; options: CompareOptions } => {
  const allocation: Partial<AllocationConfig> = {};

  const minCards = interaction.options.getInteger('min_cards');
  if (minCards !== null) {
    allocation.minCardsPerVendor = minCards;
  }

  const override = interaction.options.getNumber('override');
  if (override !== null) {
    allocation.priceOverrideThreshold = override;
  }

  const filtering = interaction.options.getBoolean('filtering');
  if (filtering !== null) {
    allocation.enableFiltering = filtering;
  }

  const vendor = interaction.options.getString('vendor');
  const options: CompareOptions = { allocation };
  if (vendor && vendor !== 'all') {
    options.providers = [vendor];
  }

  return { listText: interaction.options.getString('cards', true), options };
};

const buildSettingsSummary = (config: AllocationConfig): string =>
  config.enableFiltering
    ? `**Settings**\n• Min. items per vendor: ${config.minCardsPerVendor}\n• Price override: ${formatMoney(config.priceOverrideThreshold)}`
    : '**Settings**\n• Vendor filtering: off (cheapest price per item)';

export const buildStatusSummary = (executions: readonly ProviderExecution[]): string | undefined => {
  if (executions.length === 0) {
    return undefined;
  }

  const lines = executions.map((execution) => {
    const duration = formatDuration(execution.durationMs);
    if (execution.timedOut) {
      return `• ${execution.provider}: ⚠️ timed out after ${duration}`;
    }
    if (execution.error) {
      return `• ${execution.provider}: ⚠️ ${execution.error} (${duration})`;
    }
    return `• ${execution.provider}: ✅ ${execution.found} found (${duration})`;
  });

  return `**Status**\n${lines.join('\n')}`;
};

/** Discord rejects a message whose embeds hold more than 6000 characters in total. */
class EmbedBudget {
  private remaining = MESSAGE_LIMIT;

  spend(text: string): string {
    this.remaining -= text.length;
    return text;
  }

  /** Clamps `lines` to what is left after `label`; undefined when too little room remains. */
  fit(label: string, lines: readonly string[], limit: number): string | undefined {
    const available = Math.min(limit, this.remaining - label.length);
    if (lines.length === 0 || available < MIN_SECTION_LENGTH) {
      return undefined;
    }
    this.spend(label);
    return this.spend(clampLines(lines, available));
  }
}

export const buildEmbeds = ({ result, skipped, duplicates }: Comparison): EmbedBuilder[] => {
  const budget = new EmbedBudget();
  const overview = new EmbedBuilder()
    .setTitle(budget.spend('Recommended buy lists'))
    .setColor(result.notFound.length > 0 ? WARNING_COLOR : DEFAULT_COLOR)
    .setFooter({ text: budget.spend('Prices retrieved') })
    .setTimestamp(new Date());

  const totals = [...result.summary].map(
    ([vendor, summary]) => `• ${vendor}: ${summary.itemCount} item(s) = ${formatMoney(summary.vendorTotal)}`
  );
  totals.push(`**Grand total: ${formatMoney(result.grandTotal)}**`);
  const description = budget.fit('', totals, DESCRIPTION_LIMIT);
  if (description) {
    overview.setDescription(description);
  }

  const addField = (name: string, lines: readonly string[]): void => {
    const value = budget.fit(name, lines, FIELD_LIMIT);
    if (value) {
      overview.addFields({ name, value });
    }
  };

  addField(
    'Vendor consolidation',
    result.decisions.filter((decision) => decision.kind !== 'best-price').map(describeDecision)
  );
  addField('Not found', result.notFound);
  addField('Ignored lines', [
    ...skipped.map((line) => `unreadable: ${line}`),
    ...duplicates.map((name) => `repeated: ${name}`)
  ]);

  const vendorEmbeds: EmbedBuilder[] = [];
  for (const vendor of [...result.summary.keys()].slice(0, MAX_VENDOR_EMBEDS)) {
    const buyList = budget.fit(vendor, formatBuyList(result, vendor), DESCRIPTION_LIMIT);
    if (!buyList) {
      break;
    }
    vendorEmbeds.push(new EmbedBuilder().setTitle(vendor).setColor(DEFAULT_COLOR).setDescription(buyList));
  }

  return [overview, ...vendorEmbeds];
};

export const handlePricesCommand = async (
  interaction: ChatInputCommandInteraction,
  collector: PriceCollector
): Promise<void> => {
  const { listText, options } = buildOptionsFromInteraction(interaction);

  await interaction.deferReply();

  try {
    const comparison = await comparePrices(listText, collector, options);
    const sections = [buildSettingsSummary(comparison.config), buildStatusSummary(comparison.executions)].filter(
      isNonEmpty
    );

    if (comparison.result.bestPrices.size === 0) {
      await interaction.editReply([...sections, 'No prices found for any item.'].join('\n\n'));
      return;
    }

    await interaction.editReply({ content: sections.join('\n\n'), embeds: buildEmbeds(comparison) });
  } catch (error) {
    if (error instanceof PriceCompareError && error.code !== 'ERR_PROVIDER') {
      await interaction.editReply(`⚠️ ${error.message}`);
      return;
    }
    await interaction.editReply('Something went wrong while comparing prices. Please try again later.');
    throw error;
  }
};

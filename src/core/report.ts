import type { AllocationDecision, AssignmentResult } from './types.js';

export const formatMoney = (value: number): string => `$${value.toFixed(2)}`;

export const describeDecision = (decision: AllocationDecision): string => {
  switch (decision.kind) {
    case 'best-price':
      return `${decision.item}: ${decision.vendor} at ${formatMoney(decision.unitPrice)}`;
    case 'override-kept':
      return `${decision.item}: kept at ${decision.vendor}, ${formatMoney(decision.gap)} cheaper than the next vendor`;
    case 'reassigned':
      return `${decision.item}: moved ${decision.fromVendor} (${formatMoney(decision.fromPrice)}) -> ${decision.vendor} (${formatMoney(decision.unitPrice)})`;
    case 'sole-source-kept':
      return `${decision.item}: kept at ${decision.vendor}, the only vendor carrying it`;
  }
};

export const formatBuyList = (result: AssignmentResult, vendor: string): string[] =>
  (result.buyLists.get(vendor) ?? []).map(
    (line) => `${line.quantity}x ${line.item} @ ${formatMoney(line.unitPrice)} = ${formatMoney(line.lineTotal)}`
  );

export const formatReport = (result: AssignmentResult): string[] => {
  const lines: string[] = ['BEST PRICES BY ITEM'];
  for (const [item, best] of result.bestPrices) {
    lines.push(
      `* ${item}: ${best.quantityNeeded} needed, ${formatMoney(best.unitPrice)} @ ${best.vendor} (${best.quantityAvailable} available)`
    );
  }

  lines.push('', 'BUY LISTS');
  for (const [vendor, summary] of result.summary) {
    lines.push(`${vendor}:`);
    lines.push(...formatBuyList(result, vendor).map((line) => `  * ${line}`));
    lines.push(`  TOTAL: ${formatMoney(summary.vendorTotal)}`);
  }

  const moves = result.decisions.filter((decision) => decision.kind !== 'best-price');
  if (moves.length > 0) {
    lines.push('', 'VENDOR CONSOLIDATION');
    lines.push(...moves.map((decision) => `* ${describeDecision(decision)}`));
  }

  if (result.notFound.length > 0) {
    lines.push('', 'NOT FOUND');
    lines.push(...result.notFound.map((item) => `* ${item}`));
  }

  lines.push('', 'SUMMARY');
  for (const [vendor, summary] of result.summary) {
    lines.push(`${vendor}: ${summary.itemCount} item(s) = ${formatMoney(summary.vendorTotal)}`);
  }
  lines.push(`GRAND TOTAL: ${formatMoney(result.grandTotal)}`);
  return lines;
};

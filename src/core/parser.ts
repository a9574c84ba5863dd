import { itemKey } from './normalize.js';
import type { RequestedItem } from './types.js';

// <qty> <name> [(<SET>) <collector>] [*F*], e.g. `1 Esper Sentinel (PLST) MH2-12`
const LINE_PATTERN = /^(\d+)\s+(.+?)\s*(?:\(([A-Z0-9]+)\)\s*(\S+)(\s+\*F\*)?)?$/;

export type ParsedItemList = {
  items: RequestedItem[];
  skipped: string[];
  duplicates: string[];
};

export const parseItemLine = (line: string): RequestedItem | undefined => {
  const match = line.trim().match(LINE_PATTERN);
  if (!match) {
    return undefined;
  }
  const quantity = Number.parseInt(match[1], 10);
  const name = match[2].trim();
  if (quantity < 1 || !name) {
    return undefined;
  }
  const item: RequestedItem = { name, quantity };
  if (match[3]) {
    item.setCode = match[3];
  }
  if (match[4]) {
    item.collectorNumber = match[4];
  }
  if (match[5]) {
    item.foil = true;
  }
  return item;
};

export const parseItemList = (text: string): ParsedItemList => {
  const result: ParsedItemList = { items: [], skipped: [], duplicates: [] };
  const seen = new Set<string>();

  for (const rawLine of text.split(/[\n;]/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }
    const item = parseItemLine(line);
    if (!item) {
      result.skipped.push(line);
      continue;
    }
    const key = itemKey(item);
    if (seen.has(key)) {
      result.duplicates.push(item.name);
      continue;
    }
    seen.add(key);
    result.items.push(item);
  }

  return result;
};

/** Plain `<qty> <name>` lines, the format vendor deck builders accept. */
export const formatItemList = (items: readonly RequestedItem[]): string =>
  items.map((item) => `${item.quantity} ${item.name}`).join('\n');

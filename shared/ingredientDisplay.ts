import type { ShoppingListEntry } from './types/index.js';

/** One shopping-list line: "flour — 500 g". */
export function formatShoppingListLine(entry: ShoppingListEntry): string {
  return `${entry.name} — ${entry.amount} ${entry.measurementUnit}`.trim();
}

/**
 * Canonical document order: newest publish date first, ties kept in
 * discovery order. Every listing, tag page and export uses this order.
 */

import type { Document } from "./schema.js";

export function compareDocuments(a: Document, b: Document): number {
  const byDate = b.date.getTime() - a.date.getTime();
  if (byDate !== 0) return byDate;
  return a.discoveryIndex - b.discoveryIndex;
}

/**
 * Sorted copy; the input is left untouched. Idempotent.
 */
export function sortDocuments(documents: readonly Document[]): Document[] {
  return [...documents].sort(compareDocuments);
}

/**
 * texnames Engine — Extras Merger
 *
 * Adds hand-curated packages the catalog does not resolve. Entries
 * resolved from the catalog are never replaced.
 */

import type { CompletionEntry, CompletionTable } from "./types";

export type ExtrasTable = ReadonlyMap<string, CompletionEntry>;

export function mergeExtras(
  packages: CompletionTable,
  extras: ExtrasTable,
): CompletionTable {
  const merged: CompletionTable = new Map();
  for (const [name, entry] of packages) {
    merged.set(name, { ...entry });
  }
  for (const [name, entry] of extras) {
    if (!merged.has(name)) {
      merged.set(name, { ...entry });
    }
  }
  return merged;
}

/**
 * texnames Engine — Class Extractor
 */

import { fileExtension, fileStem } from "./lsr";
import type { CatalogTable, CompletionTable } from "./types";

/**
 * Build the class table from every .cls file of the index. Classes
 * without a catalog entry get an empty detail and documentation.
 */
export function extractClasses(
  allFiles: readonly string[],
  catalog: CatalogTable,
): CompletionTable {
  const classes: CompletionTable = new Map();

  for (const file of allFiles) {
    if (fileExtension(file) !== ".cls") continue;
    const stem = fileStem(file);
    const entry = catalog.get(stem);
    classes.set(stem, {
      command: stem,
      detail: entry?.detail ?? "",
      documentation: entry?.documentation ?? "",
    });
  }

  return classes;
}

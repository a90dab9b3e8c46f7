/**
 * texnames Engine — Catalog Loader
 *
 * Fetches the CTAN package list and turns it into the catalog table:
 *
 *   [{ key: "foo", caption: "Foo package", ... }, ...]
 *     → Map { "foo" → { command: "foo", detail: "Foo package",
 *                       documentation: "https://ctan.org/pkg/foo" } }
 */

import { z } from "zod";
import { GeneratorError, errorMessage } from "./errors";
import type { CatalogEntry, CatalogTable, FetchFunction } from "./types";
import type { Logger } from "./utils/logger";

export const DEFAULT_CATALOG_URL = "https://ctan.org/json/2.0/packages";

export const DOCUMENTATION_BASE_URL = "https://ctan.org/pkg/";

const CatalogEntrySchema = z.object({
  key: z.string(),
  caption: z.string(),
});

const CatalogSchema = z.array(CatalogEntrySchema);

/**
 * Validate the decoded catalog payload. Extra fields are dropped.
 */
export function parseCatalogEntries(raw: unknown): CatalogEntry[] {
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `/${issue.path.join("/")}` : "/";
    throw new GeneratorError(
      "VALIDATION_ERROR",
      `Malformed catalog response at ${where}: ${issue?.message ?? "invalid data"}`,
      parsed.error,
    );
  }
  return parsed.data;
}

export function buildCatalogTable(entries: CatalogEntry[]): CatalogTable {
  const table: CatalogTable = new Map();
  for (const entry of entries) {
    table.set(entry.key, {
      command: entry.key,
      detail: entry.caption,
      documentation: DOCUMENTATION_BASE_URL + entry.key,
    });
  }
  return table;
}

/**
 * Download and validate the package list. One request, no retries.
 */
export async function fetchCatalog(
  url: string,
  fetchImpl: FetchFunction,
  logger: Logger,
): Promise<CatalogEntry[]> {
  logger.info({ url }, "Fetching package catalog");

  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (err: unknown) {
    throw new GeneratorError(
      "NETWORK_ERROR",
      `Catalog request failed: ${errorMessage(err)}`,
      err,
    );
  }

  if (!response.ok) {
    throw new GeneratorError(
      "NETWORK_ERROR",
      `Catalog request failed: HTTP ${response.status} for ${url}`,
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err: unknown) {
    throw new GeneratorError(
      "VALIDATION_ERROR",
      `Catalog response is not valid JSON: ${errorMessage(err)}`,
      err,
    );
  }

  const entries = parseCatalogEntries(body);
  logger.debug({ entries: entries.length }, "Catalog received");
  return entries;
}

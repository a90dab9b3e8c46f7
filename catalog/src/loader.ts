/**
 * texnames Catalog — Extras Loader
 *
 * Reads the operator-curated table of packages that the CTAN catalog
 * cannot resolve on its own (tikz lives in pgf, graphicx in graphics, ...).
 *
 *   <catalog_dir>/
 *     extra-packagenames.json
 *     schema.json
 *
 * Any problem with the file is fatal for the run.
 */

import * as fs from "fs";
import * as path from "path";
import { errorMessage } from "@texnames/engine";
import type { ExtrasTable } from "@texnames/engine";
import { ExtrasError } from "./errors";
import { checkExtras } from "./validator";

/** The curated file shipped with this package */
export const CURATED_EXTRAS_PATH = path.join(__dirname, "..", "extra-packagenames.json");

/**
 * Turn decoded JSON into an extras table, or throw ExtrasError.
 */
export function parseExtras(data: unknown, source = "extras"): ExtrasTable {
  const result = checkExtras(data);
  if (result.extras === null) {
    const first = result.errors[0];
    const summary = first ? `${first.path}: ${first.message}` : "invalid data";
    throw new ExtrasError(`Invalid ${source} (${summary})`, result.errors);
  }
  return new Map(Object.entries(result.extras));
}

/**
 * Read and validate an extras file.
 */
export function loadExtras(filePath: string = CURATED_EXTRAS_PATH): ExtrasTable {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    throw new ExtrasError(`Cannot read extras file ${filePath}: ${errorMessage(err)}`, [], err);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err: unknown) {
    throw new ExtrasError(`Extras file ${filePath} is not valid JSON: ${errorMessage(err)}`, [], err);
  }

  return parseExtras(data, `extras file ${filePath}`);
}

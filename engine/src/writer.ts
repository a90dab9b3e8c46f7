/**
 * texnames Engine — Table Writer
 *
 * Serializes completion tables as key-sorted, 2-space indented JSON.
 * Non-ASCII text is written as-is.
 */

import * as fs from "fs";
import * as path from "path";
import { GeneratorError, errorMessage } from "./errors";
import type { CompletionEntry, CompletionTable, WrittenFiles } from "./types";

const INDENT = "  ";

/** Code point order; `<` on strings compares UTF-16 code units. */
export function compareKeys(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

function formatEntry(entry: CompletionEntry, depth: number): string {
  const pad = INDENT.repeat(depth);
  const fields: Array<[string, string]> = [
    ["command", entry.command],
    ["detail", entry.detail],
    ["documentation", entry.documentation],
  ];
  const lines = fields.map(
    ([field, value]) => `${pad}${INDENT}${JSON.stringify(field)}: ${JSON.stringify(value)}`,
  );
  return `{\n${lines.join(",\n")}\n${pad}}`;
}

/**
 * Object keys are emitted in code point order. The entries are formatted
 * by hand so integer-like keys keep their sorted position.
 */
export function formatTable(table: ReadonlyMap<string, CompletionEntry>): string {
  const keys = [...table.keys()].sort(compareKeys);
  if (keys.length === 0) return "{}";

  const lines: string[] = [];
  for (const key of keys) {
    const entry = table.get(key);
    if (!entry) continue;
    lines.push(`${INDENT}${JSON.stringify(key)}: ${formatEntry(entry, 1)}`);
  }
  return `{\n${lines.join(",\n")}\n}`;
}

export interface TableFiles {
  packagesFile: string;
  classesFile: string;
}

/**
 * Write both tables. Callers build both tables first, so a failed run
 * leaves no half-generated pair behind.
 */
export function writeTables(
  outputDir: string,
  files: TableFiles,
  packages: CompletionTable,
  classes: CompletionTable,
): WrittenFiles {
  const written: WrittenFiles = {
    packages: path.join(outputDir, files.packagesFile),
    classes: path.join(outputDir, files.classesFile),
  };

  try {
    fs.mkdirSync(outputDir, { recursive: true });
    fs.writeFileSync(written.packages, formatTable(packages), "utf-8");
    fs.writeFileSync(written.classes, formatTable(classes), "utf-8");
  } catch (err: unknown) {
    throw new GeneratorError(
      "IO_ERROR",
      `Failed to write output to ${outputDir}: ${errorMessage(err)}`,
      err,
    );
  }

  return written;
}

/**
 * texnames Engine — ls-R Parser
 *
 * Reads the kpathsea filename database of a TEXMF tree:
 *
 *   ./tex/latex/foo:
 *   foo.sty
 *   foo-extra.def
 *
 *   ./tex/latex/bar:
 *   ...
 *
 * Each directory block is attributed to the innermost path segment that is
 * a known package name. Only .sty, .def and .cls files are collected, and
 * only from attributed blocks. Blocks under ./doc and ./source hold no
 * loadable files and are excluded.
 */

import type { PackageFileMap, ParsedIndex } from "./types";

export const RELEVANT_EXTENSIONS: ReadonlySet<string> = new Set([".sty", ".def", ".cls"]);

export const EXCLUDED_ROOTS: ReadonlySet<string> = new Set(["doc", "source"]);

const HEADER_PREFIX = "./";

/**
 * Extension including the dot, or "" when there is none.
 * A leading dot (".hidden") is not an extension.
 */
export function fileExtension(name: string): string {
  const base = baseName(name);
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(dot) : "";
}

/**
 * File name without its last extension.
 */
export function fileStem(name: string): string {
  const base = baseName(name);
  const ext = fileExtension(base);
  return ext ? base.slice(0, -ext.length) : base;
}

export function baseName(name: string): string {
  return name.slice(name.lastIndexOf("/") + 1);
}

export function isDirectoryHeader(line: string): boolean {
  return line.startsWith(HEADER_PREFIX) && line.endsWith(":");
}

/**
 * Path segments of a header line, outermost first. "." and empty
 * segments are dropped.
 */
export function headerSegments(line: string): string[] {
  return line
    .slice(0, -1)
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".");
}

export function isExcludedDirectory(segments: string[]): boolean {
  return segments.length > 0 && EXCLUDED_ROOTS.has(segments[0]);
}

/**
 * Lines of the index. A final newline terminates the last line; it does
 * not open an empty one.
 */
export function splitLines(text: string): string[] {
  const rows = text.split("\n");
  if (rows[rows.length - 1] === "") rows.pop();
  return rows.map((row) => (row.endsWith("\r") ? row.slice(0, -1) : row));
}

/**
 * Innermost segment that names a known package, if any.
 */
export function resolveDirectoryPackage(
  segments: string[],
  knownPackages: ReadonlySet<string> | ReadonlyMap<string, unknown>,
): string | undefined {
  for (let i = segments.length - 1; i >= 0; i--) {
    if (knownPackages.has(segments[i])) return segments[i];
  }
  return undefined;
}

export function parseLsR(
  text: string,
  knownPackages: ReadonlySet<string> | ReadonlyMap<string, unknown>,
): ParsedIndex {
  const packageFiles: PackageFileMap = new Map();
  const allFiles: string[] = [];

  let current: string | undefined;
  let blockFiles: string[] = [];

  for (const line of splitLines(text)) {
    if (isDirectoryHeader(line)) {
      const segments = headerSegments(line);
      current = isExcludedDirectory(segments)
        ? undefined
        : resolveDirectoryPackage(segments, knownPackages);
      blockFiles = [];
      continue;
    }

    if (current === undefined) continue;

    if (line === "") {
      if (blockFiles.length > 0) {
        const existing = packageFiles.get(current);
        if (existing) {
          existing.push(...blockFiles);
        } else {
          packageFiles.set(current, blockFiles);
        }
      }
      current = undefined;
      blockFiles = [];
      continue;
    }

    if (RELEVANT_EXTENSIONS.has(fileExtension(line))) {
      const name = baseName(line);
      blockFiles.push(name);
      allFiles.push(name);
    }
  }

  return { packageFiles, allFiles };
}

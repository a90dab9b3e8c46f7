/**
 * texnames Engine — Type Definitions
 *
 * Shapes shared by the engine, the curated extras catalog and the CLI.
 */

import type { LogLevel } from "./utils/logger";

// ─── Catalog ─────────────────────────────────────────────────────

/** One raw record of the remote package catalog */
export interface CatalogEntry {
  key: string;
  caption: string;
}

/** One completion item, as written to the output JSON files */
export interface CompletionEntry {
  /** Name inserted by the editor (package stem or class stem) */
  command: string;
  /** One-line description shown next to the item */
  detail: string;
  /** Documentation link, empty when unknown */
  documentation: string;
}

/** Catalog key → record built from the catalog */
export type CatalogTable = Map<string, CompletionEntry>;

/** Output key → completion record */
export type CompletionTable = Map<string, CompletionEntry>;

// ─── Filesystem Index ────────────────────────────────────────────

/** Package name → relevant file names found beneath its directories */
export type PackageFileMap = Map<string, string[]>;

export interface ParsedIndex {
  packageFiles: PackageFileMap;
  /** Every relevant file name seen in attributed blocks, in order */
  allFiles: string[];
}

// ─── Errors ──────────────────────────────────────────────────────

export type ErrorCategory = "NETWORK_ERROR" | "VALIDATION_ERROR" | "IO_ERROR";

// ─── Generator ───────────────────────────────────────────────────

export type FetchFunction = typeof fetch;

export interface GeneratorOptions {
  /** TEXMF tree containing the ls-R index */
  texmf: string;
  /** URL of the remote package catalog */
  catalogUrl: string;
  /** Directory receiving the two output files */
  outputDir: string;
  packagesFile: string;
  classesFile: string;
  logLevel: LogLevel;
  /** Override for the HTTP client (defaults to global fetch) */
  fetch?: FetchFunction;
}

export interface GenerationResult {
  packages: CompletionTable;
  classes: CompletionTable;
  stats: GenerationStats;
}

export interface GenerationStats {
  catalogEntries: number;
  indexedPackages: number;
  indexedFiles: number;
  resolvedPackages: number;
  extrasAdded: number;
  classes: number;
}

export interface WrittenFiles {
  packages: string;
  classes: string;
}

export interface RunResult extends GenerationResult {
  files: WrittenFiles;
}

// ─── Events ──────────────────────────────────────────────────────

export type GeneratorStage =
  | "FETCHING_CATALOG"
  | "READING_INDEX"
  | "RESOLVING"
  | "WRITING"
  | "COMPLETED";

export type GeneratorEventType = "stage" | "log";

export interface GeneratorEvent {
  type: GeneratorEventType;
  timestamp: string;
  data: { stage: GeneratorStage; message?: string } | { message: string; level: string };
}

export type GeneratorEventHandler = (event: GeneratorEvent) => void;

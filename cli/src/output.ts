/**
 * texnames CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinner, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for the spinner, and cli-table3 for the summary.
 */

import chalk from "chalk";
import ora from "ora";
import type { Ora } from "ora";
import Table from "cli-table3";
import { GeneratorError } from "@texnames/engine";
import type { GeneratorStage } from "@texnames/engine";
import { ExtrasError } from "@texnames/catalog";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  dim: chalk.gray,
  bold: chalk.bold,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

/**
 * Print a debug message. Only visible with TEXNAMES_LOG_LEVEL=debug.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.dim(`  [debug] ${msg}`));
  }
}

export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

/**
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
}

const ASCII_CHARS = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

export interface TableOptions {
  head: string[];
  rows: string[][];
}

export function printTable({ head, rows }: TableOptions): void {
  const ascii = shouldUseAsciiBorders();
  const table = new Table({
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
    ...(ascii ? { chars: ASCII_CHARS } : {}),
  });
  for (const row of rows) {
    table.push(row);
  }
  console.log(table.toString());
}

// ─── Stage Labels ───────────────────────────────────────────

const STAGE_LABELS: Record<GeneratorStage, string> = {
  FETCHING_CATALOG: "Fetching package catalog",
  READING_INDEX: "Reading filesystem index",
  RESOLVING: "Resolving packages and classes",
  WRITING: "Writing tables",
  COMPLETED: "Done",
};

export function formatStage(stage: GeneratorStage): string {
  return STAGE_LABELS[stage];
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<string, string> = {
  NETWORK_ERROR: "Catalog download failed",
  VALIDATION_ERROR: "Malformed catalog data",
  IO_ERROR: "File access failed",
  EXTRAS_ERROR: "Invalid extras file",
};

export function formatErrorCategory(category: string): string {
  return ERROR_LABELS[category] || category;
}

/**
 * Lines describing a fatal error, first line being the headline.
 */
export function describeFailure(err: unknown): string[] {
  if (err instanceof GeneratorError) {
    return [`${formatErrorCategory(err.category)}: ${err.message}`];
  }
  if (err instanceof ExtrasError) {
    return [
      `${formatErrorCategory("EXTRAS_ERROR")}: ${err.message}`,
      ...err.errors.map((e) => `  [${e.rule}] ${e.path}: ${e.message}`),
    ];
  }
  return [`Error: ${err instanceof Error ? err.message : String(err)}`];
}

export function printFailure(err: unknown): void {
  const [headline, ...details] = describeFailure(err);
  printError(headline);
  for (const line of details) {
    console.error(colors.dim(line));
  }
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}

/**
 * texnames Engine — Errors
 *
 * Every failure of a run is fatal; the category tells the CLI which stage
 * broke.
 */

import type { ErrorCategory } from "./types";

export class GeneratorError extends Error {
  constructor(
    public readonly category: ErrorCategory,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "GeneratorError";
  }
}

/**
 * Describe an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

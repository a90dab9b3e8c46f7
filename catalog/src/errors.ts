/**
 * texnames Catalog — Errors
 */

import type { ValidationError } from "./validator";

/**
 * Raised when the extras file cannot be read, decoded or validated.
 */
export class ExtrasError extends Error {
  constructor(
    message: string,
    public readonly errors: ValidationError[] = [],
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ExtrasError";
  }
}

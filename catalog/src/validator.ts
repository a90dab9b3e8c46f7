/**
 * texnames Catalog — Extras Validator
 *
 * Validates the curated extras file against schema.json with AJV, then
 * applies the rules JSON Schema cannot express.
 */

import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import type { CompletionEntry } from "@texnames/engine";
import schema from "../schema.json";

/** Decoded extras file: package key → completion entry */
export type ExtrasFile = Record<string, CompletionEntry>;

/** A validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  rule: string;
}

const FILE_EXTENSION = /\.(sty|cls|def)$/;

let _validate: ValidateFunction<ExtrasFile> | null = null;

function getValidator(): ValidateFunction<ExtrasFile> {
  if (_validate) return _validate;

  const ajv = new Ajv({ allErrors: true, strict: false });
  addFormats(ajv);

  _validate = ajv.compile<ExtrasFile>(schema);
  return _validate;
}

/** A validation result that also carries the typed data when it passed */
export interface CheckedExtras extends ValidationResult {
  extras: ExtrasFile | null;
}

/**
 * Validate decoded extras data once, keeping the narrowed value.
 */
export function checkExtras(data: unknown): CheckedExtras {
  const validate = getValidator();

  if (!validate(data)) {
    const errors = (validate.errors ?? []).map((err) => ({
      path: err.instancePath || "/",
      message: err.message || "Unknown validation error",
      rule: `schema:${err.keyword}`,
    }));
    return { valid: false, errors, extras: null };
  }

  const errors = validateSemanticRules(data);
  const valid = errors.length === 0;
  return { valid, errors, extras: valid ? data : null };
}

/**
 * Validate decoded extras data against the JSON Schema + semantic rules.
 */
export function validateExtras(data: unknown): ValidationResult {
  const { valid, errors } = checkExtras(data);
  return { valid, errors };
}

function validateSemanticRules(extras: ExtrasFile): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const [key, entry] of Object.entries(extras)) {
    // The editor inserts the command verbatim inside \usepackage{}
    if (FILE_EXTENSION.test(entry.command)) {
      errors.push({
        path: `/${key}/command`,
        message: `Command "${entry.command}" must be a stem, without file extension`,
        rule: "semantic:command-is-stem",
      });
    }
  }

  return errors;
}

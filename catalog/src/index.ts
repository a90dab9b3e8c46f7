/**
 * texnames Catalog — Public API
 *
 * The curated extras table, its validator and its loader.
 */

export { loadExtras, parseExtras, CURATED_EXTRAS_PATH } from "./loader";
export { validateExtras, checkExtras } from "./validator";
export type { ExtrasFile, ValidationResult, ValidationError, CheckedExtras } from "./validator";
export { ExtrasError } from "./errors";

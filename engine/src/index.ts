/**
 * texnames Engine — Public API
 *
 * The CLI and the extras catalog import from here, never from internal
 * modules.
 */

export { NameListGenerator, LSR_FILENAME } from "./generator";
export { GeneratorError, errorMessage } from "./errors";

export {
  buildCatalogTable,
  parseCatalogEntries,
  fetchCatalog,
  DEFAULT_CATALOG_URL,
  DOCUMENTATION_BASE_URL,
} from "./ctan";
export {
  parseLsR,
  fileExtension,
  fileStem,
  RELEVANT_EXTENSIONS,
} from "./lsr";
export { resolvePackages, resolvePackageCommand } from "./resolver";
export { extractClasses } from "./classes";
export { mergeExtras } from "./extras";
export type { ExtrasTable } from "./extras";
export { formatTable, writeTables } from "./writer";
export type { TableFiles } from "./writer";

export type {
  CatalogEntry,
  CompletionEntry,
  CatalogTable,
  CompletionTable,
  PackageFileMap,
  ParsedIndex,
  ErrorCategory,
  FetchFunction,
  GeneratorOptions,
  GenerationResult,
  GenerationStats,
  WrittenFiles,
  RunResult,
  GeneratorStage,
  GeneratorEvent,
  GeneratorEventType,
  GeneratorEventHandler,
} from "./types";

export { createLogger, isLogLevel, LOG_LEVELS } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";

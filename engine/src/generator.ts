/**
 * texnames Engine — Name List Generator
 *
 * Orchestrates one run:
 * 1. Fetches the CTAN package catalog
 * 2. Reads and parses <texmf>/ls-R
 * 3. Resolves catalog packages to installed .sty files
 * 4. Merges the curated extras
 * 5. Collects document classes
 * 6. Writes both tables (run() only)
 *
 * Nothing is written until both tables are complete. The generator has no
 * UI logic; the CLI follows it through events.
 */

import * as fs from "fs";
import * as path from "path";
import { buildCatalogTable, fetchCatalog } from "./ctan";
import { extractClasses } from "./classes";
import { GeneratorError, errorMessage } from "./errors";
import { mergeExtras } from "./extras";
import type { ExtrasTable } from "./extras";
import { parseLsR } from "./lsr";
import { resolvePackages } from "./resolver";
import { writeTables } from "./writer";
import type {
  FetchFunction,
  GenerationResult,
  GeneratorEvent,
  GeneratorEventHandler,
  GeneratorOptions,
  GeneratorStage,
  RunResult,
} from "./types";
import { createLogger } from "./utils/logger";
import type { Logger } from "./utils/logger";

export const LSR_FILENAME = "ls-R";

export class NameListGenerator {
  private logger: Logger;
  private options: GeneratorOptions;
  private fetchImpl: FetchFunction;
  private eventHandlers: GeneratorEventHandler[] = [];

  constructor(options: GeneratorOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = createLogger({ level: options.logLevel });
  }

  /** Location of the filesystem index for the configured tree */
  get indexPath(): string {
    return path.join(this.options.texmf, LSR_FILENAME);
  }

  // ─── Event System ────────────────────────────────────────────

  on(handler: GeneratorEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: GeneratorEvent): void {
    for (const handler of this.eventHandlers) {
      handler(event);
    }
  }

  private emitStage(stage: GeneratorStage, message?: string): void {
    this.emit({
      type: "stage",
      timestamp: new Date().toISOString(),
      data: { stage, message },
    });
  }

  private emitLog(level: string, message: string): void {
    this.emit({
      type: "log",
      timestamp: new Date().toISOString(),
      data: { message, level },
    });
  }

  // ─── Core ────────────────────────────────────────────────────

  /**
   * Build both tables without touching the output directory.
   */
  async generate(extras: ExtrasTable): Promise<GenerationResult> {
    this.emitStage("FETCHING_CATALOG", this.options.catalogUrl);
    const entries = await fetchCatalog(
      this.options.catalogUrl,
      this.fetchImpl,
      this.logger,
    );
    const catalog = buildCatalogTable(entries);

    this.emitStage("READING_INDEX", this.indexPath);
    const text = this.readIndex();
    const { packageFiles, allFiles } = parseLsR(text, catalog);
    this.logger.debug(
      { packages: packageFiles.size, files: allFiles.length },
      "Parsed filesystem index",
    );

    this.emitStage("RESOLVING");
    const resolved = resolvePackages(catalog, packageFiles, allFiles);
    const packages = mergeExtras(resolved, extras);
    const classes = extractClasses(allFiles, catalog);

    const dropped = catalog.size - resolved.size;
    if (dropped > 0) {
      this.emitLog("debug", `${dropped} catalog packages have no installed .sty file`);
    }
    this.logger.info(
      { packages: packages.size, classes: classes.size },
      "Tables generated",
    );

    return {
      packages,
      classes,
      stats: {
        catalogEntries: catalog.size,
        indexedPackages: packageFiles.size,
        indexedFiles: allFiles.length,
        resolvedPackages: resolved.size,
        extrasAdded: packages.size - resolved.size,
        classes: classes.size,
      },
    };
  }

  /**
   * Generate and write both tables.
   */
  async run(extras: ExtrasTable): Promise<RunResult> {
    const result = await this.generate(extras);

    this.emitStage("WRITING", this.options.outputDir);
    const files = writeTables(
      this.options.outputDir,
      {
        packagesFile: this.options.packagesFile,
        classesFile: this.options.classesFile,
      },
      result.packages,
      result.classes,
    );
    this.logger.info({ files }, "Tables written");

    this.emitStage("COMPLETED");
    return { ...result, files };
  }

  // ─── Private ─────────────────────────────────────────────────

  private readIndex(): string {
    try {
      return fs.readFileSync(this.indexPath, "utf-8");
    } catch (err: unknown) {
      throw new GeneratorError(
        "IO_ERROR",
        `Cannot read filesystem index ${this.indexPath}: ${errorMessage(err)}`,
        err,
      );
    }
  }
}

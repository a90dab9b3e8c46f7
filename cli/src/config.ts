/**
 * texnames CLI — Configuration
 *
 * Central location for paths and defaults. Every value can be set through
 * the environment; the positional argument of the command overrides the
 * TEXMF tree. The resolved configuration is passed down explicitly.
 */

import * as path from "path";
import { DEFAULT_CATALOG_URL, isLogLevel, LOG_LEVELS } from "@texnames/engine";
import type { GeneratorOptions, LogLevel } from "@texnames/engine";
import { CURATED_EXTRAS_PATH } from "@texnames/catalog";

/** TEXMF tree of a default TeX Live installation */
export const DEFAULT_TEXMF = "/usr/local/texlive/2019/texmf-dist";

export const PACKAGES_FILENAME = "packagenames.json";
export const CLASSES_FILENAME = "classnames.json";

export interface CliConfig {
  /** TEXMF tree holding ls-R */
  texmf: string;
  /** CTAN package list endpoint */
  catalogUrl: string;
  /** Curated extras merged into the package table */
  extrasFile: string;
  /** Where packagenames.json and classnames.json are written */
  outputDir: string;
  packagesFile: string;
  classesFile: string;
  logLevel: LogLevel;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): CliConfig {
  const logLevel = env.TEXNAMES_LOG_LEVEL || "silent";
  if (!isLogLevel(logLevel)) {
    throw new Error(
      `Unknown TEXNAMES_LOG_LEVEL "${logLevel}". Expected one of: ${LOG_LEVELS.join(", ")}`,
    );
  }

  return {
    texmf: env.TEXNAMES_TEXMF || DEFAULT_TEXMF,
    catalogUrl: env.TEXNAMES_CATALOG_URL || DEFAULT_CATALOG_URL,
    extrasFile: env.TEXNAMES_EXTRAS
      ? path.resolve(cwd, env.TEXNAMES_EXTRAS)
      : CURATED_EXTRAS_PATH,
    outputDir: path.resolve(cwd, env.TEXNAMES_OUTPUT_DIR || "data"),
    packagesFile: PACKAGES_FILENAME,
    classesFile: CLASSES_FILENAME,
    logLevel,
  };
}

/**
 * Build GeneratorOptions from CLI configuration.
 */
export function getGeneratorOptions(
  config: CliConfig,
  texmf?: string,
): GeneratorOptions {
  return {
    texmf: texmf || config.texmf,
    catalogUrl: config.catalogUrl,
    outputDir: config.outputDir,
    packagesFile: config.packagesFile,
    classesFile: config.classesFile,
    logLevel: config.logLevel,
  };
}

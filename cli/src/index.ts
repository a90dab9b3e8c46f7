#!/usr/bin/env node

/**
 * texnames CLI — Entry Point
 *
 * Generates the package-name and class-name completion tables of a LaTeX
 * editor extension.
 *
 *   texnames [texmf]
 *
 * Environment:
 *   TEXNAMES_TEXMF         TEXMF tree (default /usr/local/texlive/2019/texmf-dist)
 *   TEXNAMES_CATALOG_URL   CTAN package list URL
 *   TEXNAMES_EXTRAS        Curated extras file
 *   TEXNAMES_OUTPUT_DIR    Output directory (default ./data)
 *   TEXNAMES_LOG_LEVEL     silent | debug | info | warn | error
 */

import { Command } from "commander";
import { registerGenerateCommand } from "./commands/generate";
import { printFailure } from "./output";

const program = new Command();

program
  .name("texnames")
  .description("Build LaTeX package and class completion tables from CTAN and ls-R")
  .version("0.1.0");

registerGenerateCommand(program);

// Parse command line
program.parseAsync(process.argv).catch((err: unknown) => {
  printFailure(err);
  process.exit(1);
});

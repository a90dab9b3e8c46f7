/**
 * texnames CLI — Generate Command
 *
 * Builds packagenames.json and classnames.json from the CTAN catalog and
 * the ls-R index of a TEXMF tree.
 *
 * Usage:
 *   texnames                 Use the configured TEXMF tree
 *   texnames <texmf>         Use another TEXMF tree, e.g. ~/texlive/2024/texmf-dist
 */

import { Command } from "commander";
import { NameListGenerator } from "@texnames/engine";
import type { GeneratorEvent, RunResult } from "@texnames/engine";
import { loadExtras } from "@texnames/catalog";
import { loadConfig, getGeneratorOptions } from "../config";
import type { CliConfig } from "../config";
import {
  createSpinner,
  formatDuration,
  formatStage,
  printDebug,
  printDetail,
  printSuccess,
  printTable,
  setDebugMode,
  colors,
} from "../output";

export function registerGenerateCommand(
  program: Command,
  env: NodeJS.ProcessEnv = process.env,
): void {
  program
    .argument("[texmf]", "TEXMF tree containing ls-R")
    .allowExcessArguments(false)
    .action(async (texmf: string | undefined) => {
      const config = loadConfig(env);
      await runGenerate(texmf, config);
    });
}

/**
 * Run the generator with terminal feedback. Errors propagate to the
 * caller unchanged.
 */
export async function runGenerate(
  texmf: string | undefined,
  config: CliConfig,
): Promise<RunResult> {
  const options = getGeneratorOptions(config, texmf);
  setDebugMode(options.logLevel === "debug");
  printDebug(`TEXMF tree: ${options.texmf}`);
  printDebug(`Extras file: ${config.extrasFile}`);

  const extras = loadExtras(config.extrasFile);
  const generator = new NameListGenerator(options);
  const spinner = createSpinner(formatStage("FETCHING_CATALOG"));

  generator.on((event: GeneratorEvent) => {
    if ("stage" in event.data) {
      spinner.text = formatStage(event.data.stage);
    } else {
      printDebug(event.data.message);
    }
  });

  const startTime = Date.now();
  spinner.start();

  let result: RunResult;
  try {
    result = await generator.run(extras);
  } finally {
    spinner.stop();
  }

  printSuccess(
    `Generated ${colors.bold(String(result.packages.size))} packages and ` +
      `${colors.bold(String(result.classes.size))} classes in ` +
      formatDuration(Date.now() - startTime),
  );
  printTable({
    head: ["Table", "Entries", "File"],
    rows: [
      ["packages", String(result.packages.size), result.files.packages],
      ["classes", String(result.classes.size), result.files.classes],
    ],
  });
  printDetail("Catalog packages", String(result.stats.catalogEntries));
  printDetail("Installed packages", String(result.stats.resolvedPackages));
  printDetail("Added from extras", String(result.stats.extrasAdded));

  return result;
}

/**
 * texnames CLI — Tests
 *
 * Tests for configuration, output formatting, and the generate command.
 * The CTAN catalog is served by a stubbed global fetch.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Command } from "commander";
import { DEFAULT_CATALOG_URL, GeneratorError } from "@texnames/engine";
import { CURATED_EXTRAS_PATH, ExtrasError } from "@texnames/catalog";
import {
  loadConfig,
  getGeneratorOptions,
  DEFAULT_TEXMF,
} from "../src/config";
import { registerGenerateCommand } from "../src/commands/generate";
import {
  describeFailure,
  formatDuration,
  formatErrorCategory,
  formatStage,
  setDebugMode,
  isDebugMode,
  printDebug,
  colors,
} from "../src/output";

const TEST_DIR = path.join(os.tmpdir(), "texnames-cli-test");
const TEXMF = path.join(TEST_DIR, "texmf");
const OUTPUT_DIR = path.join(TEST_DIR, "data");
const EXTRAS_FILE = path.join(TEST_DIR, "extras.json");

const CATALOG = [
  { key: "foo", caption: "Foo package" },
  { key: "base", caption: "The LaTeX base" },
];

const LS_R = [
  "% ls-R -- filename database for kpathsea; do not change this line.",
  "./tex/latex/foo:",
  "foo.sty",
  "",
  "./tex/latex/base:",
  "article.cls",
  "",
  "",
].join("\n");

const EXTRAS = {
  tikz: { command: "tikz", detail: "Graphics", documentation: "" },
};

function testEnv(): NodeJS.ProcessEnv {
  return {
    TEXNAMES_TEXMF: path.join(TEST_DIR, "unused"),
    TEXNAMES_CATALOG_URL: "https://example.test/json/packages",
    TEXNAMES_EXTRAS: EXTRAS_FILE,
    TEXNAMES_OUTPUT_DIR: OUTPUT_DIR,
  };
}

function createProgram(env: NodeJS.ProcessEnv): Command {
  const program = new Command();
  program.name("texnames").exitOverride().configureOutput({ writeErr: () => {} });
  registerGenerateCommand(program, env);
  return program;
}

// ─── Configuration ───────────────────────────────────────────

describe("Configuration", () => {
  it("uses defaults for an empty environment", () => {
    const config = loadConfig({}, "/work");
    expect(config).toEqual({
      texmf: DEFAULT_TEXMF,
      catalogUrl: DEFAULT_CATALOG_URL,
      extrasFile: CURATED_EXTRAS_PATH,
      outputDir: path.resolve("/work", "data"),
      packagesFile: "packagenames.json",
      classesFile: "classnames.json",
      logLevel: "silent",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig(
      {
        TEXNAMES_TEXMF: "/opt/texmf-dist",
        TEXNAMES_OUTPUT_DIR: "out",
        TEXNAMES_EXTRAS: "curated.json",
        TEXNAMES_LOG_LEVEL: "debug",
      },
      "/work",
    );
    expect(config.texmf).toBe("/opt/texmf-dist");
    expect(config.outputDir).toBe(path.resolve("/work", "out"));
    expect(config.extrasFile).toBe(path.resolve("/work", "curated.json"));
    expect(config.logLevel).toBe("debug");
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ TEXNAMES_LOG_LEVEL: "verbose" }, "/work")).toThrow(
      'Unknown TEXNAMES_LOG_LEVEL "verbose"',
    );
  });

  it("lets the positional argument override the TEXMF tree", () => {
    const config = loadConfig({}, "/work");
    expect(getGeneratorOptions(config, "/home/user/texmf").texmf).toBe("/home/user/texmf");
    expect(getGeneratorOptions(config).texmf).toBe(DEFAULT_TEXMF);
  });
});

// ─── Output Formatting ───────────────────────────────────────

describe("Output Formatting", () => {
  it("formats durations", () => {
    expect(formatDuration(150)).toBe("150ms");
    expect(formatDuration(5500)).toBe("5.5s");
    expect(formatDuration(125000)).toBe("2m 5s");
  });

  it("labels stages", () => {
    expect(formatStage("FETCHING_CATALOG")).toBe("Fetching package catalog");
    expect(formatStage("COMPLETED")).toBe("Done");
  });

  it("maps error categories to human messages", () => {
    expect(formatErrorCategory("NETWORK_ERROR")).toBe("Catalog download failed");
    expect(formatErrorCategory("SOMETHING_ELSE")).toBe("SOMETHING_ELSE");
  });

  it("describes generator errors with their category", () => {
    const err = new GeneratorError("IO_ERROR", "Cannot read filesystem index /x/ls-R");
    expect(describeFailure(err)).toEqual([
      "File access failed: Cannot read filesystem index /x/ls-R",
    ]);
  });

  it("lists extras validation errors", () => {
    const err = new ExtrasError("Invalid extras", [
      { path: "/foo", message: "must be object", rule: "schema:type" },
    ]);
    expect(describeFailure(err)).toEqual([
      "Invalid extras file: Invalid extras",
      "  [schema:type] /foo: must be object",
    ]);
  });

  it("describes unknown errors", () => {
    expect(describeFailure("boom")).toEqual(["Error: boom"]);
  });

  it("toggles debug mode", () => {
    setDebugMode(true);
    expect(isDebugMode()).toBe(true);
    setDebugMode(false);
    expect(isDebugMode()).toBe(false);
  });

  it("prints debug lines dimmed, only in debug mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    try {
      printDebug("hidden");
      setDebugMode(true);
      printDebug("shown");
      expect(log.mock.calls).toEqual([[colors.dim("  [debug] shown")]]);
    } finally {
      setDebugMode(false);
      log.mockRestore();
    }
  });
});

// ─── Launcher ────────────────────────────────────────────────

describe("Launcher", () => {
  const ROOT = path.join(__dirname, "..", "..");

  function binPath(packageDir: string): string {
    const manifest: unknown = JSON.parse(
      fs.readFileSync(path.join(packageDir, "package.json"), "utf-8"),
    );
    if (typeof manifest !== "object" || manifest === null || !("bin" in manifest)) {
      throw new Error(`${packageDir}/package.json has no bin`);
    }
    const bin: unknown = manifest.bin;
    if (typeof bin !== "object" || bin === null || !("texnames" in bin)) {
      throw new Error(`${packageDir}/package.json has no texnames bin`);
    }
    const target: unknown = bin.texnames;
    if (typeof target !== "string") throw new Error("bin target is not a path");
    return path.join(packageDir, target);
  }

  it("points both manifests at the same launcher", () => {
    expect(binPath(ROOT)).toBe(path.join(ROOT, "cli", "bin", "texnames.js"));
    expect(binPath(path.join(ROOT, "cli"))).toBe(path.join(ROOT, "cli", "bin", "texnames.js"));
  });

  it("loads the TypeScript entry point through tsx, not a build output", () => {
    const launcher = fs.readFileSync(binPath(ROOT), "utf-8");

    expect(launcher.split("\n")).toEqual([
      "#!/usr/bin/env node",
      "// Runs the CLI from its TypeScript sources; the workspace packages export .ts files.",
      'require("tsx/cjs");',
      'require("../src/index.ts");',
      "",
    ]);
    expect(fs.existsSync(path.join(ROOT, "cli", "src", "index.ts"))).toBe(true);
  });
});

// ─── Generate Command ────────────────────────────────────────

describe("Generate Command", () => {
  beforeEach(() => {
    fs.mkdirSync(TEXMF, { recursive: true });
    fs.writeFileSync(path.join(TEXMF, "ls-R"), LS_R, "utf-8");
    fs.writeFileSync(EXTRAS_FILE, JSON.stringify(EXTRAS), "utf-8");
    vi.stubGlobal("fetch", async () => new Response(JSON.stringify(CATALOG)));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it("writes both tables for the TEXMF tree given as argument", async () => {
    await createProgram(testEnv()).parseAsync([TEXMF], { from: "user" });

    const packages = fs.readFileSync(path.join(OUTPUT_DIR, "packagenames.json"), "utf-8");
    const classes = fs.readFileSync(path.join(OUTPUT_DIR, "classnames.json"), "utf-8");

    expect(packages).toBe(
      [
        "{",
        '  "foo": {',
        '    "command": "foo",',
        '    "detail": "Foo package",',
        '    "documentation": "https://ctan.org/pkg/foo"',
        "  },",
        '  "tikz": {',
        '    "command": "tikz",',
        '    "detail": "Graphics",',
        '    "documentation": ""',
        "  }",
        "}",
      ].join("\n"),
    );
    expect(JSON.parse(classes)).toEqual({
      article: { command: "article", detail: "", documentation: "" },
    });
  });

  it("uses the configured TEXMF tree without an argument", async () => {
    const env = { ...testEnv(), TEXNAMES_TEXMF: TEXMF };
    await createProgram(env).parseAsync([], { from: "user" });
    expect(fs.existsSync(path.join(OUTPUT_DIR, "packagenames.json"))).toBe(true);
  });

  it("fails without writing when ls-R is missing", async () => {
    const pending = createProgram(testEnv()).parseAsync(
      [path.join(TEST_DIR, "missing")],
      { from: "user" },
    );
    await expect(pending).rejects.toMatchObject({ category: "IO_ERROR" });
    expect(fs.existsSync(OUTPUT_DIR)).toBe(false);
  });

  it("fails on an invalid extras file", async () => {
    fs.writeFileSync(EXTRAS_FILE, JSON.stringify({ foo: { command: "foo" } }), "utf-8");
    const pending = createProgram(testEnv()).parseAsync([TEXMF], { from: "user" });
    await expect(pending).rejects.toBeInstanceOf(ExtrasError);
    expect(fs.existsSync(OUTPUT_DIR)).toBe(false);
  });

  it("rejects more than one argument", async () => {
    const pending = createProgram(testEnv()).parseAsync([TEXMF, "extra"], { from: "user" });
    await expect(pending).rejects.toMatchObject({ code: "commander.excessArguments" });
  });
});

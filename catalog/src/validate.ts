#!/usr/bin/env node

/**
 * texnames Catalog — CLI Validation Tool
 *
 * Validates an extras file (the curated one by default).
 * Run via: npm run validate:extras [-- <file>]
 *
 * Exit codes:
 *   0 - File valid
 *   1 - File missing, unreadable or invalid
 */

import * as fs from "fs";
import { CURATED_EXTRAS_PATH } from "./loader";
import { validateExtras } from "./validator";

const filePath = process.argv[2] ?? CURATED_EXTRAS_PATH;

console.log("texnames Extras Validator");
console.log("=========================\n");

let data: unknown;
try {
  data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
} catch (err: unknown) {
  const msg = err instanceof Error ? err.message : String(err);
  console.log(`  ✖ ${filePath}`);
  console.log(`    - ${msg}\n`);
  process.exit(1);
}

const result = validateExtras(data);

if (result.valid) {
  const count = typeof data === "object" && data !== null ? Object.keys(data).length : 0;
  console.log(`  ✔ ${filePath}`);
  console.log(`\n${count} entr${count === 1 ? "y" : "ies"} checked.`);
  console.log("Extras file is valid.\n");
  process.exit(0);
} else {
  console.log(`  ✖ ${filePath}`);
  for (const error of result.errors) {
    console.log(`    - [${error.rule}] ${error.path}: ${error.message}`);
  }
  console.log("\nExtras file has validation errors.\n");
  process.exit(1);
}

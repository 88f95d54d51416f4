#!/usr/bin/env node

import path from "node:path";
import { fileURLToPath } from "node:url";

import { runCheckCommand } from "./commands/check.js";
import { runRunCommand } from "./commands/run.js";

const usage = [
  "sitescript",
  "  check --root <site dir> [--extension <.js>]",
  "  run --config <site.config.yaml> --path <virtual path> [--entry <name>] [--context-json <json>]",
].join("\n");

export const runSiteCli = async (argv: string[]): Promise<number> => {
  const [mode, ...rest] = argv;
  if (!mode || mode === "--help" || mode === "-h") {
    process.stdout.write(`${usage}\n`);
    return 0;
  }
  if (mode === "check") {
    return runCheckCommand(rest);
  }
  if (mode === "run") {
    return runRunCommand(rest);
  }
  process.stderr.write(`Unknown mode: ${mode}\n${usage}\n`);
  return 1;
};

const currentPath = fileURLToPath(import.meta.url);
const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

/* v8 ignore next 11 */
if (entryPath && currentPath === entryPath) {
  runSiteCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : "Unknown CLI crash.";
      process.stderr.write(`${message}\n`);
      process.exitCode = 1;
    });
}

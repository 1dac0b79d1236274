#!/usr/bin/env node

/**
 * dtcref CLI entry point
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { logger } from "@dtcref/sdk";
import { colorize } from "./lib/render.js";
import { mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";
import { isVerbose } from "./lib/env.js";
import type { GlobalOptions } from "./lib/engine.js";
import { createLookupCommand } from "./commands/lookup.js";
import { createListCommand } from "./commands/list.js";
import { createSearchCommand } from "./commands/search.js";
import { createStatsCommand, createSystemsCommand } from "./commands/systems.js";
import { createInteractiveCommand } from "./commands/interactive.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Version field of this package's package.json
 */
function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

const program = new Command();

// Configure error output with color
program
  .configureOutput({
    writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
  })
  .exitOverride((err) => {
    // Commander has already written usage errors and help to the streams
    process.exit(err.exitCode);
  });

// Global options
program
  .name("dtcref")
  .description("Diagnostic trouble code reference: lookup, filters and keyword search")
  .version(readVersion())
  .option("--corpus <path>", "corpus file (default: DTCREF_CORPUS or the bundled corpus)")
  .option("--scorer <name>", "search ranking: token-sum or phrase-proximity")
  .option("--verbose", "verbose diagnostics")
  .option("--quiet", "suppress non-essential output")
  .hook("preAction", () => {
    const opts = program.opts<GlobalOptions>();
    if (opts.verbose) {
      logger.setLevel("info");
    }
    if (opts.quiet) {
      logger.setEnabled(false);
    }
  });

program.addCommand(createLookupCommand(program));
program.addCommand(createListCommand(program));
program.addCommand(createSearchCommand(program));
program.addCommand(createSystemsCommand(program));
program.addCommand(createStatsCommand(program));
program.addCommand(createInteractiveCommand(program));

// Top-level error handler
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const opts = program.opts<GlobalOptions>();
    const exitCode = mapSdkErrorToExitCode(err);
    const message = formatCliError(err, Boolean(opts.verbose) || isVerbose());

    console.error(`Error: ${message}`);

    process.exit(exitCode);
  }
}

await main();

/**
 * lookup command: one record by code
 */

import { Command } from "commander";
import * as path from "node:path";
import type { OutputFormat, ResultItem } from "@dtcref/sdk";
import { parseFormat } from "../lib/arg.js";
import { openCliEngine, type GlobalOptions } from "../lib/engine.js";
import { isTTY } from "../lib/env.js";
import { getFormatter } from "../lib/formatters.js";
import { writeOutputFile } from "../lib/io.js";
import { emitQueryMetrics, withTiming } from "../lib/telemetry.js";

interface LookupOptions {
  format: OutputFormat;
  output?: string;
}

export const REPORT_TITLE = "Diagnostic Code Report";

export function createLookupCommand(program: Command): Command {
  return new Command("lookup")
    .description("Show the full record for a code")
    .argument("<code>", "diagnostic trouble code, e.g. P0300")
    .option("--format <format>", "output format: text, html or json", parseFormat, "text")
    .option(
      "--output <path>",
      "write a complete report to a file instead of stdout (extension added from --format if missing)"
    )
    .addHelpText(
      "after",
      `
Examples:
  $ dtcref lookup P0300
  $ dtcref lookup p0171 --format json
  $ dtcref lookup P0300 --format html --output report.html`
    )
    .action(async (code: string, options: LookupOptions) => {
      await withTiming("cli.lookup", async () => {
        const opts = program.opts<GlobalOptions>();
        const engine = await openCliEngine(opts);

        const items: ResultItem[] = [{ record: engine.lookupByCode(code) }];
        emitQueryMetrics("lookup");

        if (options.output) {
          const formatter = getFormatter(options.format);
          const report = formatter.render(items, {
            query: "lookup",
            title: REPORT_TITLE,
            standalone: true,
          });
          const outputPath = path.extname(options.output)
            ? options.output
            : `${options.output}.${formatter.extension}`;
          const target = await writeOutputFile(outputPath, `${report}\n`);
          if (!opts.quiet) {
            console.log(`Wrote ${formatter.name} report to ${target}`);
          }
          return;
        }

        const formatter = getFormatter(options.format, { color: isTTY() });
        console.log(formatter.render(items, { query: "lookup" }));
      });
    });
}

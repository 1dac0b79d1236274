/**
 * list command: records matching attribute filters
 */

import { Command } from "commander";
import { openCliEngine, type GlobalOptions } from "../lib/engine.js";
import { isTTY } from "../lib/env.js";
import { createTextFormatter, toJson } from "../lib/formatters.js";
import { printJson } from "../lib/render.js";
import { emitQueryMetrics, withTiming } from "../lib/telemetry.js";

interface ListOptions {
  system?: string;
  severity?: string;
  minSeverity?: string;
  json?: boolean;
}

export const NO_MATCHES = "No matching codes";

export function createListCommand(program: Command): Command {
  return new Command("list")
    .description("List codes by system and/or severity")
    .option("--system <name>", "system label (case-insensitive)")
    .option("--severity <level>", "exact severity: Low, Medium, High or Critical")
    .option("--min-severity <level>", "this severity or worse")
    .option("--json", "output as a JSON array")
    .addHelpText(
      "after",
      `
Examples:
  $ dtcref list --system Engine
  $ dtcref list --severity critical
  $ dtcref list --system "Fuel System" --min-severity medium --json`
    )
    .action(async (options: ListOptions) => {
      await withTiming("cli.list", async () => {
        const opts = program.opts<GlobalOptions>();
        const engine = await openCliEngine(opts);

        const records = engine.filter({
          system: options.system,
          severity: options.severity,
          minSeverity: options.minSeverity,
        });
        emitQueryMetrics("filter");

        if (options.json) {
          printJson(records.map((record) => toJson({ record })));
          return;
        }

        if (records.length === 0) {
          if (!opts.quiet) console.log(NO_MATCHES);
          return;
        }

        const formatter = createTextFormatter({ color: isTTY() });
        console.log(formatter.render(records.map((record) => ({ record })), { query: "filter" }));
      });
    });
}

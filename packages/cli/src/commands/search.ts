/**
 * search command: ranked keyword search
 */

import { Command } from "commander";
import { joinKeywords, parsePositiveInt } from "../lib/arg.js";
import { openCliEngine, type GlobalOptions } from "../lib/engine.js";
import { isTTY } from "../lib/env.js";
import { createTextFormatter, toJson } from "../lib/formatters.js";
import { printJson } from "../lib/render.js";
import { emitQueryMetrics, withTiming } from "../lib/telemetry.js";
import { NO_MATCHES } from "./list.js";

interface SearchOptions {
  limit?: number;
  json?: boolean;
}

export function createSearchCommand(program: Command): Command {
  return new Command("search")
    .description("Search descriptions, causes and actions by keyword")
    .argument("<keywords...>", "words to look for")
    .option("--limit <n>", "maximum number of results", (value: string) =>
      parsePositiveInt(value, "--limit")
    )
    .option("--json", "output as a JSON array")
    .addHelpText(
      "after",
      `
Examples:
  $ dtcref search misfire
  $ dtcref search vacuum leak --limit 3`
    )
    .action(async (keywords: string[], options: SearchOptions) => {
      await withTiming("cli.search", async () => {
        const opts = program.opts<GlobalOptions>();
        const engine = await openCliEngine(opts);

        const hits = engine.search(joinKeywords(keywords), { limit: options.limit });
        emitQueryMetrics("search");

        if (options.json) {
          printJson(hits.map(toJson));
          return;
        }

        if (hits.length === 0) {
          if (!opts.quiet) console.log(NO_MATCHES);
          return;
        }

        const formatter = createTextFormatter({ color: isTTY() });
        console.log(formatter.render(hits, { query: "search" }));
      });
    });
}

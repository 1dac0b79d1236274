/**
 * systems and stats commands: corpus overview
 */

import { Command } from "commander";
import { openCliEngine, type GlobalOptions } from "../lib/engine.js";
import { printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface OverviewOptions {
  json?: boolean;
}

function countLines(counts: Record<string, number>): string[] {
  return Object.entries(counts).map(([label, count]) => `  ${label}: ${count}`);
}

export function createSystemsCommand(program: Command): Command {
  return new Command("systems")
    .description("List systems with their number of codes")
    .option("--json", "output as JSON")
    .action(async (options: OverviewOptions) => {
      await withTiming("cli.systems", async () => {
        const engine = await openCliEngine(program.opts<GlobalOptions>());
        const systems = engine.systems();

        if (options.json) {
          printJson(systems);
        } else {
          printLines(systems.map(({ system, count }) => `${system}: ${count}`));
        }
      });
    });
}

export function createStatsCommand(program: Command): Command {
  return new Command("stats")
    .description("Show record counts by severity, category and system")
    .option("--json", "output as JSON")
    .action(async (options: OverviewOptions) => {
      await withTiming("cli.stats", async () => {
        const engine = await openCliEngine(program.opts<GlobalOptions>());
        const stats = engine.stats();

        if (options.json) {
          printJson(stats);
          return;
        }

        printLines([
          `Total codes: ${stats.total}`,
          "By severity:",
          ...countLines(stats.bySeverity),
          "By category:",
          ...countLines(stats.byCategory),
          "By system:",
          ...countLines(stats.bySystem),
        ]);
      });
    });
}

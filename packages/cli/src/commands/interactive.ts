/**
 * interactive command: line-based query session
 */

import { Command } from "commander";
import { createInterface } from "node:readline/promises";
import { InvalidQueryError, NotFoundError, type Formatter, type QueryEngine } from "@dtcref/sdk";
import { openCliEngine, type GlobalOptions } from "../lib/engine.js";
import { isTTY } from "../lib/env.js";
import { createTextFormatter } from "../lib/formatters.js";
import { isStdinTTY } from "../lib/io.js";
import { withTiming } from "../lib/telemetry.js";
import { NO_MATCHES } from "./list.js";

export const PROMPT = "dtcref> ";

export const HELP_TEXT = [
  "Commands:",
  "  lookup <code>       show the full record for a code",
  "  system <name>       list codes of a system",
  "  severity <level>    list codes of a severity (Low, Medium, High, Critical)",
  "  search <keywords>   search descriptions, causes and actions",
  "  help                show this help",
  "  exit, quit          leave the session",
].join("\n");

/**
 * One interactive session over an engine; output goes through `write`
 */
export class InteractiveSession {
  readonly #engine: QueryEngine;
  readonly #write: (text: string) => void;
  readonly #formatter: Formatter;

  constructor(engine: QueryEngine, write: (text: string) => void, formatter?: Formatter) {
    this.#engine = engine;
    this.#write = write;
    this.#formatter = formatter ?? createTextFormatter();
  }

  /**
   * Run one input line
   * @returns false when the session should end
   */
  handle(line: string): boolean {
    const input = line.trim();
    if (input.length === 0) return true;

    const [first = "", ...rest] = input.split(/\s+/);
    const command = first.toLowerCase();
    const argument = rest.join(" ");

    if (command === "exit" || command === "quit") {
      return false;
    }

    try {
      this.#dispatch(command, argument);
    } catch (err) {
      // Query errors are reported and the session goes on
      if (err instanceof NotFoundError || err instanceof InvalidQueryError) {
        this.#write(`Error: ${err.message}`);
      } else {
        throw err;
      }
    }
    return true;
  }

  #dispatch(command: string, argument: string): void {
    switch (command) {
      case "help":
        this.#write(HELP_TEXT);
        return;
      case "lookup":
        if (!argument) return this.#write("Usage: lookup <code>");
        this.#write(
          this.#formatter.render([{ record: this.#engine.lookupByCode(argument) }], { query: "lookup" })
        );
        return;
      case "system":
        if (!argument) return this.#write("Usage: system <name>");
        this.#writeList(this.#engine.filter({ system: argument }).map((record) => ({ record })));
        return;
      case "severity":
        if (!argument) return this.#write("Usage: severity <level>");
        this.#writeList(this.#engine.filter({ severity: argument }).map((record) => ({ record })));
        return;
      case "search":
        if (!argument) return this.#write("Usage: search <keywords>");
        this.#writeList(this.#engine.search(argument), "search");
        return;
      default:
        this.#write(`Unknown command "${command}". Type "help" for a list of commands.`);
    }
  }

  #writeList(items: Parameters<Formatter["render"]>[0], query: "filter" | "search" = "filter"): void {
    this.#write(items.length === 0 ? NO_MATCHES : this.#formatter.render(items, { query }));
  }
}

export function createInteractiveCommand(program: Command): Command {
  return new Command("interactive")
    .description("Start an interactive query session")
    .action(async () => {
      await withTiming("cli.interactive", async () => {
        const opts = program.opts<GlobalOptions>();
        const engine = await openCliEngine(opts);
        const session = new InteractiveSession(
          engine,
          (text) => console.log(text),
          createTextFormatter({ color: isTTY() })
        );

        const terminal = isStdinTTY();
        const rl = createInterface({ input: process.stdin, output: process.stdout, terminal });

        if (!opts.quiet) {
          console.log(`${engine.size} codes loaded. Type "help" for commands, "exit" to leave.`);
        }

        try {
          rl.setPrompt(PROMPT);
          if (terminal) rl.prompt();
          for await (const line of rl) {
            if (!session.handle(line)) break;
            if (terminal) rl.prompt();
          }
        } finally {
          rl.close();
        }
      });
    });
}

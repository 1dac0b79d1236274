/**
 * Output rendering helpers
 */

import type { Severity } from "@dtcref/sdk";

export type Color = "red" | "green" | "yellow" | "bgRed";

const ANSI: Record<Color, string> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  bgRed: "\x1b[41;97m",
};

const RESET = "\x1b[0m";

const SEVERITY_COLORS: Record<Severity, Color> = {
  Low: "green",
  Medium: "yellow",
  High: "red",
  Critical: "bgRed",
};

/**
 * Print JSON to stdout, indented
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: readonly string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Wrap text in an ANSI color unconditionally
 */
export function paint(text: string, color: Color): string {
  return `${ANSI[color]}${text}${RESET}`;
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }
  return paint(text, color);
}

export function severityColor(severity: Severity): Color {
  return SEVERITY_COLORS[severity];
}

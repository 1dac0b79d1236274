/**
 * Text, HTML and JSON renderings of result sets
 */

import type { CodeRecord, Formatter, OutputFormat, RenderContext, ResultItem } from "@dtcref/sdk";
import { paint, severityColor } from "./render.js";

/**
 * Options for the text formatter
 */
export interface TextFormatterOptions {
  /** Color severities with ANSI escapes */
  color?: boolean;
}

function severityLabel(record: CodeRecord, color: boolean, width = 0): string {
  const label = record.severity.padEnd(width);
  return color ? paint(label, severityColor(record.severity)) : label;
}

function textBlock(record: CodeRecord, color: boolean): string[] {
  const lines = [
    `Error Code: ${record.code}`,
    `Category: ${record.category}`,
    `Description: ${record.description}`,
    `Severity: ${severityLabel(record, color)}`,
    `System: ${record.system}`,
  ];
  if (record.causes.length > 0) {
    lines.push("Possible Causes:", ...record.causes.map((cause) => `  - ${cause}`));
  }
  if (record.actions.length > 0) {
    lines.push("Recommended Actions:", ...record.actions.map((action) => `  - ${action}`));
  }
  return lines;
}

function textSummary(item: ResultItem, color: boolean): string {
  const { record, score } = item;
  const line = `${record.code}  ${severityLabel(record, color, 8)}  ${record.system}: ${record.description}`;
  return score === undefined ? line : `${line} (score ${score})`;
}

/**
 * Plain text: full blocks for lookups, one summary line per record otherwise
 */
export function createTextFormatter(options: TextFormatterOptions = {}): Formatter {
  const color = options.color ?? false;

  return {
    name: "text",
    extension: "txt",
    render(items, context) {
      const lines: string[] = [];
      if (context.title) {
        lines.push(context.title, "=".repeat(context.title.length), "");
      }

      if (context.query === "lookup") {
        items.forEach((item, i) => {
          if (i > 0) lines.push("");
          lines.push(...textBlock(item.record, color));
        });
      } else {
        lines.push(...items.map((item) => textSummary(item, color)));
      }

      return lines.join("\n");
    },
  };
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

/**
 * Escape text for HTML element and attribute content
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const HTML_STYLE = `body { font-family: sans-serif; margin: 2rem; }
.code { border: 1px solid #ccc; border-radius: 4px; padding: 1rem; margin-bottom: 1rem; }
.severity-low { color: #2e7d32; }
.severity-medium { color: #f9a825; }
.severity-high { color: #c62828; }
.severity-critical { color: #fff; background: #c62828; padding: 0 0.25rem; }`;

function htmlList(title: string, items: readonly string[]): string[] {
  if (items.length === 0) return [];
  return [
    `<h3>${escapeHtml(title)}</h3>`,
    "<ul>",
    ...items.map((item) => `<li>${escapeHtml(item)}</li>`),
    "</ul>",
  ];
}

function htmlSection({ record, score }: ResultItem): string {
  const severityClass = `severity-${record.severity.toLowerCase()}`;
  const lines = [
    `<section class="code" id="${escapeHtml(record.code)}">`,
    `<h2>${escapeHtml(record.code)}: ${escapeHtml(record.description)}</h2>`,
    `<p><strong>Severity:</strong> <span class="${severityClass}">${escapeHtml(record.severity)}</span></p>`,
    `<p><strong>System:</strong> ${escapeHtml(record.system)}</p>`,
    `<p><strong>Category:</strong> ${escapeHtml(record.category)}</p>`,
  ];
  if (score !== undefined) {
    lines.push(`<p><strong>Score:</strong> ${score}</p>`);
  }
  lines.push(
    ...htmlList("Possible Causes", record.causes),
    ...htmlList("Recommended Actions", record.actions),
    "</section>"
  );
  return lines.join("\n");
}

/**
 * HTML fragment of one section per record, or a full page when standalone
 */
export const htmlFormatter: Formatter = {
  name: "html",
  extension: "html",
  render(items, context) {
    const body = items.map(htmlSection).join("\n");
    if (!context.standalone) {
      return body;
    }

    const title = escapeHtml(context.title ?? "Diagnostic Code Report");
    return [
      "<!DOCTYPE html>",
      '<html lang="en">',
      "<head>",
      '<meta charset="utf-8">',
      `<title>${title}</title>`,
      `<style>\n${HTML_STYLE}\n</style>`,
      "</head>",
      "<body>",
      `<h1>${title}</h1>`,
      body,
      "</body>",
      "</html>",
    ].join("\n");
  },
};

/**
 * JSON view of a result item; score only for search hits
 */
export function toJson({ record, score }: ResultItem): Record<string, unknown> {
  return {
    code: record.code,
    category: record.category,
    description: record.description,
    severity: record.severity,
    system: record.system,
    causes: [...record.causes],
    actions: [...record.actions],
    ...(score === undefined ? {} : { score }),
  };
}

/**
 * JSON: an object for lookups, an array otherwise
 */
export const jsonFormatter: Formatter = {
  name: "json",
  extension: "json",
  render(items, context: RenderContext) {
    const values = items.map(toJson);
    const data = context.query === "lookup" && values.length === 1 ? values[0] : values;
    return JSON.stringify(data, null, 2);
  },
};

/**
 * Formatter for an output format
 */
export function getFormatter(format: OutputFormat, options: TextFormatterOptions = {}): Formatter {
  switch (format) {
    case "text":
      return createTextFormatter(options);
    case "html":
      return htmlFormatter;
    case "json":
      return jsonFormatter;
  }
}

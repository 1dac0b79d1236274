/**
 * Corpus parsers
 *
 * Text format, one block per code:
 *
 *   Error Code: P0300
 *   Description: Random/Multiple Cylinder Misfire Detected
 *   Severity: High
 *   System: Engine
 *   Possible Causes:
 *     - Spark plug issues
 *   Recommended Actions:
 *     - Inspect spark plugs
 *
 * A block starts at its `Error Code:` line and ends at the next blank line.
 * `#` comments are ignored anywhere. A value on a list header line is split
 * on `|`.
 *
 * Parsers only check structure; record contents are validated by
 * validateRecord().
 */

import { LoadError } from "./errors.js";
import { JsonCorpusSchema } from "./schemas.js";
import type { CorpusFormat, RawRecord } from "./types.js";

type ScalarField = "description" | "severity" | "system";
type ListField = "causes" | "actions";

type FieldSpec =
  | { kind: "code" }
  | { kind: "scalar"; field: ScalarField }
  | { kind: "list"; field: ListField };

const FIELDS = new Map<string, FieldSpec>([
  ["error code", { kind: "code" }],
  ["description", { kind: "scalar", field: "description" }],
  ["severity", { kind: "scalar", field: "severity" }],
  ["system", { kind: "scalar", field: "system" }],
  ["possible causes", { kind: "list", field: "causes" }],
  ["recommended actions", { kind: "list", field: "actions" }],
]);

const KEY_LINE = /^([A-Za-z][A-Za-z ]*?)\s*:\s*(.*)$/;
const BULLET_LINE = /^[-*•]\s*(.*)$/;

/**
 * Strip a leading byte order mark
 */
function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function splitInline(value: string): string[] {
  return value
    .split("|")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse a text corpus into raw records
 * @throws LoadError on structural problems
 */
export function parseCorpusText(text: string): RawRecord[] {
  const records: RawRecord[] = [];
  const lines = stripBom(text).split(/\r?\n/);

  let current: RawRecord | null = null;
  let list: ListField | null = null;
  let seen = new Set<string>();
  // set by a blank line: only an Error Code line may follow
  let closed = false;

  for (const [index, rawLine] of lines.entries()) {
    const lineNo = index + 1;
    const line = rawLine.trim();

    if (line === "") {
      list = null;
      closed = current !== null;
      continue;
    }
    if (line.startsWith("#")) {
      continue;
    }

    // Bullets first: an item such as "- Check: wiring" also looks like a key line
    const bullet = BULLET_LINE.exec(line);
    if (bullet) {
      if (current && closed) {
        throw new LoadError(lineNo, `list item after the end of block ${current.code}`, "syntax");
      }
      if (!current || !list) {
        throw new LoadError(
          lineNo,
          "list item outside of Possible Causes or Recommended Actions",
          "syntax"
        );
      }
      current[list].push(bullet[1] ?? "");
      continue;
    }

    const match = KEY_LINE.exec(line);
    if (!match) {
      throw new LoadError(lineNo, `unexpected line "${line}"`, "syntax");
    }

    const key = (match[1] ?? "").toLowerCase();
    const value = (match[2] ?? "").trim();
    const fieldDef = FIELDS.get(key);
    if (!fieldDef) {
      throw new LoadError(lineNo, `unknown field "${match[1]}"`, "syntax");
    }

    if (fieldDef.kind === "code") {
      if (current) {
        records.push(current);
      }
      current = { code: value, causes: [], actions: [], line: lineNo, lines: { code: lineNo } };
      list = null;
      closed = false;
      seen = new Set([key]);
      continue;
    }

    if (!current) {
      throw new LoadError(lineNo, `"${match[1]}" appears before any Error Code`, "syntax");
    }
    if (closed) {
      throw new LoadError(
        lineNo,
        `"${match[1]}" after the end of block ${current.code} (missing Error Code line)`,
        "syntax"
      );
    }
    if (seen.has(key)) {
      throw new LoadError(lineNo, `repeated field "${match[1]}" in ${current.code}`, "syntax");
    }
    seen.add(key);

    if (fieldDef.kind === "scalar") {
      current[fieldDef.field] = value;
      current.lines[fieldDef.field] = lineNo;
      list = null;
    } else {
      list = fieldDef.field;
      current[fieldDef.field].push(...splitInline(value));
    }
  }

  if (current) {
    records.push(current);
  }

  return records;
}

/**
 * Parse a JSON corpus (array of record objects) into raw records
 *
 * Line numbers are record positions (1-based).
 * @throws LoadError if the document is not valid JSON or a record has the wrong shape
 */
export function parseCorpusJson(text: string): RawRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(stripBom(text));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new LoadError(1, `invalid JSON: ${err.message}`, "syntax", undefined, { cause: err });
    }
    throw err;
  }

  const result = JsonCorpusSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const position = issue?.path[0];
    const line = typeof position === "number" ? position + 1 : 1;
    const field = issue?.path.slice(1).join(".");
    const reason = field ? `${field}: ${issue?.message}` : (issue?.message ?? "invalid corpus");
    throw new LoadError(line, reason, "syntax", undefined, { cause: result.error });
  }

  return result.data.map((record, index) => ({
    code: record.code,
    description: record.description,
    severity: record.severity,
    system: record.system,
    causes: record.causes,
    actions: record.actions,
    line: index + 1,
    lines: {},
  }));
}

/**
 * Pick a corpus format from a file name
 */
export function detectCorpusFormat(filePath: string): CorpusFormat {
  return filePath.toLowerCase().endsWith(".json") ? "json" : "text";
}

/**
 * Parse a corpus in the given format
 */
export function parseCorpus(text: string, format: CorpusFormat = "text"): RawRecord[] {
  return format === "json" ? parseCorpusJson(text) : parseCorpusText(text);
}

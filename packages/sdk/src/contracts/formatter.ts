/**
 * Formatter capability: turns ordered result sets into output documents
 *
 * The engine never renders; formatters live with their callers.
 */

import type { ResultItem, QueryType } from "./query.js";

export type OutputFormat = "text" | "html" | "json";

export interface RenderContext {
  /** Query that produced the items */
  query: QueryType;
  /** Heading for reports, e.g. "Diagnostic Code Report" */
  title?: string;
  /** Render a standalone document (HTML page) rather than a fragment */
  standalone?: boolean;
}

export interface Formatter {
  readonly name: OutputFormat;
  /** File extension for exported reports, without the dot */
  readonly extension: string;
  /** Render items in the given order */
  render(items: readonly ResultItem[], context: RenderContext): string;
}

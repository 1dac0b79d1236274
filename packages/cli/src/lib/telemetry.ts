/**
 * Telemetry and observability helpers
 */

import { metrics, type QueryKind } from "@dtcref/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Emit the engine's counters for one query kind
 */
export function emitQueryMetrics(kind: QueryKind): void {
  const recorded = metrics.getMetrics(kind);
  if (!recorded) {
    return;
  }

  emitMetric(`query.${kind}`, {
    hits: recorded.hitCount,
    misses: recorded.missCount,
    p95_ms: metrics.getP95QueryTime(kind).toFixed(3),
  });
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = performance.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = performance.now() - start;
    emitMetric(label, {
      duration_ms: duration.toFixed(1),
      success,
    });
  }
}

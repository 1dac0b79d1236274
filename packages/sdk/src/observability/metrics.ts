/**
 * Metrics tracking for queries
 */

/**
 * Query kinds tracked by the collector
 */
export type QueryKind = "lookup" | "filter" | "search";

export interface QueryMetrics {
  /** Queries that produced at least one record */
  hitCount: number;
  /** Queries that produced nothing (not found, empty result) */
  missCount: number;
  queryTimeMs: number[];
}

/** Samples kept per series */
const MAX_SAMPLES = 100;

export class MetricsCollector {
  #metrics = new Map<QueryKind, QueryMetrics>();
  #indexBuildTimeMs: number[] = [];

  /**
   * Get or create metrics for a query kind
   */
  #getMetrics(kind: QueryKind): QueryMetrics {
    let metrics = this.#metrics.get(kind);
    if (!metrics) {
      metrics = { hitCount: 0, missCount: 0, queryTimeMs: [] };
      this.#metrics.set(kind, metrics);
    }
    return metrics;
  }

  /**
   * Record one query outcome and its duration
   */
  recordQuery(kind: QueryKind, hit: boolean, ms: number): void {
    const metrics = this.#getMetrics(kind);
    if (hit) {
      metrics.hitCount++;
    } else {
      metrics.missCount++;
    }
    pushSample(metrics.queryTimeMs, ms);
  }

  /**
   * Record index build time
   */
  recordIndexBuild(ms: number): void {
    pushSample(this.#indexBuildTimeMs, ms);
  }

  getMetrics(kind: QueryKind): QueryMetrics | undefined {
    return this.#metrics.get(kind);
  }

  getIndexBuildTimes(): readonly number[] {
    return this.#indexBuildTimeMs;
  }

  /**
   * Calculate hit rate for a query kind
   */
  getHitRate(kind: QueryKind): number {
    const metrics = this.#getMetrics(kind);
    const total = metrics.hitCount + metrics.missCount;
    return total > 0 ? metrics.hitCount / total : 0;
  }

  /**
   * Calculate p95 of a sample series
   */
  getP95(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Get p95 query time
   */
  getP95QueryTime(kind: QueryKind): number {
    return this.getP95(this.#getMetrics(kind).queryTimeMs);
  }

  /**
   * Reset one query kind, or everything
   */
  reset(kind?: QueryKind): void {
    if (kind) {
      this.#metrics.delete(kind);
    } else {
      this.#metrics.clear();
      this.#indexBuildTimeMs = [];
    }
  }
}

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();

/**
 * Metrics tracking for calibration selection
 */

import type { RejectionReason } from "../types.js";

export interface SelectionMetrics {
  selections: number;
  noMatch: number;
  candidatesScanned: number;
  rejections: Record<RejectionReason, number>;
  /** Most recent query durations, oldest first */
  queryTimeMs: number[];
  appends: number;
  /** Fraction of selection attempts that found a calibration */
  hitRate: number;
  p95QueryMs: number;
}

type Counters = Omit<SelectionMetrics, "hitRate" | "p95QueryMs">;

const MAX_SAMPLES = 100;

/**
 * Calculate p95 of a sample
 */
function p95(values: readonly number[]): number {
  if (values.length === 0) return 0;

  const sorted = [...values].sort((a, b) => a - b);
  const idx = Math.ceil(sorted.length * 0.95) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}

/**
 * Per-type counters; each store owns one collector
 */
export class MetricsCollector {
  #metrics = new Map<string, Counters>();

  /**
   * Get or create counters for a calibration type
   */
  #getMetrics(type: string): Counters {
    let metrics = this.#metrics.get(type);
    if (!metrics) {
      metrics = {
        selections: 0,
        noMatch: 0,
        candidatesScanned: 0,
        rejections: { failed: 0, "missing-field": 0, "not-numeric": 0, expression: 0 },
        queryTimeMs: [],
        appends: 0,
      };
      this.#metrics.set(type, metrics);
    }
    return metrics;
  }

  /**
   * Record one selection attempt
   */
  recordSelection(
    type: string,
    outcome: { selected: boolean; scanned: number; rejections: readonly RejectionReason[] }
  ): void {
    const metrics = this.#getMetrics(type);
    if (outcome.selected) {
      metrics.selections++;
    } else {
      metrics.noMatch++;
    }
    metrics.candidatesScanned += outcome.scanned;
    for (const reason of outcome.rejections) {
      metrics.rejections[reason]++;
    }
  }

  /**
   * Record query time
   */
  recordQueryTime(type: string, ms: number): void {
    const metrics = this.#getMetrics(type);
    metrics.queryTimeMs.push(ms);

    // Keep only the last samples to avoid unbounded memory growth
    if (metrics.queryTimeMs.length > MAX_SAMPLES) {
      metrics.queryTimeMs.shift();
    }
  }

  /**
   * Record an index append
   */
  recordAppend(type: string): void {
    this.#getMetrics(type).appends++;
  }

  /**
   * Snapshot of the metrics for a calibration type, or undefined if nothing was recorded
   */
  getMetrics(type: string): SelectionMetrics | undefined {
    const metrics = this.#metrics.get(type);
    if (!metrics) return undefined;

    const attempts = metrics.selections + metrics.noMatch;
    return {
      ...metrics,
      rejections: { ...metrics.rejections },
      queryTimeMs: [...metrics.queryTimeMs],
      hitRate: attempts > 0 ? metrics.selections / attempts : 0,
      p95QueryMs: p95(metrics.queryTimeMs),
    };
  }
}

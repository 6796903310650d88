/**
 * Telemetry and observability helpers
 */

import { isVerbose } from "./env.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format a metric line
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ") + "\n";
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(
  key: string,
  fields: Record<string, unknown>,
  write: (content: string) => void = (content) => {
    process.stderr.write(content);
  }
): void {
  if (!isVerbose()) {
    return;
  }
  write(formatMetric(key, fields));
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  write?: (content: string) => void
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(
      label,
      {
        duration_ms: duration,
        success,
      },
      write
    );
  }
}

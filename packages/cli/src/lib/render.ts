/**
 * Output rendering helpers
 */

import type { IndexRecord, Selection, Verification } from "@calsel/sdk";
import { formatRule } from "@calsel/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Serialize JSON for output (newline-terminated)
 */
export function formatJson(data: unknown, options?: { raw?: boolean }): string {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  return json + "\n";
}

/**
 * Join lines for output (newline-terminated, empty for no lines)
 */
export function formatLines(lines: readonly string[]): string {
  return lines.map((line) => line + "\n").join("");
}

/**
 * Plain object form of a record
 */
export function recordToJson(record: IndexRecord): { seq: number; name: string; header: IndexRecord["header"] } {
  return { seq: record.seq, name: record.name, header: record.header };
}

/**
 * JSON summary of a selection
 */
export function selectionToJson(selection: Selection): Record<string, unknown> {
  const common = {
    policy: selection.policy,
    matches: selection.matches.length,
    rejected: selection.rejections.length,
  };
  if (selection.status === "selected") {
    return { status: "selected", ...recordToJson(selection.record), ...common };
  }
  return { status: "none", reason: selection.reason, ...common };
}

/**
 * One line per rejected candidate
 */
export function rejectionLines(selection: Selection): string[] {
  return selection.rejections.map(
    (rejection) => `rejected ${rejection.record.name}: ${rejection.message}`
  );
}

/**
 * Human-readable verification outcome
 */
export function describeVerification(type: string, name: string, verification: Verification): string {
  if (verification.suitable) {
    return "suitable";
  }
  if (verification.reason === "unknown") {
    return `unsuitable: ${name} is not in the ${type} index`;
  }
  return `unsuitable: line ${verification.rule.line}: ${formatRule(verification.rule)} (${verification.message})`;
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

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

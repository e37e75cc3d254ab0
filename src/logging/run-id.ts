/**
 * Run ID generation and management.
 * Every CLI invocation gets one run ID; it prefixes each log line so the
 * lines of one batch can be pulled out of a shared log file.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${datePart}-${randomBytes(3).toString("hex")}`;
}

let currentRunId: string | null = null;

/**
 * Start a run. An explicit ID is used as given (e.g. from --run-id).
 */
export function initRunId(runId?: string): string {
  currentRunId = runId ?? generateRunId();
  return currentRunId;
}

/** Current run ID, or null before initRunId(). */
export function getRunId(): string | null {
  return currentRunId;
}

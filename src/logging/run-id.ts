/**
 * Build run ID generation and management.
 * Every build invocation gets one ID, stamped on each log line and
 * returned in the build report.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: UTC date + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Start a new run. An explicit ID may be supplied (tests, reruns).
 */
export function initRunId(runId?: string): string {
  currentRunId = runId ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before the first initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}

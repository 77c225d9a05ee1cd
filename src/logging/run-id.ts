/**
 * Run ID generation and management.
 * Each CLI invocation gets a run ID so log lines from one render can be
 * grouped.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short run ID.
 * Format: UTC date + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this process. Call once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}

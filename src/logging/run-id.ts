/**
 * Run ID generation and management.
 * Each assembly run gets a run ID that tags its log entries and output
 * document.
 */

import { randomBytes } from "node:crypto";

/** Format: YYYYMMDD-xxxxxx (six lower-case hex characters). */
export const RUN_ID_PATTERN = /^\d{8}-[0-9a-f]{6}$/;

/**
 * Generate a short, unique run ID (e.g., "20240115-a1b2c3").
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this execution.
 * A caller replaying an earlier run may pass that run's ID; it must match
 * RUN_ID_PATTERN.
 */
export function initRunId(replayOf?: string): string {
  if (replayOf !== undefined && !RUN_ID_PATTERN.test(replayOf)) {
    throw new Error(`Invalid run ID "${replayOf}"; expected YYYYMMDD-xxxxxx`);
  }
  currentRunId = replayOf ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId() is called.
 */
export function getRunId(): string | null {
  return currentRunId;
}

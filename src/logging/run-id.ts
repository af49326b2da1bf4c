/**
 * Run ID for the current process. Log lines of one explorer run share it.
 */

import { randomBytes } from "node:crypto";

const RUN_ID_PATTERN = /^\d{8}-[0-9a-f]{6}$/;

/**
 * UTC date prefix plus a random hex suffix, e.g. "20240115-a1b2c3".
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${datePart}-${randomBytes(3).toString("hex")}`;
}

export function isRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}

let currentRunId: string | null = null;

export function initRunId(now?: Date): string {
  currentRunId = generateRunId(now);
  return currentRunId;
}

/**
 * Adopt an existing run ID, e.g. one handed down by a parent process.
 * @throws Error if the value is not in run ID format
 */
export function setRunId(runId: string): void {
  if (!isRunId(runId)) {
    throw new Error(`Invalid run ID: ${runId}`);
  }
  currentRunId = runId;
}

export function getRunId(): string | null {
  return currentRunId;
}

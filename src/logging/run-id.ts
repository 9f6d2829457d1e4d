/**
 * Run IDs tie log lines, CSV files and the manifest of one generation run
 * together. Shape: UTC date + six hex digits, e.g. "20261018-a1b2c3".
 */

import { randomBytes } from "node:crypto";

export const RUN_ID_PATTERN = /^\d{8}-[0-9a-f]{6}$/;

let currentRunId: string | null = null;

export function generateRunId(now: Date = new Date()): string {
  const day = now.toISOString().slice(0, 10).split("-").join("");
  return `${day}-${randomBytes(3).toString("hex")}`;
}

/**
 * Start a fresh run. Called once per CLI invocation.
 */
export function initRunId(now?: Date): string {
  currentRunId = generateRunId(now);
  return currentRunId;
}

/**
 * Adopt a run ID produced elsewhere, such as one read from a manifest.
 *
 * @throws Error if the ID does not have the generated shape
 */
export function setRunId(runId: string): void {
  if (!RUN_ID_PATTERN.test(runId)) {
    throw new Error(`Invalid run ID "${runId}": expected YYYYMMDD-xxxxxx`);
  }
  currentRunId = runId;
}

/** Null until initRunId or setRunId has been called */
export function getRunId(): string | null {
  return currentRunId;
}

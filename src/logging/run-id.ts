/**
 * Run identifiers.
 *
 * The process gets one id at startup ("20240115-a1b2c3"); every workflow run
 * it executes is named after it and the run timestamp ("20240115-a1b2c3@19508"),
 * so log lines of concurrent runs can be told apart.
 */

import { randomBytes } from "node:crypto";

export function generateRunId(now: Date = new Date()): string {
  const day = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${day}-${randomBytes(3).toString("hex")}`;
}

let processRunId: string | null = null;

/**
 * Set the process run id. A scheduler that already assigned one can hand it
 * over.
 */
export function initRunId(runId: string = generateRunId()): string {
  processRunId = runId;
  return processRunId;
}

export function getRunId(): string | null {
  return processRunId;
}

/**
 * Id of the workflow run at `timestamp`. Starts a process run id on first
 * use when initRunId() was never called.
 */
export function workflowRunId(timestamp: number): string {
  return `${processRunId ?? initRunId()}@${timestamp}`;
}

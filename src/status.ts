import { UnknownStatusError } from "./errors";
import type { JobStatus } from "./types";

// Server labels after lower-casing and collapsing separators to single spaces.
const LABELS = new Map<string, JobStatus>(Object.entries({
  "not started": "NOT_STARTED",
  queued: "QUEUED",
  running: "RUNNING",
  completed: "SUCCESS",
  failed: "FAILED",
} satisfies Record<string, JobStatus>));

const TERMINAL_STATUSES: readonly JobStatus[] = ["SUCCESS", "FAILED"];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function normalizeLabel(label: string): string {
  return label.trim().toLowerCase().replace(/[\s_-]+/g, " ");
}

/**
 * Maps a raw status label to a {@link JobStatus}. Labels the client does not
 * know are rejected, so a newly introduced server state is never mistaken for
 * a terminal or non-terminal one.
 */
export function parseJobStatus(label: string): JobStatus {
  const status = LABELS.get(normalizeLabel(label));
  if (status === undefined) throw new UnknownStatusError(label);
  return status;
}

import type { ManifestSummary } from "./manifest.model";

export const JOB_STATUSES = [
  "PENDING",
  "RUNNING",
  "COMPLETED",
  "FAILED",
  "CANCELLED",
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const ACTIVE_STATUSES: readonly JobStatus[] = ["PENDING", "RUNNING"];

/**
 * Every edge of the job lifecycle. RUNNING -> CANCELLED is further gated
 * on whether the transfer agent can be interrupted.
 */
export const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  PENDING: ["RUNNING", "CANCELLED"],
  RUNNING: ["COMPLETED", "FAILED", "CANCELLED"],
  COMPLETED: [],
  FAILED: [],
  CANCELLED: [],
};

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

export interface Job {
  id: string;
  loadId: string;
  attempt: number;
  status: JobStatus;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  endedAt?: string;
  detail?: string;
  uploadedFiles: number;
  uploadedBytes: number;
}

export const ENTRY_STATUSES = ["STARTED", "COMPLETED", "ERROR"] as const;

export type EntryStatus = (typeof ENTRY_STATUSES)[number];

export function isEntryStatus(value: string): value is EntryStatus {
  return ENTRY_STATUSES.some((status) => status === value);
}

/** Progress of one manifest entry within a job, as the agent reports it. */
export interface JobEntry {
  jobId: string;
  path: string;
  status: EntryStatus;
  size: number;
  error?: string;
  updatedAt: string;
}

export interface RunOptions {
  /** Upload only the first `count` manifest entries */
  count?: number;
  /** The agent reports every entry as uploaded without transferring it */
  mock?: boolean;
}

export interface JobOutcome {
  success: boolean;
  detail?: string;
  uploadedFiles?: number;
  uploadedBytes?: number;
}

export interface JobFilter {
  loadId?: string;
  prefix?: string;
  status?: JobStatus;
}

export interface JobReport {
  job: Job;
  manifest: ManifestSummary;
}

export type RetryPolicy = "reject" | "allow";

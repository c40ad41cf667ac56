import fs from "fs";
import path from "path";
import logger from "../utils/logger";
import { formatElapsed, humanReadableSize } from "../utils/format";
import {
  DISCREPANCY_STATUSES,
  type ListingEntry,
  type ReconciliationReport,
} from "../models/listing.model";
import type { Job, JobEntry, JobReport } from "../models/job.model";
import type { ManifestSummary } from "../models/manifest.model";

const ABSENT = "-";

function elapsed(job: Job): string {
  if (!job.startedAt || !job.endedAt) return ABSENT;
  return formatElapsed(Date.parse(job.endedAt) - Date.parse(job.startedAt));
}

function bytes(value: number): string {
  return `${value} (${humanReadableSize(value)})`;
}

export function renderJobReport({ job, manifest }: JobReport): string {
  const fields: Array<[string, string | number]> = [
    ["load_id", job.loadId],
    ["job_id", job.id],
    ["attempt", job.attempt],
    ["status", job.status],
    ["created_at", job.createdAt],
    ["started_at", job.startedAt ?? ABSENT],
    ["ended_at", job.endedAt ?? ABSENT],
    ["elapsed", elapsed(job)],
    ["manifest_files", manifest.fileCount],
    ["manifest_bytes", bytes(manifest.totalBytes)],
    ["uploaded_files", job.uploadedFiles],
    ["uploaded_bytes", bytes(job.uploadedBytes)],
    ["detail", job.detail ?? ABSENT],
  ];
  return fields.map(([key, value]) => `${key}: ${value}\n`).join("");
}

/** Summary block, a blank line, then one `STATUS\tpath\tsize_a\tsize_b` line per record. */
export function renderReconciliation(report: ReconciliationReport): string {
  const summary = [
    `total: ${report.total}`,
    ...DISCREPANCY_STATUSES.map((status) => `${status}: ${report.counts[status]}`),
  ];
  const size = (entry?: ListingEntry): string => (entry ? String(entry.size) : ABSENT);
  const records = report.records.map(
    (record) => `${record.status}\t${record.path}\t${size(record.a)}\t${size(record.b)}`,
  );

  return [...summary, "", ...records].map((line) => `${line}\n`).join("");
}

export function renderJobLine(job: Job): string {
  return [job.loadId, job.id, job.attempt, job.status, job.updatedAt].join("\t");
}

/** `STATUS\tpath\tsize\terror`, with `-` when the entry has no error. */
export function renderEntryLine(entry: JobEntry): string {
  return [entry.status, entry.path, entry.size, entry.error ?? ABSENT].join("\t");
}

export function renderManifestLine(manifest: ManifestSummary): string {
  return [
    manifest.loadId,
    manifest.fileCount,
    manifest.totalBytes,
    humanReadableSize(manifest.totalBytes),
    manifest.createdAt,
  ].join("\t");
}

export async function writeReport(filePath: string, text: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.promises.writeFile(filePath, text, "utf8");
  logger.info(`Report written to ${filePath}`);
}

import sqlite3 from "sqlite3";
import logger from "../utils/logger";
import type {
  FileEntry,
  Manifest,
  ManifestFilter,
  ManifestSummary,
  OverwritePolicy,
} from "../models/manifest.model";
import {
  ACTIVE_STATUSES,
  isEntryStatus,
  isJobStatus,
  isTerminal,
  type Job,
  type JobEntry,
  type JobFilter,
  type JobStatus,
  type RetryPolicy,
} from "../models/job.model";

interface ManifestRow {
  seq: number;
  load_id: string;
  file_count: number;
  total_bytes: number;
  created_at: string;
}

interface EntryRow {
  path: string;
  size: number;
  checksum: string | null;
}

interface JobRow {
  seq: number;
  job_id: string;
  load_id: string;
  attempt: number;
  status: string;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  ended_at: string | null;
  detail: string | null;
  uploaded_files: number;
  uploaded_bytes: number;
}

interface JobEntryRow {
  job_id: string;
  path: string;
  status: string;
  size: number;
  error: string | null;
  updated_at: string;
}

type SqlParam = string | number | null;

export interface PageCursor {
  createdAt: string;
  seq: number;
}

export interface Page<T> {
  items: T[];
  next: PageCursor | null;
}

export type CreateManifestResult = "created" | "replaced" | "duplicate" | "active_job";

export type CreateJobResult =
  | { status: "created"; job: Job }
  | { status: "missing_manifest" }
  | { status: "exists"; latest: Job };

/**
 * `unchanged` means the entry had already completed; `not_running` means
 * the job is not RUNNING and nothing was written.
 */
export type RecordEntryResult = "recorded" | "unchanged" | "not_running";

export interface JobPatch {
  updatedAt: string;
  startedAt?: string;
  endedAt?: string;
  detail?: string;
  uploadedFiles?: number;
  uploadedBytes?: number;
}

const ACTIVE_LIST = ACTIVE_STATUSES.map((s) => `'${s}'`).join(", ");

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS manifests (
    load_id TEXT PRIMARY KEY,
    file_count INTEGER NOT NULL,
    total_bytes INTEGER NOT NULL,
    created_at TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_manifests_created ON manifests(created_at)`,
  `CREATE TABLE IF NOT EXISTS manifest_entries (
    load_id TEXT NOT NULL,
    position INTEGER NOT NULL,
    path TEXT NOT NULL,
    size INTEGER NOT NULL,
    checksum TEXT,
    PRIMARY KEY (load_id, position),
    UNIQUE (load_id, path)
  )`,
  `CREATE TABLE IF NOT EXISTS jobs (
    job_id TEXT PRIMARY KEY,
    load_id TEXT NOT NULL,
    attempt INTEGER NOT NULL,
    status TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    started_at TEXT,
    ended_at TEXT,
    detail TEXT,
    uploaded_files INTEGER NOT NULL DEFAULT 0,
    uploaded_bytes INTEGER NOT NULL DEFAULT 0,
    UNIQUE (load_id, attempt)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_jobs_created ON jobs(created_at)`,
  `CREATE TABLE IF NOT EXISTS job_entries (
    job_id TEXT NOT NULL,
    path TEXT NOT NULL,
    status TEXT NOT NULL,
    size INTEGER NOT NULL,
    error TEXT,
    updated_at TEXT NOT NULL,
    PRIMARY KEY (job_id, path)
  )`,
  // at most one active job per load, enforced by the store itself
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_jobs_active
    ON jobs(load_id) WHERE status IN (${ACTIVE_LIST})`,
];

const JOB_COLUMNS = `rowid AS seq, job_id, load_id, attempt, status, created_at,
  updated_at, started_at, ended_at, detail, uploaded_files, uploaded_bytes`;

export class DBService {
  private db: sqlite3.Database | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly dbPath: string) {}

  async init(): Promise<void> {
    this.db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const db = new sqlite3.Database(this.dbPath, (err) => {
        if (err) reject(err);
        else resolve(db);
      });
    });
    logger.info(`Connected to database at ${this.dbPath}`);

    await this.run("PRAGMA busy_timeout = 5000");
    if (this.dbPath !== ":memory:") {
      await this.run("PRAGMA journal_mode = WAL");
    }
    for (const statement of SCHEMA) {
      await this.run(statement);
    }
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) return;
    this.db = null;
    await new Promise<void>((resolve, reject) => {
      db.close((err) => (err ? reject(err) : resolve()));
    });
    logger.info("Database connection closed");
  }

  // ── manifests ──────────────────────────────────────────────

  async createManifest(
    manifest: Manifest,
    overwrite: OverwritePolicy,
  ): Promise<CreateManifestResult> {
    return this.transaction<CreateManifestResult>(async () => {
      const existing = await this.get<{ load_id: string }>(
        "SELECT load_id FROM manifests WHERE load_id = ?",
        [manifest.loadId],
      );

      if (existing) {
        if (overwrite === "reject") return "duplicate";

        const active = await this.get<{ job_id: string }>(
          `SELECT job_id FROM jobs WHERE load_id = ? AND status IN (${ACTIVE_LIST})`,
          [manifest.loadId],
        );
        if (active) return "active_job";

        await this.run("DELETE FROM manifest_entries WHERE load_id = ?", [manifest.loadId]);
        await this.run("DELETE FROM manifests WHERE load_id = ?", [manifest.loadId]);
      }

      await this.run(
        `INSERT INTO manifests (load_id, file_count, total_bytes, created_at)
         VALUES (?, ?, ?, ?)`,
        [manifest.loadId, manifest.fileCount, manifest.totalBytes, manifest.createdAt],
      );

      let position = 0;
      for (const entry of manifest.entries) {
        await this.run(
          `INSERT INTO manifest_entries (load_id, position, path, size, checksum)
           VALUES (?, ?, ?, ?, ?)`,
          [manifest.loadId, position++, entry.path, entry.size, entry.checksum ?? null],
        );
      }

      return existing ? "replaced" : "created";
    });
  }

  async getManifestSummary(loadId: string): Promise<ManifestSummary | null> {
    return this.exclusive(async () => {
      const row = await this.get<ManifestRow>(
        "SELECT rowid AS seq, * FROM manifests WHERE load_id = ?",
        [loadId],
      );
      return row ? toManifestSummary(row) : null;
    });
  }

  async getManifestEntries(loadId: string): Promise<FileEntry[]> {
    return this.exclusive(async () => {
      const rows = await this.all<EntryRow>(
        `SELECT path, size, checksum FROM manifest_entries
         WHERE load_id = ? ORDER BY position`,
        [loadId],
      );
      return rows.map(toFileEntry);
    });
  }

  async listManifests(
    filter: ManifestFilter,
    after: PageCursor | null,
    limit: number,
  ): Promise<Page<ManifestSummary>> {
    return this.exclusive(async () => {
      const { where, params } = buildWhere(filter, after);
      const rows = await this.all<ManifestRow>(
        `SELECT rowid AS seq, * FROM manifests ${where}
         ORDER BY created_at, rowid LIMIT ?`,
        [...params, limit],
      );
      return toPage(rows, limit, toManifestSummary);
    });
  }

  // ── jobs ───────────────────────────────────────────────────

  async createJob(
    job: Omit<Job, "attempt">,
    retry: RetryPolicy,
  ): Promise<CreateJobResult> {
    return this.transaction<CreateJobResult>(async () => {
      const manifest = await this.get<{ load_id: string }>(
        "SELECT load_id FROM manifests WHERE load_id = ?",
        [job.loadId],
      );
      if (!manifest) return { status: "missing_manifest" };

      const latestRow = await this.get<JobRow>(
        `SELECT ${JOB_COLUMNS} FROM jobs WHERE load_id = ?
         ORDER BY attempt DESC LIMIT 1`,
        [job.loadId],
      );
      const latest = latestRow ? toJob(latestRow) : null;

      if (latest && (retry === "reject" || !isTerminal(latest.status))) {
        return { status: "exists", latest };
      }

      const created: Job = { ...job, attempt: latest ? latest.attempt + 1 : 1 };
      await this.run(
        `INSERT INTO jobs (job_id, load_id, attempt, status, created_at, updated_at,
           uploaded_files, uploaded_bytes)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          created.id,
          created.loadId,
          created.attempt,
          created.status,
          created.createdAt,
          created.updatedAt,
          created.uploadedFiles,
          created.uploadedBytes,
        ],
      );
      return { status: "created", job: created };
    });
  }

  async getLatestJob(loadId: string): Promise<Job | null> {
    return this.exclusive(async () => {
      const row = await this.get<JobRow>(
        `SELECT ${JOB_COLUMNS} FROM jobs WHERE load_id = ?
         ORDER BY attempt DESC LIMIT 1`,
        [loadId],
      );
      return row ? toJob(row) : null;
    });
  }

  async getJob(jobId: string): Promise<Job | null> {
    return this.exclusive(async () => {
      const row = await this.get<JobRow>(
        `SELECT ${JOB_COLUMNS} FROM jobs WHERE job_id = ?`,
        [jobId],
      );
      return row ? toJob(row) : null;
    });
  }

  async listJobs(
    filter: JobFilter,
    after: PageCursor | null,
    limit: number,
  ): Promise<Page<Job>> {
    return this.exclusive(async () => {
      const { where, params } = buildWhere(filter, after, filter.status);
      const rows = await this.all<JobRow>(
        `SELECT ${JOB_COLUMNS} FROM jobs ${where}
         ORDER BY created_at, rowid LIMIT ?`,
        [...params, limit],
      );
      return toPage(rows, limit, toJob);
    });
  }

  async findRunningJobsStartedBefore(cutoff: string): Promise<Job[]> {
    return this.exclusive(async () => {
      const rows = await this.all<JobRow>(
        `SELECT ${JOB_COLUMNS} FROM jobs
         WHERE status = 'RUNNING' AND started_at < ?
         ORDER BY started_at`,
        [cutoff],
      );
      return rows.map(toJob);
    });
  }

  /**
   * Compare-and-swap on the status column. Returns false when the job is
   * no longer in `from`, in which case nothing was written.
   */
  async transitionJob(
    jobId: string,
    from: JobStatus,
    to: JobStatus,
    patch: JobPatch,
  ): Promise<boolean> {
    return this.exclusive(async () => {
      let sql = "UPDATE jobs SET status = ?, updated_at = ?";
      const params: SqlParam[] = [to, patch.updatedAt];

      if (patch.startedAt !== undefined) {
        sql += ", started_at = ?";
        params.push(patch.startedAt);
      }
      if (patch.endedAt !== undefined) {
        sql += ", ended_at = ?";
        params.push(patch.endedAt);
      }
      if (patch.detail !== undefined) {
        sql += ", detail = ?";
        params.push(patch.detail);
      }
      if (patch.uploadedFiles !== undefined) {
        sql += ", uploaded_files = ?";
        params.push(patch.uploadedFiles);
      }
      if (patch.uploadedBytes !== undefined) {
        sql += ", uploaded_bytes = ?";
        params.push(patch.uploadedBytes);
      }

      sql += " WHERE job_id = ? AND status = ?";
      params.push(jobId, from);

      const result = await this.run(sql, params);
      return result.changes === 1;
    });
  }

  /**
   * Upserts the entry's upload state. A COMPLETED entry also bumps the
   * job's uploaded counters, so they move while the job runs.
   */
  async recordJobEntry(entry: JobEntry): Promise<RecordEntryResult> {
    return this.transaction<RecordEntryResult>(async () => {
      const job = await this.get<{ status: string }>(
        "SELECT status FROM jobs WHERE job_id = ?",
        [entry.jobId],
      );
      if (!job || job.status !== "RUNNING") return "not_running";

      const previous = await this.get<{ status: string }>(
        "SELECT status FROM job_entries WHERE job_id = ? AND path = ?",
        [entry.jobId, entry.path],
      );
      if (previous?.status === "COMPLETED") return "unchanged";

      await this.run(
        `INSERT INTO job_entries (job_id, path, status, size, error, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT (job_id, path) DO UPDATE SET
           status = excluded.status,
           size = excluded.size,
           error = excluded.error,
           updated_at = excluded.updated_at`,
        [entry.jobId, entry.path, entry.status, entry.size, entry.error ?? null, entry.updatedAt],
      );

      if (entry.status === "COMPLETED") {
        await this.run(
          `UPDATE jobs SET uploaded_files = uploaded_files + 1,
             uploaded_bytes = uploaded_bytes + ?, updated_at = ?
           WHERE job_id = ?`,
          [entry.size, entry.updatedAt, entry.jobId],
        );
      }
      return "recorded";
    });
  }

  async listJobEntries(jobId: string): Promise<JobEntry[]> {
    return this.exclusive(async () => {
      const rows = await this.all<JobEntryRow>(
        `SELECT job_id, path, status, size, error, updated_at FROM job_entries
         WHERE job_id = ? ORDER BY path`,
        [jobId],
      );
      return rows.map(toJobEntry);
    });
  }

  // ── plumbing ───────────────────────────────────────────────

  /** Runs `fn` with no other statement interleaved on this connection. */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private transaction<T>(fn: () => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      await this.run("BEGIN IMMEDIATE");
      try {
        const result = await fn();
        await this.run("COMMIT");
        return result;
      } catch (error) {
        await this.run("ROLLBACK");
        throw error;
      }
    });
  }

  private get connection(): sqlite3.Database {
    if (!this.db) {
      throw new Error("DBService not initialized");
    }
    return this.db;
  }

  private run(sql: string, params: SqlParam[] = []): Promise<sqlite3.RunResult> {
    return new Promise((resolve, reject) => {
      this.connection.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) reject(err);
        else resolve(this);
      });
    });
  }

  private get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    return new Promise((resolve, reject) => {
      this.connection.get(sql, params, (err: Error | null, row: T) => {
        if (err) reject(err);
        else resolve(row);
      });
    });
  }

  private all<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.connection.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) reject(err);
        else resolve(rows || []);
      });
    });
  }
}

function buildWhere(
  filter: { loadId?: string; prefix?: string },
  after: PageCursor | null,
  status?: JobStatus,
): { where: string; params: SqlParam[] } {
  const clauses: string[] = [];
  const params: SqlParam[] = [];

  if (filter.loadId !== undefined) {
    clauses.push("load_id = ?");
    params.push(filter.loadId);
  }
  if (filter.prefix !== undefined) {
    clauses.push("substr(load_id, 1, length(?)) = ?");
    params.push(filter.prefix, filter.prefix);
  }
  if (status !== undefined) {
    clauses.push("status = ?");
    params.push(status);
  }
  if (after) {
    clauses.push("(created_at > ? OR (created_at = ? AND rowid > ?))");
    params.push(after.createdAt, after.createdAt, after.seq);
  }

  return {
    where: clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "",
    params,
  };
}

function toPage<R extends { seq: number; created_at: string }, T>(
  rows: R[],
  limit: number,
  convert: (row: R) => T,
): Page<T> {
  const last = rows[rows.length - 1];
  return {
    items: rows.map(convert),
    next: last && rows.length === limit ? { createdAt: last.created_at, seq: last.seq } : null,
  };
}

function toManifestSummary(row: ManifestRow): ManifestSummary {
  return {
    loadId: row.load_id,
    fileCount: row.file_count,
    totalBytes: row.total_bytes,
    createdAt: row.created_at,
  };
}

function toFileEntry(row: EntryRow): FileEntry {
  const entry: FileEntry = { path: row.path, size: row.size };
  if (row.checksum !== null) entry.checksum = row.checksum;
  return entry;
}

function toJob(row: JobRow): Job {
  if (!isJobStatus(row.status)) {
    throw new Error(`Unknown job status "${row.status}" for job ${row.job_id}`);
  }

  const job: Job = {
    id: row.job_id,
    loadId: row.load_id,
    attempt: row.attempt,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    uploadedFiles: row.uploaded_files,
    uploadedBytes: row.uploaded_bytes,
  };
  if (row.started_at !== null) job.startedAt = row.started_at;
  if (row.ended_at !== null) job.endedAt = row.ended_at;
  if (row.detail !== null) job.detail = row.detail;
  return job;
}

function toJobEntry(row: JobEntryRow): JobEntry {
  if (!isEntryStatus(row.status)) {
    throw new Error(`Unknown entry status "${row.status}" for ${row.path} in job ${row.job_id}`);
  }

  const entry: JobEntry = {
    jobId: row.job_id,
    path: row.path,
    status: row.status,
    size: row.size,
    updatedAt: row.updated_at,
  };
  if (row.error !== null) entry.error = row.error;
  return entry;
}

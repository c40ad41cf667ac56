import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import { objectKeyFor } from "../utils/paths";
import { formatElapsed } from "../utils/format";
import {
  ConflictError,
  IllegalTransitionError,
  NotFoundError,
  TransferFault,
  ValidationError,
  errorMessage,
} from "../utils/errors";
import type { DBService, JobPatch, Page, PageCursor } from "./db.service";
import { validateLoadId, type ManifestService } from "./manifest.service";
import {
  TRANSITIONS,
  isTerminal,
  type Job,
  type JobEntry,
  type JobFilter,
  type JobOutcome,
  type JobReport,
  type JobStatus,
  type RetryPolicy,
  type RunOptions,
} from "../models/job.model";
import type {
  TransferDispatcher,
  TransferEvent,
  UploadCommand,
  UploadEntryEvent,
  UploadItem,
  UrlSigner,
} from "../models/transfer.model";

export interface JobServiceOptions {
  retry?: RetryPolicy;
  /** Whether the transfer agent can abort a running upload */
  cancelRunning?: boolean;
  presignedExpiresSec?: number;
  /** Object key prefix the manifest paths are uploaded under */
  prefix?: string;
  pageSize?: number;
  now?: () => Date;
}

/**
 * Owns the job lifecycle. Every status change goes through a
 * compare-and-swap in the store, so two callers racing on the same edge
 * see exactly one winner.
 */
export class JobService {
  private readonly retry: RetryPolicy;
  private readonly cancelRunning: boolean;
  private readonly presignedExpiresSec: number;
  private readonly prefix: string;
  private readonly pageSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly db: DBService,
    private readonly manifests: ManifestService,
    private readonly dispatcher: TransferDispatcher,
    private readonly signer: UrlSigner,
    options: JobServiceOptions = {},
  ) {
    this.retry = options.retry ?? "reject";
    this.cancelRunning = options.cancelRunning ?? true;
    this.presignedExpiresSec = options.presignedExpiresSec ?? 86400;
    this.prefix = options.prefix ?? "";
    this.pageSize = options.pageSize ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  async create(loadId: string): Promise<Job> {
    const operation = "create-job";
    validateLoadId(loadId, operation);

    const now = this.timestamp();
    const result = await this.db.createJob(
      {
        id: uuidv4(),
        loadId,
        status: "PENDING",
        createdAt: now,
        updatedAt: now,
        uploadedFiles: 0,
        uploadedBytes: 0,
      },
      this.retry,
    );

    switch (result.status) {
      case "missing_manifest":
        throw new NotFoundError("no manifest for load", { loadId, operation });
      case "exists":
        throw new ConflictError(
          `job ${result.latest.id} already exists (${result.latest.status})`,
          { loadId, operation },
        );
      case "created":
        logger.info(`Created job ${result.job.id} for ${loadId}`, {
          attempt: result.job.attempt,
        });
        return result.job;
    }
  }

  /** The latest job of a load. */
  async get(loadId: string, operation = "get-job"): Promise<Job> {
    const job = await this.db.getLatestJob(loadId);
    if (!job) {
      throw new NotFoundError("no job for load", { loadId, operation });
    }
    return job;
  }

  async *list(filter: JobFilter = {}): AsyncGenerator<Job> {
    let cursor: PageCursor | null = null;
    do {
      const page: Page<Job> = await this.db.listJobs(filter, cursor, this.pageSize);
      yield* page.items;
      cursor = page.next;
    } while (cursor);
  }

  /**
   * PENDING -> RUNNING, then hands the upload to the transfer agent.
   * Returns as soon as the command is dispatched; the agent reports back
   * through recordEntry() and complete().
   */
  async run(loadId: string, options: RunOptions = {}): Promise<Job> {
    const operation = "run-job";
    const { count, mock = false } = options;
    if (count !== undefined && (!Number.isInteger(count) || count < 1)) {
      throw new ValidationError(`count must be a positive integer, got ${count}`, {
        loadId,
        operation,
      });
    }

    const job = await this.get(loadId, operation);
    this.assertTransition(job, "RUNNING", operation);

    const manifest = await this.manifests.get(loadId);
    const selected = count === undefined ? manifest.entries : manifest.entries.slice(0, count);
    const expiresAt = new Date(
      this.now().getTime() + this.presignedExpiresSec * 1000,
    ).toISOString();

    let entries: UploadItem[];
    try {
      entries = await Promise.all(
        selected.map(async (entry) => {
          const objectKey = objectKeyFor(this.prefix, entry.path);
          return {
            path: entry.path,
            objectKey,
            size: entry.size,
            presignedUrl: await this.signer.presignPut(objectKey, this.presignedExpiresSec),
          };
        }),
      );
    } catch (error) {
      // nothing committed yet, the job stays PENDING
      throw new TransferFault(`could not presign upload urls: ${errorMessage(error)}`, {
        loadId,
        operation,
      });
    }

    const startedAt = this.timestamp();
    const patch: JobPatch = { updatedAt: startedAt, startedAt };
    if (count !== undefined || mock) {
      patch.detail = `Uploading ${entries.length} of ${manifest.fileCount} files${mock ? " (mock)" : ""}`;
    }
    const running = await this.transition(job, "RUNNING", patch, operation);

    const command: UploadCommand = {
      cmd: "upload",
      jobId: running.id,
      loadId,
      entries,
      expiresAt,
    };
    if (mock) command.mock = true;

    try {
      await this.dispatcher.dispatch(command);
    } catch (error) {
      const reason = `dispatch to transfer agent failed: ${errorMessage(error)}`;
      logger.error(`Job ${running.id} for ${loadId} failed at dispatch`, error);
      const endedAt = this.timestamp();
      await this.transition(
        running,
        "FAILED",
        { updatedAt: endedAt, endedAt, detail: `TransferFault: ${reason}` },
        operation,
      );
      throw new TransferFault(reason, { loadId, operation });
    }

    logger.info(`Job ${running.id} for ${loadId} is RUNNING`, {
      files: entries.length,
      totalBytes: entries.reduce((sum, entry) => sum + entry.size, 0),
      mock,
    });
    return running;
  }

  /**
   * Completion callback from the transfer agent. Safe to repeat: a
   * duplicate of an applied outcome returns the job unchanged. A cancelled
   * job keeps its status; any other terminal job refuses a different
   * outcome.
   */
  async complete(loadId: string, outcome: JobOutcome, jobId?: string): Promise<Job> {
    const operation = "complete-job";
    const job = jobId ? await this.db.getJob(jobId) : await this.db.getLatestJob(loadId);
    if (!job) {
      throw new NotFoundError(jobId ? `no job ${jobId}` : "no job for load", {
        loadId,
        operation,
      });
    }
    if (job.loadId !== loadId) {
      throw new ValidationError(`job ${job.id} belongs to load ${job.loadId}`, {
        loadId,
        operation,
      });
    }

    if (jobId) {
      const latest = await this.db.getLatestJob(loadId);
      if (latest && latest.id !== job.id) {
        logger.warn(`Discarding completion for superseded job ${job.id}`, {
          loadId,
          latestJobId: latest.id,
        });
        return job;
      }
    }

    const target: JobStatus = outcome.success ? "COMPLETED" : "FAILED";
    if (job.status === target) {
      logger.debug(`Duplicate completion for job ${job.id} ignored`, { loadId });
      return job;
    }
    if (job.status === "CANCELLED") {
      logger.warn(`Discarding completion for CANCELLED job ${job.id}`, {
        loadId,
        success: outcome.success,
      });
      return job;
    }
    if (isTerminal(job.status)) {
      throw new IllegalTransitionError(job.status, target, { loadId, operation });
    }

    const endedAt = this.timestamp();
    const patch: JobPatch = {
      updatedAt: endedAt,
      endedAt,
      detail:
        outcome.detail ??
        (outcome.success ? "Job completed" : "TransferFault: transfer agent reported failure"),
    };
    if (outcome.uploadedFiles !== undefined) patch.uploadedFiles = outcome.uploadedFiles;
    if (outcome.uploadedBytes !== undefined) patch.uploadedBytes = outcome.uploadedBytes;

    try {
      const done = await this.transition(job, target, patch, operation);
      logger.log(outcome.success ? "info" : "error", `Job ${done.id} for ${loadId} is ${done.status}`, {
        detail: done.detail,
        uploadedFiles: done.uploadedFiles,
      });
      return done;
    } catch (error) {
      // a concurrent completion or cancel got there first
      if (error instanceof IllegalTransitionError) {
        const current = await this.db.getJob(job.id);
        if (current && (current.status === target || current.status === "CANCELLED")) {
          return current;
        }
      }
      throw error;
    }
  }

  /**
   * Records the agent's progress on one entry. Entries reported for a job
   * that is no longer RUNNING are discarded with a warning.
   */
  async recordEntry(event: UploadEntryEvent): Promise<Job> {
    const operation = "record-entry";
    const { loadId } = event;
    const job = await this.db.getJob(event.jobId);
    if (!job) {
      throw new NotFoundError(`no job ${event.jobId}`, { loadId, operation });
    }
    if (job.loadId !== loadId) {
      throw new ValidationError(`job ${job.id} belongs to load ${job.loadId}`, {
        loadId,
        operation,
      });
    }

    const entry: JobEntry = {
      jobId: job.id,
      path: event.path,
      status: event.status,
      size: event.size,
      updatedAt: event.timestamp,
    };
    if (event.error !== undefined) entry.error = event.error;

    const result = await this.db.recordJobEntry(entry);
    if (result === "not_running") {
      logger.warn(`Discarding ${event.status} for ${event.path} on ${job.status} job ${job.id}`, {
        loadId,
      });
      return job;
    }
    if (event.status === "ERROR") {
      logger.warn(`Upload of ${event.path} failed in job ${job.id}`, { loadId, error: event.error });
    }

    const current = await this.db.getJob(job.id);
    if (!current) {
      throw new NotFoundError(`job ${job.id} disappeared`, { loadId, operation });
    }
    return current;
  }

  /** Per-entry upload log of the latest job, ordered by path. */
  async entries(loadId: string): Promise<JobEntry[]> {
    const job = await this.get(loadId, "list-job-entries");
    return this.db.listJobEntries(job.id);
  }

  /** Maps an event published by the transfer agent onto the job. */
  async applyEvent(event: TransferEvent): Promise<Job> {
    if (event.event === "upload_entry") {
      return this.recordEntry(event);
    }

    const counters = {
      uploadedFiles: event.uploadedFiles,
      uploadedBytes: event.uploadedBytes,
    };
    if (event.event === "upload_complete") {
      return this.complete(event.loadId, { success: true, ...counters }, event.jobId);
    }

    const failed = event.failedFiles.length;
    const detail = failed
      ? `TransferFault: ${event.reason} (${failed} file${failed === 1 ? "" : "s"} failed)`
      : `TransferFault: ${event.reason}`;
    return this.complete(event.loadId, { success: false, detail, ...counters }, event.jobId);
  }

  async cancel(loadId: string): Promise<Job> {
    const operation = "cancel-job";
    const job = await this.get(loadId, operation);
    const wasRunning = job.status === "RUNNING";

    const endedAt = this.timestamp();
    const cancelled = await this.transition(
      job,
      "CANCELLED",
      { updatedAt: endedAt, endedAt, detail: `Cancelled while ${job.status}` },
      operation,
    );
    logger.info(`Job ${cancelled.id} for ${loadId} is CANCELLED`, { from: job.status });

    if (wasRunning) {
      try {
        await this.dispatcher.interrupt({ cmd: "cancel", jobId: job.id, loadId });
      } catch (error) {
        // the job is already CANCELLED; a late completion will be discarded
        logger.error(`Could not tell the transfer agent to stop job ${job.id}`, error);
      }
    }
    return cancelled;
  }

  async report(loadId: string): Promise<JobReport> {
    const job = await this.get(loadId, "report-job");
    const manifest = await this.manifests.summary(loadId);
    return { job, manifest };
  }

  /**
   * Fails RUNNING jobs that never heard back from the transfer agent.
   */
  async expireStale(olderThanMs: number): Promise<Job[]> {
    const operation = "expire-jobs";
    const cutoff = new Date(this.now().getTime() - olderThanMs).toISOString();
    const stale = await this.db.findRunningJobsStartedBefore(cutoff);

    const expired: Job[] = [];
    for (const job of stale) {
      const endedAt = this.timestamp();
      const detail = `TransferFault: no completion signal within ${formatElapsed(olderThanMs)}`;
      try {
        const failed = await this.transition(
          job,
          "FAILED",
          { updatedAt: endedAt, endedAt, detail },
          operation,
        );
        logger.error(`Job ${job.id} for ${job.loadId} expired`, { startedAt: job.startedAt });
        expired.push(failed);
      } catch (error) {
        if (!(error instanceof IllegalTransitionError)) throw error;
        logger.info(`Job ${job.id} left RUNNING before it could be expired`, {
          status: error.from,
        });
      }
    }
    return expired;
  }

  allowedTransitions(status: JobStatus): readonly JobStatus[] {
    if (status === "RUNNING" && !this.cancelRunning) {
      return TRANSITIONS.RUNNING.filter((to) => to !== "CANCELLED");
    }
    return TRANSITIONS[status];
  }

  private assertTransition(job: Job, to: JobStatus, operation: string): void {
    if (!this.allowedTransitions(job.status).includes(to)) {
      throw new IllegalTransitionError(job.status, to, { loadId: job.loadId, operation });
    }
  }

  private async transition(
    job: Job,
    to: JobStatus,
    patch: JobPatch,
    operation: string,
  ): Promise<Job> {
    this.assertTransition(job, to, operation);

    const applied = await this.db.transitionJob(job.id, job.status, to, patch);
    const current = await this.db.getJob(job.id);
    if (!current) {
      throw new NotFoundError(`job ${job.id} disappeared`, { loadId: job.loadId, operation });
    }
    if (!applied) {
      throw new IllegalTransitionError(current.status, to, { loadId: job.loadId, operation });
    }
    return current;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

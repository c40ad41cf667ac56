import fs from "fs";
import path from "path";
import { setTimeout as sleep } from "timers/promises";
import axios from "axios";
import logger from "../utils/logger";
import { formatElapsed, humanReadableSize } from "../utils/format";
import type {
  EntryStatus,
  EventPublisher,
  OutcomeEvent,
  TransferCommand,
  UploadCommand,
  UploadItem,
} from "../models/transfer.model";

export interface UploaderOptions {
  /** Directory the manifest paths are relative to */
  stagingRoot: string;
  concurrency?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  now?: () => number;
}

export interface UploadSummary {
  jobId: string;
  outcome: "completed" | "failed" | "cancelled" | "ignored";
  uploadedFiles: number;
  uploadedBytes: number;
  failedFiles: string[];
}

/** Failures that another attempt cannot fix. */
class PermanentUploadError extends Error {}

interface JobProgress {
  uploadedFiles: number;
  uploadedBytes: number;
  failedFiles: string[];
  firstError?: string;
}

class UploaderService {
  private activeJobs: Map<string, AbortController> = new Map();
  private readonly stagingRoot: string;
  private readonly concurrency: number;
  private readonly maxRetries: number;
  private readonly baseDelay: number;
  private readonly now: () => number;

  constructor(
    private readonly events: EventPublisher,
    options: UploaderOptions,
  ) {
    this.stagingRoot = options.stagingRoot;
    this.concurrency = Math.max(1, options.concurrency ?? 4);
    this.maxRetries = Math.max(1, options.maxRetries ?? 5);
    this.baseDelay = options.baseDelayMs ?? 1000;
    this.now = options.now ?? Date.now;
  }

  async handleCommand(command: TransferCommand): Promise<UploadSummary | null> {
    if (command.cmd === "cancel") {
      this.cancel(command.jobId);
      return null;
    }
    return this.handleUploadCommand(command);
  }

  /** Stops a running job; in-flight PUTs are aborted and no event is published. */
  cancel(jobId: string): boolean {
    const controller = this.activeJobs.get(jobId);
    if (!controller) {
      logger.warn(`Cancel for unknown job ${jobId} ignored`);
      return false;
    }
    logger.info(`Cancelling job ${jobId}`);
    controller.abort();
    return true;
  }

  async handleUploadCommand(command: UploadCommand): Promise<UploadSummary> {
    const { jobId, loadId, entries, expiresAt, mock = false } = command;
    const progress: JobProgress = { uploadedFiles: 0, uploadedBytes: 0, failedFiles: [] };

    // Check if already processing
    if (this.activeJobs.has(jobId)) {
      logger.warn(`Job ${jobId} is already being processed, ignoring duplicate`);
      return { jobId, outcome: "ignored", ...this.counters(progress) };
    }

    // Check if presigned URLs are expired
    if (new Date(expiresAt).getTime() < this.now()) {
      logger.error(`Presigned URLs expired for job ${jobId}`);
      progress.failedFiles = entries.map((entry) => entry.path);
      await this.publishFailed(command, progress, "Presigned URLs expired");
      return { jobId, outcome: "failed", ...this.counters(progress) };
    }

    if (mock) {
      logger.info(`Job ${jobId} is a dry run, nothing will be transferred`);
    }

    const controller = new AbortController();
    this.activeJobs.set(jobId, controller);
    const totalBytes = entries.reduce((sum, entry) => sum + entry.size, 0);
    const started = this.now();

    try {
      logger.info(`Starting upload for job ${jobId}`, {
        loadId,
        files: entries.length,
        totalBytes: humanReadableSize(totalBytes),
      });

      await this.runPool(entries, controller.signal, async (item) => {
        await this.publishEntry(command, item, "STARTED");
        try {
          if (!mock) await this.uploadFileWithRetry(item, controller.signal);
          progress.uploadedFiles++;
          progress.uploadedBytes += item.size;
          await this.publishEntry(command, item, "COMPLETED");
          this.logProgress(jobId, progress, entries.length, started);
        } catch (error) {
          if (controller.signal.aborted) return;
          const message = error instanceof Error ? error.message : "Unknown error";
          logger.error(`Giving up on ${item.path}: ${message}`);
          progress.failedFiles.push(item.path);
          progress.firstError ??= `${item.path}: ${message}`;
          await this.publishEntry(command, item, "ERROR", message);
        }
      });

      if (controller.signal.aborted) {
        logger.info(`Job ${jobId} cancelled`, {
          uploadedFiles: progress.uploadedFiles,
        });
        return { jobId, outcome: "cancelled", ...this.counters(progress) };
      }

      if (progress.failedFiles.length > 0) {
        const reason = `${progress.failedFiles.length} of ${entries.length} files failed, first: ${progress.firstError}`;
        await this.publishFailed(command, progress, reason);
        return { jobId, outcome: "failed", ...this.counters(progress) };
      }

      await this.publishOutcome({
        event: "upload_complete",
        jobId,
        loadId,
        uploadedFiles: progress.uploadedFiles,
        uploadedBytes: progress.uploadedBytes,
        timestamp: new Date(this.now()).toISOString(),
      });
      logger.info(`Upload successful for job ${jobId}`, {
        elapsed: formatElapsed(this.now() - started),
        uploadedBytes: humanReadableSize(progress.uploadedBytes),
      });
      return { jobId, outcome: "completed", ...this.counters(progress) };
    } finally {
      this.activeJobs.delete(jobId);
    }
  }

  /** Runs `worker` over `items` with at most `concurrency` in flight. */
  private async runPool(
    items: UploadItem[],
    signal: AbortSignal,
    worker: (item: UploadItem) => Promise<void>,
  ): Promise<void> {
    let next = 0;
    const lanes = Array.from({ length: Math.min(this.concurrency, items.length) }, async () => {
      while (next < items.length && !signal.aborted) {
        const item = items[next++];
        await worker(item);
      }
    });
    await Promise.all(lanes);
  }

  private async uploadFileWithRetry(item: UploadItem, signal: AbortSignal): Promise<void> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        logger.debug(`Upload attempt ${attempt}/${this.maxRetries} for ${item.path}`);
        await this.uploadFile(item, signal);
        return;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error("Unknown error");
        if (signal.aborted || error instanceof PermanentUploadError) throw lastError;

        logger.warn(`Upload attempt ${attempt} failed for ${item.path}: ${lastError.message}`);
        if (attempt < this.maxRetries) {
          const delay = this.baseDelay * Math.pow(2, attempt - 1); // Exponential backoff
          logger.debug(`Retrying in ${delay}ms...`);
          await sleep(delay, undefined, { signal });
        }
      }
    }

    throw new Error(
      `Upload failed after ${this.maxRetries} attempts: ${lastError?.message}`,
    );
  }

  private async uploadFile(item: UploadItem, signal: AbortSignal): Promise<void> {
    const filePath = path.join(this.stagingRoot, item.path);

    let size: number;
    try {
      size = (await fs.promises.stat(filePath)).size;
    } catch {
      throw new PermanentUploadError(`File not found: ${filePath}`);
    }
    if (size !== item.size) {
      throw new PermanentUploadError(
        `Size of ${filePath} is ${size}, manifest says ${item.size}`,
      );
    }

    const fileStream = fs.createReadStream(filePath);
    try {
      await axios.put(item.presignedUrl, fileStream, {
        headers: {
          "Content-Type": "application/octet-stream",
          "Content-Length": size,
        },
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        signal,
      });
    } finally {
      fileStream.destroy();
    }
  }

  private logProgress(
    jobId: string,
    progress: JobProgress,
    total: number,
    started: number,
  ): void {
    const elapsedMs = this.now() - started;
    const rate = elapsedMs > 0 ? (progress.uploadedBytes * 1000) / elapsedMs : 0;
    logger.info(`Uploaded ${progress.uploadedFiles}/${total} files for job ${jobId}`, {
      elapsed: formatElapsed(elapsedMs),
      uploaded: humanReadableSize(progress.uploadedBytes),
      rate: `${humanReadableSize(rate)}/s`,
    });
  }

  private counters({ uploadedFiles, uploadedBytes, failedFiles }: JobProgress) {
    return { uploadedFiles, uploadedBytes, failedFiles };
  }

  private async publishFailed(
    command: UploadCommand,
    progress: JobProgress,
    reason: string,
  ): Promise<void> {
    await this.publishOutcome({
      event: "upload_failed",
      jobId: command.jobId,
      loadId: command.loadId,
      reason,
      uploadedFiles: progress.uploadedFiles,
      uploadedBytes: progress.uploadedBytes,
      failedFiles: progress.failedFiles,
      timestamp: new Date(this.now()).toISOString(),
    });
  }

  /**
   * The tracker only learns how a job ended from this event, so it is
   * retried with backoff before the job is given up on.
   */
  private async publishOutcome(event: OutcomeEvent): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      try {
        await this.events.publishEvent(event);
        return;
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : "Unknown error";
        if (attempt >= this.maxRetries) {
          logger.error(`Could not report ${event.event} for job ${event.jobId}: ${errorMessage}`);
          throw error;
        }
        logger.warn(`Publishing ${event.event} failed (attempt ${attempt}): ${errorMessage}`);
        await sleep(this.baseDelay * Math.pow(2, attempt - 1));
      }
    }
  }

  /** Entry progress is informational; a lost update does not fail the job. */
  private async publishEntry(
    command: UploadCommand,
    item: UploadItem,
    status: EntryStatus,
    error?: string,
  ): Promise<void> {
    try {
      await this.events.publishEvent({
        event: "upload_entry",
        jobId: command.jobId,
        loadId: command.loadId,
        path: item.path,
        status,
        size: item.size,
        ...(error !== undefined ? { error } : {}),
        timestamp: new Date(this.now()).toISOString(),
      });
    } catch (publishError) {
      logger.warn(`Could not report ${status} for ${item.path}`, {
        jobId: command.jobId,
        error: publishError instanceof Error ? publishError.message : "Unknown error",
      });
    }
  }
}

export default UploaderService;

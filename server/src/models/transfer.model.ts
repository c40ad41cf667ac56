import type { EntryStatus } from "./job.model";

export interface UploadItem {
  path: string;
  objectKey: string;
  size: number;
  presignedUrl: string;
}

export interface UploadCommand {
  cmd: "upload";
  jobId: string;
  loadId: string;
  entries: UploadItem[];
  expiresAt: string;
  /** Dry run: report the entries, skip the PUTs */
  mock?: boolean;
}

export interface CancelCommand {
  cmd: "cancel";
  jobId: string;
  loadId: string;
}

export type TransferCommand = UploadCommand | CancelCommand;

export interface UploadCompleteEvent {
  event: "upload_complete";
  jobId: string;
  loadId: string;
  uploadedFiles: number;
  uploadedBytes: number;
  timestamp: string;
}

export interface UploadFailedEvent {
  event: "upload_failed";
  jobId: string;
  loadId: string;
  reason: string;
  uploadedFiles: number;
  uploadedBytes: number;
  failedFiles: string[];
  timestamp: string;
}

/** One entry changed state; sent while the job runs. */
export interface UploadEntryEvent {
  event: "upload_entry";
  jobId: string;
  loadId: string;
  path: string;
  status: EntryStatus;
  size: number;
  error?: string;
  timestamp: string;
}

export type TransferEvent = UploadCompleteEvent | UploadFailedEvent | UploadEntryEvent;

/** Hands work to the external transfer agent. */
export interface TransferDispatcher {
  dispatch(command: UploadCommand): Promise<void>;
  interrupt(command: CancelCommand): Promise<void>;
}

export interface UrlSigner {
  presignPut(objectKey: string, expiresInSec: number): Promise<string>;
}

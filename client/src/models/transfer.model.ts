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

interface EventBase {
  jobId: string;
  loadId: string;
  timestamp: string;
}

interface OutcomeBase extends EventBase {
  uploadedFiles: number;
  uploadedBytes: number;
}

export interface UploadCompleteEvent extends OutcomeBase {
  event: "upload_complete";
}

export interface UploadFailedEvent extends OutcomeBase {
  event: "upload_failed";
  reason: string;
  failedFiles: string[];
}

export type EntryStatus = "STARTED" | "COMPLETED" | "ERROR";

export interface UploadEntryEvent extends EventBase {
  event: "upload_entry";
  path: string;
  status: EntryStatus;
  size: number;
  error?: string;
}

export type OutcomeEvent = UploadCompleteEvent | UploadFailedEvent;

export type TransferEvent = OutcomeEvent | UploadEntryEvent;

export interface EventPublisher {
  publishEvent(event: TransferEvent): Promise<void>;
}

import type { JobStatus } from "../models/job.model";

export type ErrorKind =
  | "validation"
  | "not_found"
  | "conflict"
  | "illegal_transition"
  | "transfer_fault"
  | "partial_listing";

export interface ErrorContext {
  loadId?: string;
  operation?: string;
}

/**
 * Base class for every failure the tracker reports on purpose.
 * `retryable` tells callers whether repeating the operation can succeed
 * without changing its input.
 */
export abstract class TrackerError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly retryable: boolean;
  readonly loadId?: string;
  readonly operation?: string;
  readonly reason: string;

  constructor(reason: string, context: ErrorContext = {}) {
    super(formatMessage(reason, context));
    this.name = new.target.name;
    this.reason = reason;
    this.loadId = context.loadId;
    this.operation = context.operation;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      kind: this.kind,
      loadId: this.loadId,
      operation: this.operation,
      retryable: this.retryable,
    };
  }
}

function formatMessage(reason: string, context: ErrorContext): string {
  const prefix = [context.operation, context.loadId].filter(Boolean).join(" ");
  return prefix ? `${prefix}: ${reason}` : reason;
}

export class ValidationError extends TrackerError {
  readonly kind = "validation";
  readonly retryable = false;
}

export class NotFoundError extends TrackerError {
  readonly kind = "not_found";
  readonly retryable = false;
}

export class ConflictError extends TrackerError {
  readonly kind = "conflict";
  readonly retryable = false;
}

export class DuplicateLoadError extends ConflictError {}

export class IllegalTransitionError extends TrackerError {
  readonly kind = "illegal_transition";
  readonly retryable = false;
  readonly from: JobStatus;
  readonly to: JobStatus;

  constructor(from: JobStatus, to: JobStatus, context: ErrorContext = {}) {
    super(`cannot move job from ${from} to ${to}`, context);
    this.from = from;
    this.to = to;
  }
}

/** The transfer agent failed, could not be reached, or never reported back. */
export class TransferFault extends TrackerError {
  readonly kind = "transfer_fault";
  readonly retryable = true;
}

/** Enumeration stopped before it finished; the listing must not be used. */
export class PartialListingError extends TrackerError {
  readonly kind = "partial_listing";
  readonly retryable = true;
  readonly collected: number;

  constructor(reason: string, collected: number, context: ErrorContext = {}) {
    super(`${reason} after ${collected} entries`, context);
    this.collected = collected;
  }
}

export const HTTP_STATUS: Record<ErrorKind, number> = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  illegal_transition: 409,
  transfer_fault: 502,
  partial_listing: 503,
};

export const EXIT_CODE: Record<ErrorKind, number> = {
  validation: 2,
  not_found: 3,
  illegal_transition: 4,
  conflict: 5,
  transfer_fault: 6,
  partial_listing: 7,
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

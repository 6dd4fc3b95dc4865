import type { JobId, JobStatus } from "./types";

export const ERROR_KINDS = [
  "NotFound",
  "InvalidTransition",
  "ValidationFailed",
  "NotComplete",
  "StorageError",
  "BackendUnavailable",
  "BackendExecutionFailed",
  "BackendTimeout",
  "NoOutputProduced",
  "BrokerUnavailable",
  "ConfigurationError",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export function isErrorKind(value: unknown): value is ErrorKind {
  return ERROR_KINDS.some((kind) => kind === value);
}

export class RelayError extends Error {
  readonly kind: ErrorKind;
  readonly statusCode: number;

  constructor(kind: ErrorKind, message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

export class JobNotFoundError extends RelayError {
  readonly jobId: JobId;

  constructor(jobId: JobId) {
    super("NotFound", `Job ${jobId} not found`, 404);
    this.jobId = jobId;
  }
}

export class InvalidTransitionError extends RelayError {
  readonly jobId: JobId;
  readonly from: JobStatus;
  readonly to: JobStatus;

  constructor(jobId: JobId, from: JobStatus, to: JobStatus) {
    super("InvalidTransition", `Job ${jobId} cannot move from ${from} to ${to}`, 409);
    this.jobId = jobId;
    this.from = from;
    this.to = to;
  }
}

export class ValidationError extends RelayError {
  constructor(message: string) {
    super("ValidationFailed", message, 400);
  }
}

export class JobNotCompleteError extends RelayError {
  constructor(jobId: JobId, status: JobStatus) {
    super("NotComplete", `Job ${jobId} is not complete. Status: ${status}`, 400);
  }
}

export class StorageError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super("StorageError", message, 500, { cause });
  }
}

export class BackendUnavailableError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super("BackendUnavailable", message, 502, { cause });
  }
}

export class BackendExecutionFailedError extends RelayError {
  readonly executionId: string | null;

  constructor(message: string, executionId: string | null = null) {
    super("BackendExecutionFailed", message, 502);
    this.executionId = executionId;
  }
}

export class BackendTimeoutError extends RelayError {
  readonly executionId: string;
  readonly timeoutMs: number;

  constructor(executionId: string, timeoutMs: number, lastError?: string) {
    const suffix = lastError ? ` (last poll error: ${lastError})` : "";
    super(
      "BackendTimeout",
      `Execution ${executionId} did not reach a terminal state within ${timeoutMs / 1000}s${suffix}`,
      504
    );
    this.executionId = executionId;
    this.timeoutMs = timeoutMs;
  }
}

export class NoOutputProducedError extends RelayError {
  constructor(message = "Workflow completed but no output file found") {
    super("NoOutputProduced", message, 502);
  }
}

export class BrokerUnavailableError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super("BrokerUnavailable", message, 502, { cause });
  }
}

export class ConfigurationError extends RelayError {
  constructor(message: string) {
    super("ConfigurationError", message, 500);
  }
}

/** Never blank: falls back to the error's name, then to "Unknown error". */
export function errorMessage(err: unknown): string {
  const text = err instanceof Error ? err.message : String(err);
  if (text.trim() !== "") return text;
  return err instanceof Error && err.name.trim() !== "" ? err.name : "Unknown error";
}

/** Human-readable, kind-prefixed message stored on failed jobs. */
export function describeError(err: unknown): string {
  if (err instanceof RelayError) return `${err.kind}: ${err.message}`;
  return errorMessage(err);
}

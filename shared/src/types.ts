import { JOB_STATUSES } from "./constants";

export type JobId = string;
export type JobStatus = (typeof JOB_STATUSES)[number];

interface JobBase {
  readonly id: JobId;
  /** Epoch milliseconds. */
  readonly createdAt: number;
  readonly inputPath: string;
  readonly prompt: string;
  readonly negativePrompt: string | null;
  readonly seed: number | null;
}

export interface QueuedJob extends JobBase {
  readonly status: "queued";
}

export interface RunningJob extends JobBase {
  readonly status: "running";
  readonly startedAt: number;
}

export interface DoneJob extends JobBase {
  readonly status: "done";
  readonly startedAt: number;
  readonly completedAt: number;
  readonly resultPath: string;
}

export interface ErrorJob extends JobBase {
  readonly status: "error";
  readonly startedAt: number;
  readonly completedAt: number;
  readonly errorMessage: string;
}

/**
 * A broker-tracked unit of work. The union keeps `resultPath` on done jobs
 * only and `errorMessage` on failed jobs only.
 */
export type Job = QueuedJob | RunningJob | DoneJob | ErrorJob;

export interface CreateJobInput {
  /** Pre-allocated id from `JobStore.generateId`; generated when omitted. */
  id?: JobId;
  inputPath: string;
  prompt: string;
  negativePrompt?: string | null;
  seed?: number | null;
}

export type StatusCounts = Record<JobStatus, number>;

export function isTerminal(status: JobStatus): boolean {
  return status === "done" || status === "error";
}

/** Files a job owns on the shared filesystem. */
export function ownedFiles(job: Job): string[] {
  const files = [job.inputPath];
  if (job.status === "done") files.push(job.resultPath);
  return files;
}

import { v4 as uuidv4 } from "uuid";
import { DEFAULT_LIST_LIMIT, JOB_ID_PREFIX, JOB_STATUSES } from "./constants";
import { InvalidTransitionError, JobNotFoundError, ValidationError } from "./errors";
import {
  ownedFiles,
  type CreateJobInput,
  type DoneJob,
  type ErrorJob,
  type Job,
  type JobId,
  type JobStatus,
  type RunningJob,
  type StatusCounts,
} from "./types";

export interface JobStoreOptions {
  now?: () => number;
  generateId?: () => JobId;
}

export interface ListOptions {
  status?: JobStatus;
  limit?: number;
}

export type TransitionResult<T extends Job> =
  | { applied: true; job: T }
  | { applied: false; job: Job; error: InvalidTransitionError };

export interface SweepResult {
  removed: Job[];
  /** Files owned by the removed jobs; the caller deletes them. */
  files: string[];
}

interface Entry {
  job: Job;
  seq: number;
}

/**
 * Authoritative in-memory job map. Every method is synchronous, so on the
 * Node.js event loop each read-modify-write runs to completion before any
 * other request touches the map. No I/O happens here.
 */
export class JobStore {
  private readonly entries = new Map<JobId, Entry>();
  private readonly now: () => number;
  private readonly makeId: () => JobId;
  private seq = 0;

  constructor(options: JobStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.makeId = options.generateId ?? (() => JOB_ID_PREFIX + uuidv4());
  }

  get size(): number {
    return this.entries.size;
  }

  /** Returns an id no live job holds. */
  generateId(): JobId {
    let id = this.makeId();
    while (this.entries.has(id)) id = this.makeId();
    return id;
  }

  create(input: CreateJobInput): Job {
    const id = input.id ?? this.generateId();
    if (this.entries.has(id)) {
      throw new ValidationError(`Job id ${id} is already in use`);
    }
    const job: Job = {
      id,
      status: "queued",
      createdAt: this.now(),
      inputPath: input.inputPath,
      prompt: input.prompt,
      negativePrompt: input.negativePrompt ?? null,
      seed: input.seed ?? null,
    };
    this.entries.set(id, { job, seq: this.seq++ });
    return job;
  }

  get(id: JobId): Job | undefined {
    return this.entries.get(id)?.job;
  }

  /** Newest first by creation time. */
  list(options: ListOptions = {}): Job[] {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;
    return Array.from(this.entries.values())
      .filter((e) => !options.status || e.job.status === options.status)
      .sort((a, b) => b.job.createdAt - a.job.createdAt || b.seq - a.seq)
      .slice(0, Math.max(0, limit))
      .map((e) => e.job);
  }

  /** Removes the record and returns it; releasing its files is up to the caller. */
  delete(id: JobId): Job {
    const entry = this.require(id);
    this.entries.delete(id);
    return entry.job;
  }

  markRunning(id: JobId): TransitionResult<RunningJob> {
    const entry = this.require(id);
    const job = entry.job;
    if (job.status !== "queued") {
      return { applied: false, job, error: new InvalidTransitionError(id, job.status, "running") };
    }
    const next: RunningJob = { ...job, status: "running", startedAt: this.now() };
    entry.job = next;
    return { applied: true, job: next };
  }

  markDone(id: JobId, resultPath: string): TransitionResult<DoneJob> {
    const entry = this.require(id);
    const job = entry.job;
    if (job.status !== "running") {
      return { applied: false, job, error: new InvalidTransitionError(id, job.status, "done") };
    }
    const next: DoneJob = {
      ...job,
      status: "done",
      resultPath,
      completedAt: Math.max(this.now(), job.startedAt),
    };
    entry.job = next;
    return { applied: true, job: next };
  }

  markError(id: JobId, message: string): TransitionResult<ErrorJob> {
    const entry = this.require(id);
    const job = entry.job;
    if (job.status !== "running") {
      return { applied: false, job, error: new InvalidTransitionError(id, job.status, "error") };
    }
    const next: ErrorJob = {
      ...job,
      status: "error",
      errorMessage: message,
      completedAt: Math.max(this.now(), job.startedAt),
    };
    entry.job = next;
    return { applied: true, job: next };
  }

  /**
   * Oldest queued job, or undefined. Does not reserve it: a separate
   * `markRunning` follows, which is only safe with a single worker.
   */
  nextQueued(): Job | undefined {
    let oldest: Entry | undefined;
    for (const entry of this.entries.values()) {
      if (entry.job.status !== "queued") continue;
      if (
        !oldest ||
        entry.job.createdAt < oldest.job.createdAt ||
        (entry.job.createdAt === oldest.job.createdAt && entry.seq < oldest.seq)
      ) {
        oldest = entry;
      }
    }
    return oldest?.job;
  }

  /** Dequeue and QUEUED→RUNNING in one step, for deployments with several workers. */
  claimNext(): RunningJob | undefined {
    const next = this.nextQueued();
    if (!next) return undefined;
    const result = this.markRunning(next.id);
    return result.applied ? result.job : undefined;
  }

  sweep(maxAgeMs: number): SweepResult {
    const cutoff = this.now() - maxAgeMs;
    const removed: Job[] = [];
    for (const [id, entry] of this.entries) {
      if (entry.job.createdAt < cutoff) {
        removed.push(entry.job);
        this.entries.delete(id);
      }
    }
    return { removed, files: removed.flatMap(ownedFiles) };
  }

  counts(): StatusCounts {
    const counts: StatusCounts = { queued: 0, running: 0, done: 0, error: 0 };
    for (const { job } of this.entries.values()) counts[job.status] += 1;
    return counts;
  }

  private require(id: JobId): Entry {
    const entry = this.entries.get(id);
    if (!entry) throw new JobNotFoundError(id);
    return entry;
  }
}

export function isJobStatus(value: unknown): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  errorMessage,
  ownedFiles,
  StorageError,
  type DoneJob,
  type ErrorJob,
  type Job,
  type JobId,
  type JobStore,
  type RunningJob,
  type TransitionResult,
} from "@genrelay/shared";

export interface UploadedImage {
  buffer: Buffer;
  originalname: string;
}

export interface SubmitJobParams {
  image: UploadedImage;
  prompt: string;
  negativePrompt: string | null;
  seed: number | null;
}

const SAFE_EXT = /^\.[A-Za-z0-9]{1,8}$/;

function inputExtension(originalName: string): string {
  const ext = path.extname(originalName);
  return SAFE_EXT.test(ext) ? ext.toLowerCase() : ".png";
}

function preview(text: string): string {
  return text.length > 50 ? `${text.slice(0, 50)}...` : text;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Deletes files, ignoring ones already gone. Other failures are logged and
 * skipped so one stuck file does not keep a record alive.
 */
export async function releaseFiles(files: string[]): Promise<number> {
  let removed = 0;
  for (const file of files) {
    try {
      await fs.unlink(file);
      removed += 1;
    } catch (err) {
      if (isMissingFile(err)) continue;
      console.warn(`[jobs] could not remove ${file}:`, errorMessage(err));
    }
  }
  return removed;
}

/**
 * Everything the Broker API does beyond parsing requests: input file
 * ownership, store transitions and their log lines, and the age sweep.
 */
export class JobService {
  constructor(
    readonly store: JobStore,
    private readonly inputDir: string
  ) {}

  async submit(params: SubmitJobParams): Promise<Job> {
    const jobId = this.store.generateId();
    const fileName = `input_${jobId}_${Date.now()}${inputExtension(params.image.originalname)}`;
    const inputPath = path.join(this.inputDir, fileName);

    try {
      await fs.mkdir(this.inputDir, { recursive: true });
      await fs.writeFile(inputPath, params.image.buffer);
    } catch (err) {
      console.error(`[jobs] failed to save input image ${inputPath}:`, err);
      throw new StorageError(`Failed to save image: ${errorMessage(err)}`, err);
    }
    console.log(`[jobs] saved input image ${inputPath} (${params.image.buffer.length} bytes)`);

    const job = this.store.create({
      id: jobId,
      inputPath,
      prompt: params.prompt,
      negativePrompt: params.negativePrompt,
      seed: params.seed,
    });
    console.log(`[jobs] created ${job.id} with prompt: '${preview(job.prompt)}'`);
    return job;
  }

  async remove(jobId: JobId): Promise<{ job: Job; filesRemoved: number }> {
    const job = this.store.delete(jobId);
    const filesRemoved = await releaseFiles(ownedFiles(job));
    console.log(`[jobs] deleted ${jobId} (${job.status}), removed ${filesRemoved} file(s)`);
    return { job, filesRemoved };
  }

  start(jobId: JobId): TransitionResult<RunningJob> {
    const result = this.store.markRunning(jobId);
    if (result.applied) console.log(`[jobs] ${jobId} started processing`);
    else console.warn(`[jobs] ignored start report: ${result.error.message}`);
    return result;
  }

  complete(jobId: JobId, resultPath: string): TransitionResult<DoneJob> {
    const result = this.store.markDone(jobId, resultPath);
    if (result.applied) {
      const seconds = (result.job.completedAt - result.job.startedAt) / 1000;
      console.log(`[jobs] ${jobId} completed in ${seconds.toFixed(2)}s -> ${resultPath}`);
    } else {
      console.warn(`[jobs] ignored completion report: ${result.error.message}`);
    }
    return result;
  }

  fail(jobId: JobId, message: string): TransitionResult<ErrorJob> {
    const result = this.store.markError(jobId, message);
    if (result.applied) console.error(`[jobs] ${jobId} failed: ${message}`);
    else console.warn(`[jobs] ignored error report: ${result.error.message}`);
    return result;
  }

  /** Removes jobs older than `maxAgeMs` with their files; returns how many went. */
  async sweep(maxAgeMs: number): Promise<number> {
    const { removed, files } = this.store.sweep(maxAgeMs);
    if (!removed.length) return 0;
    const filesRemoved = await releaseFiles(files);
    console.log(`[sweep] removed ${removed.length} old job(s) and ${filesRemoved} file(s)`);
    return removed.length;
  }
}

import type { z } from "zod";
import {
  BrokerUnavailableError,
  errorMessage,
  isErrorKind,
  JobNotFoundError,
  RelayError,
} from "./errors";
import { sleep } from "./sleep";
import type { JobId, JobStatus } from "./types";
import {
  createJobResponseSchema,
  deleteJobResponseSchema,
  errorBodySchema,
  healthDocumentSchema,
  jobListDocumentSchema,
  jobStatusDocumentSchema,
  nextJobResponseSchema,
  transitionResponseSchema,
  type CreateJobResponse,
  type DeleteJobResponse,
  type HealthDocument,
  type JobDispatch,
  type JobListDocument,
  type JobStatusDocument,
} from "./wire";

/** The worker-facing half of the Broker API. */
export interface BrokerApi {
  nextJob(): Promise<JobDispatch | null>;
  /** False when the job is gone or no longer queued. */
  markStarted(jobId: JobId): Promise<boolean>;
  /** False when the report was a tolerated no-op (deleted job, repeated report). */
  markComplete(jobId: JobId, resultPath: string): Promise<boolean>;
  markError(jobId: JobId, message: string): Promise<boolean>;
}

export interface BrokerClientOptions {
  baseUrl: string;
  requestTimeoutMs?: number;
  /** Attempts for state reports when the broker cannot be reached. */
  reportAttempts?: number;
  reportRetryDelayMs?: number;
}

export interface SubmitJobInput {
  image: Uint8Array;
  filename?: string;
  contentType?: string;
  prompt?: string;
  negativePrompt?: string;
  seed?: number;
}

export class BrokerClient implements BrokerApi {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly reportAttempts: number;
  private readonly reportRetryDelayMs: number;

  constructor(options: BrokerClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.reportAttempts = Math.max(1, options.reportAttempts ?? 3);
    this.reportRetryDelayMs = options.reportRetryDelayMs ?? 1000;
  }

  // ---------------- worker side ----------------

  async nextJob(): Promise<JobDispatch | null> {
    const res = await this.request("GET", "/queue/next");
    const body = await this.readJson(res, nextJobResponseSchema);
    return "input_image_path" in body ? body : null;
  }

  async markStarted(jobId: JobId): Promise<boolean> {
    return this.report(`/jobs/${encodeURIComponent(jobId)}/start`, {});
  }

  async markComplete(jobId: JobId, resultPath: string): Promise<boolean> {
    return this.report(`/jobs/${encodeURIComponent(jobId)}/complete`, { result_path: resultPath });
  }

  async markError(jobId: JobId, message: string): Promise<boolean> {
    return this.report(`/jobs/${encodeURIComponent(jobId)}/error`, { error_message: message });
  }

  // ---------------- host side ----------------

  async submitJob(input: SubmitJobInput): Promise<CreateJobResponse> {
    const form = new FormData();
    const blob = new Blob([input.image], { type: input.contentType ?? "image/png" });
    form.append("image", blob, input.filename ?? "frame.png");
    form.append("prompt", input.prompt ?? "");
    if (input.negativePrompt !== undefined) form.append("negative_prompt", input.negativePrompt);
    if (input.seed !== undefined) form.append("seed", String(input.seed));

    const res = await this.request("POST", "/jobs", form);
    return this.readJson(res, createJobResponseSchema);
  }

  async getJob(jobId: JobId): Promise<JobStatusDocument> {
    const res = await this.request("GET", `/jobs/${encodeURIComponent(jobId)}`);
    return this.readJson(res, jobStatusDocumentSchema, jobId);
  }

  async listJobs(options: { status?: JobStatus; limit?: number } = {}): Promise<JobListDocument> {
    const params = new URLSearchParams();
    if (options.status) params.set("status", options.status);
    if (options.limit !== undefined) params.set("limit", String(options.limit));
    const qs = params.toString();
    const query = qs ? `?${qs}` : "";
    const res = await this.request("GET", `/jobs${query}`);
    return this.readJson(res, jobListDocumentSchema);
  }

  async downloadResult(jobId: JobId): Promise<Buffer> {
    const res = await this.request("GET", `/jobs/${encodeURIComponent(jobId)}/result`);
    if (!res.ok) throw await this.toError(res, jobId);
    return Buffer.from(await res.arrayBuffer());
  }

  async deleteJob(jobId: JobId): Promise<DeleteJobResponse> {
    const res = await this.request("DELETE", `/jobs/${encodeURIComponent(jobId)}`);
    return this.readJson(res, deleteJobResponseSchema, jobId);
  }

  async health(): Promise<HealthDocument> {
    const res = await this.request("GET", "/health");
    return this.readJson(res, healthDocumentSchema);
  }

  // ---------------- plumbing ----------------

  private async report(path: string, fields: Record<string, string>): Promise<boolean> {
    for (let attempt = 1; ; attempt++) {
      try {
        const res = await this.request("POST", path, new URLSearchParams(fields));
        if (res.status === 404) return false;
        const body = await this.readJson(res, transitionResponseSchema);
        return body.status === "ok";
      } catch (err) {
        if (!(err instanceof BrokerUnavailableError) || attempt >= this.reportAttempts) throw err;
        await sleep(this.reportRetryDelayMs);
      }
    }
  }

  private async request(
    method: string,
    path: string,
    body?: FormData | URLSearchParams
  ): Promise<Response> {
    try {
      return await fetch(`${this.baseUrl}${path}`, {
        method,
        body,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      throw new BrokerUnavailableError(`${method} ${path} failed: ${errorMessage(err)}`, err);
    }
  }

  private async readJson<T>(
    res: Response,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    jobId?: JobId
  ): Promise<T> {
    if (!res.ok) throw await this.toError(res, jobId);
    let raw: unknown;
    try {
      raw = await res.json();
    } catch (err) {
      throw new BrokerUnavailableError(`Unreadable response from ${res.url}: ${errorMessage(err)}`, err);
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new BrokerUnavailableError(`Unexpected response from ${res.url}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async toError(res: Response, jobId?: JobId): Promise<RelayError> {
    const body = parseErrorBody(await res.text().catch(() => ""));
    if (res.status === 404 && jobId !== undefined) {
      const missingJob = new JobNotFoundError(jobId);
      // The result route also answers 404 when only the file is gone.
      if (!body || body.message === missingJob.message) return missingJob;
    }
    if (body && isErrorKind(body.error)) {
      return new RelayError(body.error, body.message, res.status);
    }
    if (res.status >= 500) {
      return new BrokerUnavailableError(`Broker replied ${res.status} ${res.statusText}`);
    }
    return new RelayError("ValidationFailed", body?.message ?? `Broker replied ${res.status}`, res.status);
  }
}

function parseErrorBody(text: string) {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

import { z } from "zod";
import { JOB_STATUSES } from "./constants";
import type { Job, StatusCounts } from "./types";

// Broker API documents, snake_case on the wire.

export const jobStatusSchema = z.enum(JOB_STATUSES);

export const jobStatusDocumentSchema = z.object({
  id: z.string(),
  status: jobStatusSchema,
  created_at: z.string(),
  prompt: z.string(),
  negative_prompt: z.string().nullable(),
  seed: z.number().int().nullable(),
  has_result: z.boolean(),
  error_message: z.string().nullable(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  /** Seconds between start and completion. */
  processing_time: z.number().nullable(),
});
export type JobStatusDocument = z.infer<typeof jobStatusDocumentSchema>;

export const jobDispatchSchema = z.object({
  job_id: z.string(),
  input_image_path: z.string(),
  prompt: z.string(),
  negative_prompt: z.string().nullable(),
  seed: z.number().int().nullable(),
});
export type JobDispatch = z.infer<typeof jobDispatchSchema>;

export const nextJobResponseSchema = z.union([
  jobDispatchSchema,
  z.object({ job_id: z.null() }),
]);
export type NextJobResponse = z.infer<typeof nextJobResponseSchema>;

export const createJobResponseSchema = z.object({
  job_id: z.string(),
  status: jobStatusSchema,
  message: z.string(),
});
export type CreateJobResponse = z.infer<typeof createJobResponseSchema>;

export const jobListDocumentSchema = z.object({
  total: z.number().int(),
  returned: z.number().int(),
  jobs: z.array(jobStatusDocumentSchema),
});
export type JobListDocument = z.infer<typeof jobListDocumentSchema>;

export const transitionResponseSchema = z.object({
  status: z.enum(["ok", "ignored"]),
  reason: z.string().optional(),
});
export type TransitionResponse = z.infer<typeof transitionResponseSchema>;

export const deleteJobResponseSchema = z.object({
  message: z.string(),
  files_removed: z.number().int(),
});
export type DeleteJobResponse = z.infer<typeof deleteJobResponseSchema>;

export const healthDocumentSchema = z.object({
  status: z.literal("healthy"),
  timestamp: z.string(),
  jobs_count: z.number().int(),
  queued: z.number().int(),
  running: z.number().int(),
  done: z.number().int(),
  error: z.number().int(),
});
export type HealthDocument = z.infer<typeof healthDocumentSchema>;

export const errorBodySchema = z.object({
  error: z.string(),
  message: z.string(),
});
export type ErrorBody = z.infer<typeof errorBodySchema>;

const iso = (ms: number) => new Date(ms).toISOString();

export function toStatusDocument(job: Job): JobStatusDocument {
  const startedAt = job.status === "queued" ? null : job.startedAt;
  const completedAt = job.status === "done" || job.status === "error" ? job.completedAt : null;
  return {
    id: job.id,
    status: job.status,
    created_at: iso(job.createdAt),
    prompt: job.prompt,
    negative_prompt: job.negativePrompt,
    seed: job.seed,
    has_result: job.status === "done",
    error_message: job.status === "error" ? job.errorMessage : null,
    started_at: startedAt === null ? null : iso(startedAt),
    completed_at: completedAt === null ? null : iso(completedAt),
    processing_time:
      startedAt !== null && completedAt !== null ? (completedAt - startedAt) / 1000 : null,
  };
}

export function toDispatch(job: Job): JobDispatch {
  return {
    job_id: job.id,
    input_image_path: job.inputPath,
    prompt: job.prompt,
    negative_prompt: job.negativePrompt,
    seed: job.seed,
  };
}

export function toHealthDocument(counts: StatusCounts, now: number = Date.now()): HealthDocument {
  return {
    status: "healthy",
    timestamp: iso(now),
    jobs_count: counts.queued + counts.running + counts.done + counts.error,
    ...counts,
  };
}

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import {
  DEFAULT_LIST_LIMIT,
  JobNotCompleteError,
  JobNotFoundError,
  jobStatusSchema,
  MAX_SEED,
  RelayError,
  toStatusDocument,
  ValidationError,
  type JobListDocument,
} from "@genrelay/shared";
import type { JobService } from "../services/jobs";
import { asyncRoute } from "../middleware/asyncRoute";
import { parseWith } from "../utils/validate";

const blankToUndefined = (v: unknown) => {
  const trimmed = typeof v === "string" ? v.trim() : v;
  return trimmed === "" ? undefined : trimmed;
};

const seedSchema = z
  .string()
  .regex(/^\d+$/, "must be a non-negative decimal integer")
  .transform(Number)
  .pipe(z.number().max(MAX_SEED));

const createJobFieldsSchema = z.object({
  prompt: z.string().default(""),
  negative_prompt: z.string().optional(),
  seed: z.preprocess(blankToUndefined, seedSchema.optional()),
});

export interface JobsRouterOptions {
  uploadLimitBytes: number;
  listLimitMax: number;
}

export function jobsRouter(service: JobService, options: JobsRouterOptions) {
  const r = Router();
  const store = service.store;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.uploadLimitBytes, files: 1 },
  });

  const listQuerySchema = z.object({
    status: jobStatusSchema.optional(),
    limit: z.coerce.number().int().min(1).max(options.listLimitMax).default(DEFAULT_LIST_LIMIT),
  });

  r.post(
    "/jobs",
    upload.single("image"),
    asyncRoute(async (req, res) => {
      if (!req.file) throw new ValidationError("image: an image file is required");
      const fields = parseWith(createJobFieldsSchema, req.body);

      const job = await service.submit({
        image: req.file,
        prompt: fields.prompt,
        negativePrompt: fields.negative_prompt ?? null,
        seed: fields.seed ?? null,
      });
      res.status(201).json({ job_id: job.id, status: job.status, message: "Job queued for processing" });
    })
  );

  r.get("/jobs", (req, res) => {
    const query = parseWith(listQuerySchema, req.query);
    const jobs = store.list({ status: query.status, limit: query.limit });
    const body: JobListDocument = {
      total: store.size,
      returned: jobs.length,
      jobs: jobs.map(toStatusDocument),
    };
    res.json(body);
  });

  r.get("/jobs/:id", (req, res) => {
    const job = store.get(req.params.id);
    if (!job) throw new JobNotFoundError(req.params.id);
    res.json(toStatusDocument(job));
  });

  r.get(
    "/jobs/:id/result",
    asyncRoute(async (req, res, next) => {
      const job = store.get(req.params.id);
      if (!job) throw new JobNotFoundError(req.params.id);
      if (job.status !== "done") throw new JobNotCompleteError(job.id, job.status);

      const resultPath = job.resultPath;
      const exists = await fs.access(resultPath).then(
        () => true,
        () => false
      );
      if (!exists) throw new RelayError("NotFound", "Result file not found", 404);

      res.download(resultPath, `result_${job.id}${path.extname(resultPath)}`, (err) => {
        if (err && !res.headersSent) next(err);
      });
    })
  );

  r.delete(
    "/jobs/:id",
    asyncRoute(async (req, res) => {
      const { filesRemoved } = await service.remove(req.params.id);
      res.json({ message: `Job ${req.params.id} deleted`, files_removed: filesRemoved });
    })
  );

  return r;
}

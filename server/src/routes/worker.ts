import { Router } from "express";
import { z } from "zod";
import { toDispatch, type Job, type TransitionResponse, type TransitionResult } from "@genrelay/shared";
import type { JobService } from "../services/jobs";
import { parseWith } from "../utils/validate";

const completeSchema = z.object({ result_path: z.string().min(1) });
const errorSchema = z.object({ error_message: z.string().min(1) });

function transitionBody<T extends Job>(result: TransitionResult<T>): TransitionResponse {
  return result.applied ? { status: "ok" } : { status: "ignored", reason: result.error.message };
}

/**
 * Dequeue and state-advance calls. Only the worker uses these; a repeated or
 * out-of-order report answers "ignored" instead of failing.
 */
export function workerRouter(service: JobService) {
  const r = Router();

  r.get("/queue/next", (_req, res) => {
    const job = service.store.nextQueued();
    res.json(job ? toDispatch(job) : { job_id: null });
  });

  r.post("/jobs/:id/start", (req, res) => {
    res.json(transitionBody(service.start(req.params.id)));
  });

  r.post("/jobs/:id/complete", (req, res) => {
    const { result_path } = parseWith(completeSchema, req.body);
    res.json(transitionBody(service.complete(req.params.id, result_path)));
  });

  r.post("/jobs/:id/error", (req, res) => {
    const { error_message } = parseWith(errorSchema, req.body);
    res.json(transitionBody(service.fail(req.params.id, error_message)));
  });

  return r;
}

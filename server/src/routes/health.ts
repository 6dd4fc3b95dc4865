import { Router, Request, Response } from "express";
import { toHealthDocument, type JobStore } from "@genrelay/shared";

export function healthRouter(store: JobStore) {
  const r = Router();
  r.get("/health", (_req: Request, res: Response) => {
    res.json(toHealthDocument(store.counts()));
  });
  return r;
}

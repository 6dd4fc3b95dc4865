// server/src/index.ts
import * as fs from "node:fs/promises";
import { JobStore } from "@genrelay/shared";
import { createApp } from "./app";
import { JobService } from "./services/jobs";
import { startSweeper } from "./services/sweeper";
import {
  API_HOST,
  API_PORT,
  INPUT_DIR,
  JOB_MAX_AGE_MS,
  LIST_LIMIT_MAX,
  NODE_ENV,
  SWEEP_INTERVAL_MS,
  UPLOAD_LIMIT_BYTES,
} from "./config";

async function main() {
  await fs.mkdir(INPUT_DIR, { recursive: true });

  const store = new JobStore();
  const service = new JobService(store, INPUT_DIR);
  const app = createApp({
    service,
    uploadLimitBytes: UPLOAD_LIMIT_BYTES,
    listLimitMax: LIST_LIMIT_MAX,
    requestLog: NODE_ENV === "production" ? "combined" : "dev",
  });

  const stopSweeper = startSweeper(service, {
    intervalMs: SWEEP_INTERVAL_MS,
    maxAgeMs: JOB_MAX_AGE_MS,
  });

  const server = app.listen(API_PORT, API_HOST, () => {
    console.log(`[server] listening on ${API_HOST}:${API_PORT} (NODE_ENV=${NODE_ENV})`);
    console.log(`[server] input dir ${INPUT_DIR}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    stopSweeper();
    server.close(() => process.exit(0));
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((e) => {
  console.error("[server] fatal startup error:", e);
  process.exit(1);
});

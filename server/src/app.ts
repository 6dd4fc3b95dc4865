import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { jobsRouter } from "./routes/jobs";
import { workerRouter } from "./routes/worker";
import { healthRouter } from "./routes/health";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import type { JobService } from "./services/jobs";

export { JobService } from "./services/jobs";
export { startSweeper } from "./services/sweeper";

export interface AppOptions {
  service: JobService;
  uploadLimitBytes: number;
  listLimitMax: number;
  /** morgan format, or false for no request log. */
  requestLog?: string | false;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  if (options.requestLog) app.use(morgan(options.requestLog));
  app.use(helmet());
  // Host clients call from anywhere; there is no auth to protect.
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.use(healthRouter(options.service.store));
  app.use(workerRouter(options.service));
  app.use(
    jobsRouter(options.service, {
      uploadLimitBytes: options.uploadLimitBytes,
      listLimitMax: options.listLimitMax,
    })
  );

  app.use(notFoundHandler());
  app.use(errorHandler());
  return app;
}

/**
 * Worker Configuration
 *
 * Centralized configuration for the relay worker, read once from the
 * environment (and a `.env` file when present).
 */
import dotenv from "dotenv";
import path from "node:path";
import { getEnvBoolean, getEnvNumber } from "./utils/env";

dotenv.config();

export const BROKER_URL = process.env.BROKER_URL || "http://127.0.0.1:8080";
export const BACKEND_URL = process.env.BACKEND_URL || "http://127.0.0.1:8111";

/**
 * The backend's output root on the filesystem it shares with this worker.
 * Manifest entries are resolved against it.
 */
export const BACKEND_OUTPUT_DIR = path.resolve(
  process.env.BACKEND_OUTPUT_DIR || path.join(process.cwd(), "data", "output")
);

/** Subfolder of the output root that holds relay results (`<subfolder>/<job id>…`). */
export const OUTPUT_SUBFOLDER = process.env.OUTPUT_SUBFOLDER || "relay_output";

export const WORKFLOW_PATH = path.resolve(
  process.env.WORKFLOW_PATH || path.join(__dirname, "..", "workflows", "image_to_video.json")
);

/** Defaults to the template path with `.bindings.json` in place of `.json`. */
export const WORKFLOW_BINDINGS_PATH = process.env.WORKFLOW_BINDINGS_PATH
  ? path.resolve(process.env.WORKFLOW_BINDINGS_PATH)
  : undefined;

export const WORKER_POLL_INTERVAL_MS = getEnvNumber("WORKER_POLL_INTERVAL_MS", 500);
export const BACKEND_POLL_INTERVAL_MS = getEnvNumber("BACKEND_POLL_INTERVAL_MS", 1000);
export const JOB_TIMEOUT_MS = getEnvNumber("JOB_TIMEOUT_MS", 10 * 60 * 1000);
export const REQUEST_TIMEOUT_MS = getEnvNumber("REQUEST_TIMEOUT_MS", 10_000);

/**
 * Loop-level failures (broker or backend unreachable) tolerated in a row
 * before the worker cools down for ERROR_COOLDOWN_MS.
 */
export const MAX_CONSECUTIVE_ERRORS = getEnvNumber("MAX_CONSECUTIVE_ERRORS", 5);
export const ERROR_COOLDOWN_MS = getEnvNumber("ERROR_COOLDOWN_MS", 10_000);

export const WORKER_DEBUG = getEnvBoolean("WORKER_DEBUG");

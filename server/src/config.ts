import dotenv from "dotenv";
import path from "node:path";
dotenv.config();

export const NODE_ENV = process.env.NODE_ENV ?? "development";
export const API_HOST = process.env.API_HOST || "0.0.0.0";
export const API_PORT = Number(process.env.API_PORT ?? 8080);

// Uploaded inputs land in the backend's input directory.
export const INPUT_DIR = path.resolve(process.env.INPUT_DIR || path.join(process.cwd(), "data", "input"));
export const UPLOAD_LIMIT_BYTES = Number(process.env.UPLOAD_LIMIT_BYTES ?? 25 * 1024 * 1024); // 25MB

export const JOB_MAX_AGE_MS = Number(process.env.JOB_MAX_AGE_MS ?? 60 * 60 * 1000);
export const SWEEP_INTERVAL_MS = Number(process.env.SWEEP_INTERVAL_MS ?? 60 * 1000);

export const LIST_LIMIT_MAX = Number(process.env.LIST_LIMIT_MAX ?? 500);

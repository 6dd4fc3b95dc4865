export const JOB_STATUSES = ["queued", "running", "done", "error"] as const;

export const JOB_ID_PREFIX = "job_";

export const DEFAULT_LIST_LIMIT = 50;

// Largest seed the JSON number wire carries without rounding.
export const MAX_SEED = Number.MAX_SAFE_INTEGER;

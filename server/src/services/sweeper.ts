import type { JobService } from "./jobs";

export interface SweeperOptions {
  intervalMs: number;
  maxAgeMs: number;
}

/** Runs the age sweep on a timer. Returns a stop function. */
export function startSweeper(service: JobService, options: SweeperOptions): () => void {
  if (options.intervalMs <= 0) {
    console.log("[sweep] disabled");
    return () => undefined;
  }

  let running = false;
  const timer = setInterval(() => {
    if (running) return;
    running = true;
    service
      .sweep(options.maxAgeMs)
      .catch((err) => console.error("[sweep] failed:", err))
      .finally(() => {
        running = false;
      });
  }, options.intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}

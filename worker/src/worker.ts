import { describeError, sleep, type BrokerApi, type JobDispatch } from "@genrelay/shared";
import type { BackendApi } from "./backend/backendClient";
import { resolveOutput } from "./backend/outputResolver";
import { buildWorkflowRequest } from "./pipeline/templater";
import type { WorkflowBindings, WorkflowGraph } from "./pipeline/workflow";
import { dLog, eLog, nLog, wLog } from "./logger";

/** What one loop iteration did. */
export type IterationOutcome = "idle" | "skipped" | "completed" | "failed";

export interface RelayWorkerOptions {
  outputDir: string;
  outputSubfolder: string;
  pollIntervalMs: number;
  backendPollIntervalMs: number;
  jobTimeoutMs: number;
  maxConsecutiveErrors: number;
  errorCooldownMs: number;
  randomSeed?: () => number;
}

export interface RelayWorkerDeps {
  broker: BrokerApi;
  backend: BackendApi;
  template: WorkflowGraph;
  bindings: WorkflowBindings;
  options: RelayWorkerOptions;
  /** Waits between iterations; resolves early once the signal aborts. */
  pause?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/**
 * Single-worker loop: dequeue from the broker, run the job on the backend,
 * report the outcome. Job failures are reported as data; only broker
 * failures (including failed reports) count as loop errors.
 */
export class RelayWorker {
  private readonly broker: BrokerApi;
  private readonly backend: BackendApi;
  private readonly template: WorkflowGraph;
  private readonly bindings: WorkflowBindings;
  private readonly options: RelayWorkerOptions;
  private readonly pause: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly controller = new AbortController();

  constructor(deps: RelayWorkerDeps) {
    this.broker = deps.broker;
    this.backend = deps.backend;
    this.template = deps.template;
    this.bindings = deps.bindings;
    this.options = deps.options;
    this.pause = deps.pause ?? sleep;
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  /** Ends `run()` after the job in hand; idle waits return at once. */
  stop(): void {
    this.controller.abort();
  }

  async run(): Promise<void> {
    const { pollIntervalMs, maxConsecutiveErrors, errorCooldownMs } = this.options;
    const signal = this.controller.signal;
    let consecutiveErrors = 0;

    nLog("[worker] ready and polling for jobs");
    while (!signal.aborted) {
      try {
        const outcome = await this.runOnce();
        consecutiveErrors = 0;
        if (outcome === "idle") await this.pause(pollIntervalMs, signal);
      } catch (err) {
        consecutiveErrors += 1;
        eLog(`[worker] loop error (${consecutiveErrors}/${maxConsecutiveErrors}): ${describeError(err)}`);
        if (consecutiveErrors >= maxConsecutiveErrors) {
          wLog(`[worker] ${consecutiveErrors} errors in a row, cooling down for ${errorCooldownMs}ms`);
          await this.pause(errorCooldownMs, signal);
          consecutiveErrors = 0;
        } else {
          await this.pause(pollIntervalMs, signal);
        }
      }
    }
    nLog("[worker] stopped");
  }

  /**
   * One iteration. Broker failures propagate; anything that goes wrong
   * while the job runs is reported through markError.
   */
  async runOnce(): Promise<IterationOutcome> {
    const job = await this.broker.nextJob();
    if (!job) return "idle";

    nLog(`[worker] picked up ${job.job_id}`);
    if (!(await this.broker.markStarted(job.job_id))) {
      wLog(`[worker] ${job.job_id} could not be started (deleted or already claimed), skipping`);
      return "skipped";
    }

    let resultPath: string;
    const startedAt = Date.now();
    try {
      resultPath = await this.processJob(job);
    } catch (err) {
      const message = describeError(err);
      eLog(`[worker] ${job.job_id} failed: ${message}`);
      if (!(await this.broker.markError(job.job_id, message))) {
        wLog(`[worker] error report for ${job.job_id} was ignored by the broker`);
      }
      return "failed";
    }

    if (!(await this.broker.markComplete(job.job_id, resultPath))) {
      wLog(`[worker] completion of ${job.job_id} was ignored by the broker`);
    }
    nLog(`[worker] completed ${job.job_id} in ${((Date.now() - startedAt) / 1000).toFixed(1)}s -> ${resultPath}`);
    return "completed";
  }

  private async processJob(job: JobDispatch): Promise<string> {
    const { graph, seed, warnings } = buildWorkflowRequest(
      this.template,
      this.bindings,
      {
        jobId: job.job_id,
        imagePath: job.input_image_path,
        prompt: job.prompt,
        negativePrompt: job.negative_prompt,
        seed: job.seed,
      },
      { outputSubfolder: this.options.outputSubfolder, randomSeed: this.options.randomSeed }
    );
    for (const warning of warnings) wLog(`[workflow] ${job.job_id} ${warning}`);
    dLog(`[worker] ${job.job_id} seed=${seed}`);

    const executionId = await this.backend.submit(graph);
    const record = await this.backend.pollUntilTerminal(executionId, {
      pollIntervalMs: this.options.backendPollIntervalMs,
      timeoutMs: this.options.jobTimeoutMs,
    });
    return resolveOutput(record, this.options.outputDir).path;
  }
}

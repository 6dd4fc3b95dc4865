import { v4 as uuidv4 } from "uuid";
import type { z } from "zod";
import {
  BackendExecutionFailedError,
  BackendTimeoutError,
  BackendUnavailableError,
  errorMessage,
  sleep,
} from "@genrelay/shared";
import type { WorkflowGraph } from "../pipeline/workflow";
import { dLog, nLog } from "../logger";
import {
  executionErrorMessage,
  historyResponseSchema,
  queueResponseSchema,
  submitResponseSchema,
  type ExecutionRecord,
  type HistoryEntry,
} from "./history";

export interface PollOptions {
  pollIntervalMs: number;
  timeoutMs: number;
}

/** What the worker needs from the backend, so tests can stand in for it. */
export interface BackendApi {
  submit(graph: WorkflowGraph): Promise<string>;
  pollUntilTerminal(executionId: string, options: PollOptions): Promise<ExecutionRecord>;
}

export interface BackendClientOptions {
  baseUrl: string;
  requestTimeoutMs?: number;
  clientId?: string;
}

class PollError extends Error {}

/**
 * Talks the backend's wire protocol: submit a job graph, then poll its
 * history until the execution finishes, fails or runs out of time. There is
 * no cancel: a timed-out execution keeps running on the backend.
 */
export class BackendClient implements BackendApi {
  readonly clientId: string;
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;

  constructor(options: BackendClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.clientId = options.clientId ?? uuidv4();
  }

  async submit(graph: WorkflowGraph): Promise<string> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/prompt`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ prompt: graph, client_id: this.clientId }),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      throw new BackendUnavailableError(`Backend unreachable at ${this.baseUrl}: ${errorMessage(err)}`, err);
    }

    if (!res.ok) {
      const text = (await res.text().catch(() => "")).slice(0, 500);
      if (res.status >= 500) {
        throw new BackendUnavailableError(`Backend replied ${res.status} ${res.statusText}: ${text}`);
      }
      throw new BackendExecutionFailedError(`Backend rejected workflow (${res.status}): ${text}`);
    }

    const body = await this.readJson(res, submitResponseSchema).catch((err: unknown) => {
      throw new BackendUnavailableError(`Unexpected submit reply: ${errorMessage(err)}`, err);
    });
    nLog(`[backend] queued execution ${body.prompt_id}`);
    return body.prompt_id;
  }

  async pollUntilTerminal(executionId: string, options: PollOptions): Promise<ExecutionRecord> {
    const startedAt = Date.now();
    let lastError: string | undefined;
    let polls = 0;

    const remaining = () => options.timeoutMs - (Date.now() - startedAt);

    for (;;) {
      polls += 1;
      const requestBudget = Math.max(1, Math.min(this.requestTimeoutMs, remaining()));
      try {
        const entry = await this.fetchHistory(executionId, requestBudget);
        lastError = undefined;
        if (entry) {
          if (entry.status?.status_str === "error") {
            throw new BackendExecutionFailedError(
              `Workflow execution failed: ${executionErrorMessage(entry)}`,
              executionId
            );
          }
          if (entry.outputs) {
            nLog(`[backend] execution ${executionId} completed after ${polls} poll(s)`);
            return { executionId, outputs: entry.outputs, status: entry.status };
          }
        }
      } catch (err) {
        if (!(err instanceof PollError)) throw err;
        dLog(`[backend] poll ${polls} for ${executionId} failed: ${err.message}`);
        // a request cut short by the job budget is not a backend failure
        const cutByBudget = requestBudget < this.requestTimeoutMs && remaining() <= 0;
        if (!cutByBudget) lastError = err.message;
      }

      const left = remaining();
      if (left <= 0) {
        throw new BackendTimeoutError(executionId, options.timeoutMs, lastError);
      }
      await sleep(Math.min(options.pollIntervalMs, left));
    }
  }

  /** Running and pending counts from the backend's queue. */
  async getQueue(): Promise<{ running: number; pending: number }> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/queue`, { signal: AbortSignal.timeout(this.requestTimeoutMs) });
    } catch (err) {
      throw new BackendUnavailableError(`Backend unreachable at ${this.baseUrl}: ${errorMessage(err)}`, err);
    }
    if (!res.ok) throw new BackendUnavailableError(`Backend replied ${res.status} ${res.statusText}`);
    const body = await this.readJson(res, queueResponseSchema).catch((err: unknown) => {
      throw new BackendUnavailableError(`Unexpected queue reply: ${errorMessage(err)}`, err);
    });
    return { running: body.queue_running.length, pending: body.queue_pending.length };
  }

  /** The execution's record, or undefined while it is still pending. */
  private async fetchHistory(executionId: string, timeoutMs: number): Promise<HistoryEntry | undefined> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/history/${encodeURIComponent(executionId)}`, {
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new PollError(errorMessage(err));
    }
    if (!res.ok) throw new PollError(`history replied ${res.status} ${res.statusText}`);
    const history = await this.readJson(res, historyResponseSchema).catch((err: unknown) => {
      throw new PollError(errorMessage(err));
    });
    return history[executionId];
  }

  private async readJson<T>(res: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const raw: unknown = await res.json();
    const parsed = schema.safeParse(raw);
    if (!parsed.success) throw new Error(parsed.error.message);
    return parsed.data;
  }
}

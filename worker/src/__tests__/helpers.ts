import fs from "node:fs/promises";
import type { Server } from "node:http";
import os from "node:os";
import path from "node:path";
import express, { type Express } from "express";
import type { ExecutionRecord } from "../backend/history";

export interface RunningServer {
  baseUrl: string;
  close: () => Promise<void>;
}

export async function listen(app: Express): Promise<RunningServer> {
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no TCP address");
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/** A URL nothing listens on. */
export async function closedPortUrl(): Promise<string> {
  const { baseUrl, close } = await listen(express());
  await close();
  return baseUrl;
}

export async function makeTempDir(label: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `genrelay-${label}-`));
}

export interface Reply {
  status: number;
  body: unknown;
}

export interface FakeBackendScript {
  submit?: (body: unknown) => Reply;
  /** `poll` counts history requests for this execution, starting at 1. */
  history: (executionId: string, poll: number) => Reply;
}

export interface FakeBackend extends RunningServer {
  submissions: unknown[];
  polls: () => number;
}

/**
 * In-process stand-in for the generative backend's /prompt, /history and
 * /queue endpoints.
 */
export async function startFakeBackend(script: FakeBackendScript): Promise<FakeBackend> {
  const app = express();
  app.use(express.json({ limit: "5mb" }));
  const submissions: unknown[] = [];
  const pollCounts = new Map<string, number>();
  let executions = 0;

  app.post("/prompt", (req, res) => {
    submissions.push(req.body);
    const reply = script.submit
      ? script.submit(req.body)
      : { status: 200, body: { prompt_id: `exec-${++executions}`, number: executions, node_errors: {} } };
    res.status(reply.status).json(reply.body);
  });

  app.get("/history/:id", (req, res) => {
    const poll = (pollCounts.get(req.params.id) ?? 0) + 1;
    pollCounts.set(req.params.id, poll);
    const reply = script.history(req.params.id, poll);
    res.status(reply.status).json(reply.body);
  });

  app.get("/queue", (_req, res) => {
    res.json({ queue_running: [[0, "exec-running"]], queue_pending: [] });
  });

  const running = await listen(app);
  return {
    ...running,
    submissions,
    polls: () => Array.from(pollCounts.values()).reduce((a, b) => a + b, 0),
  };
}

export const pending = (): Reply => ({ status: 200, body: {} });

export function succeeded(executionId: string, outputs: ExecutionRecord["outputs"]): Reply {
  return {
    status: 200,
    body: {
      [executionId]: {
        prompt: [],
        outputs,
        status: { status_str: "success", completed: true, messages: [["execution_success", {}]] },
      },
    },
  };
}

export function failed(executionId: string, nodeType: string, message: string): Reply {
  return {
    status: 200,
    body: {
      [executionId]: {
        outputs: {},
        status: {
          status_str: "error",
          completed: false,
          messages: [
            ["execution_start", { prompt_id: executionId }],
            ["execution_error", { prompt_id: executionId, node_type: nodeType, exception_message: message }],
          ],
        },
      },
    },
  };
}

/** Silences worker log lines for the duration of a test file. */
export function quietConsole(): void {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
  });
  afterEach(() => {
    jest.restoreAllMocks();
  });
}

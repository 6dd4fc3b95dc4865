// worker/src/index.ts
import path from "node:path";
import { parseArgs } from "node:util";
import { BrokerClient, describeError } from "@genrelay/shared";
import { BackendClient } from "./backend/backendClient";
import { loadWorkflow } from "./pipeline/bindings";
import { RelayWorker } from "./worker";
import { eLog, nLog, setDebug, wLog } from "./logger";
import {
  BACKEND_OUTPUT_DIR,
  BACKEND_POLL_INTERVAL_MS,
  BACKEND_URL,
  BROKER_URL,
  ERROR_COOLDOWN_MS,
  JOB_TIMEOUT_MS,
  MAX_CONSECUTIVE_ERRORS,
  OUTPUT_SUBFOLDER,
  REQUEST_TIMEOUT_MS,
  WORKER_DEBUG,
  WORKER_POLL_INTERVAL_MS,
  WORKFLOW_BINDINGS_PATH,
  WORKFLOW_PATH,
} from "./config";

async function main() {
  const { values } = parseArgs({
    options: {
      workflow: { type: "string" },
      debug: { type: "boolean", default: false },
    },
  });
  setDebug(WORKER_DEBUG || values.debug === true);

  const templatePath = values.workflow ? path.resolve(values.workflow) : WORKFLOW_PATH;
  const workflow = await loadWorkflow(templatePath, WORKFLOW_BINDINGS_PATH);
  nLog(`[worker] workflow ${workflow.templatePath} (bindings ${workflow.bindingsPath})`);

  const broker = new BrokerClient({ baseUrl: BROKER_URL, requestTimeoutMs: REQUEST_TIMEOUT_MS });
  const backend = new BackendClient({ baseUrl: BACKEND_URL, requestTimeoutMs: REQUEST_TIMEOUT_MS });

  nLog(`[worker] broker ${BROKER_URL}, backend ${BACKEND_URL}, outputs ${BACKEND_OUTPUT_DIR}`);
  try {
    const queue = await backend.getQueue();
    nLog(`[worker] backend queue: ${queue.running} running, ${queue.pending} pending`);
  } catch (err) {
    wLog(`[worker] backend not reachable yet: ${describeError(err)}`);
  }

  const worker = new RelayWorker({
    broker,
    backend,
    template: workflow.template,
    bindings: workflow.bindings,
    options: {
      outputDir: BACKEND_OUTPUT_DIR,
      outputSubfolder: OUTPUT_SUBFOLDER,
      pollIntervalMs: WORKER_POLL_INTERVAL_MS,
      backendPollIntervalMs: BACKEND_POLL_INTERVAL_MS,
      jobTimeoutMs: JOB_TIMEOUT_MS,
      maxConsecutiveErrors: Math.max(1, MAX_CONSECUTIVE_ERRORS),
      errorCooldownMs: ERROR_COOLDOWN_MS,
    },
  });

  const shutdown = (signal: string) => {
    nLog(`[worker] ${signal} received, finishing current job`);
    worker.stop();
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  await worker.run();
}

main().catch((e) => {
  eLog("[worker] fatal startup error:", describeError(e));
  process.exit(1);
});

import * as fs from "node:fs/promises";
import type { Server } from "node:http";
import * as os from "node:os";
import * as path from "node:path";
import express, { type Express } from "express";
import { JobStore, type JobStoreOptions } from "@genrelay/shared";
import { createApp } from "../app";
import { JobService } from "../services/jobs";

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

export interface TestBroker extends RunningServer {
  store: JobStore;
  service: JobService;
  inputDir: string;
}

export async function startBroker(
  inputDir: string,
  options: { store?: JobStoreOptions; uploadLimitBytes?: number } = {}
): Promise<TestBroker> {
  const store = new JobStore(options.store);
  const service = new JobService(store, inputDir);
  const app = createApp({
    service,
    uploadLimitBytes: options.uploadLimitBytes ?? 1024 * 1024,
    listLimitMax: 500,
    requestLog: false,
  });
  const running = await listen(app);
  return { ...running, store, service, inputDir };
}

export function imageForm(fields: Record<string, string> = {}, image = "fake-png-bytes"): FormData {
  const form = new FormData();
  form.append("image", new Blob([image], { type: "image/png" }), "frame.png");
  for (const [key, value] of Object.entries(fields)) form.append(key, value);
  return form;
}

/** Silences the [jobs]/[sweep] log lines for the duration of a test file. */
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

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { JobStore, sleep } from "@genrelay/shared";
import { JobService, releaseFiles } from "../services/jobs";
import { startSweeper } from "../services/sweeper";
import { makeTempDir, quietConsole } from "./helpers";

quietConsole();

let root: string;
let now: number;
let store: JobStore;
let service: JobService;

beforeEach(async () => {
  root = await makeTempDir("sweep");
  now = 1_000_000;
  store = new JobStore({ now: () => now });
  service = new JobService(store, root);
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

const image = (name: string) => ({ buffer: Buffer.from(name), originalname: `${name}.jpg` });

async function exists(file: string): Promise<boolean> {
  return fs.access(file).then(
    () => true,
    () => false
  );
}

describe("JobService.sweep", () => {
  it("removes aged jobs and the files they own", async () => {
    const old = await service.submit({ image: image("old"), prompt: "", negativePrompt: null, seed: null });
    service.start(old.id);
    const resultPath = path.join(root, "old-result.mp4");
    await fs.writeFile(resultPath, "r");
    service.complete(old.id, resultPath);

    now += 10_000;
    const fresh = await service.submit({ image: image("fresh"), prompt: "", negativePrompt: null, seed: null });

    now += 1_000;
    await expect(service.sweep(5_000)).resolves.toBe(1);

    expect(store.get(old.id)).toBeUndefined();
    expect(store.get(fresh.id)).toBeDefined();
    expect(await exists(old.inputPath)).toBe(false);
    expect(await exists(resultPath)).toBe(false);
    expect(await exists(fresh.inputPath)).toBe(true);
    expect(path.extname(fresh.inputPath)).toBe(".jpg");
  });

  it("returns 0 when nothing is old enough", async () => {
    await service.submit({ image: image("a"), prompt: "", negativePrompt: null, seed: null });
    await expect(service.sweep(5_000)).resolves.toBe(0);
    expect(store.size).toBe(1);
  });
});

describe("releaseFiles", () => {
  it("counts removed files and skips missing ones", async () => {
    const file = path.join(root, "present.txt");
    await fs.writeFile(file, "x");
    await expect(releaseFiles([file, path.join(root, "absent.txt")])).resolves.toBe(1);
  });
});

describe("startSweeper", () => {
  it("sweeps on its interval until stopped", async () => {
    const job = await service.submit({ image: image("a"), prompt: "", negativePrompt: null, seed: null });
    now += 60_000;

    const stop = startSweeper(service, { intervalMs: 10, maxAgeMs: 1_000 });
    try {
      for (let i = 0; i < 100 && store.size > 0; i++) await sleep(10);
    } finally {
      stop();
    }
    expect(store.get(job.id)).toBeUndefined();
    expect(await exists(job.inputPath)).toBe(false);
  });

  it("does nothing when the interval is 0", async () => {
    await service.submit({ image: image("a"), prompt: "", negativePrompt: null, seed: null });
    now += 60_000;

    const stop = startSweeper(service, { intervalMs: 0, maxAgeMs: 1_000 });
    await sleep(30);
    stop();
    expect(store.size).toBe(1);
    expect(console.log).toHaveBeenCalledWith("[sweep] disabled");
  });
});

import fs from "node:fs";
import path from "node:path";
import { NoOutputProducedError } from "@genrelay/shared";
import { wLog } from "../logger";
import { OUTPUT_KINDS, type ExecutionRecord, type OutputKind } from "./history";

export interface ResolvedOutput {
  nodeId: string;
  kind: OutputKind;
  path: string;
}

export interface CollectedOutputs {
  files: ResolvedOutput[];
  /** One line per manifest entry that did not resolve to a file. */
  missing: string[];
}

/** Absolute path of an entry, or null when it would leave the output root. */
function resolveEntry(outputRoot: string, filename: string, subfolder: string | undefined): string | null {
  const root = path.resolve(outputRoot);
  const target = path.resolve(root, subfolder ?? "", filename);
  const rel = path.relative(root, target);
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) return null;
  return target;
}

/**
 * Every manifest entry that exists on disk, in manifest order: nodes as the
 * backend lists them, then images, videos and gifs within each node.
 */
export function collectOutputs(record: ExecutionRecord, outputRoot: string): CollectedOutputs {
  const files: ResolvedOutput[] = [];
  const missing: string[] = [];

  for (const [nodeId, nodeOutput] of Object.entries(record.outputs)) {
    for (const kind of OUTPUT_KINDS) {
      for (const entry of nodeOutput[kind] ?? []) {
        const resolved = resolveEntry(outputRoot, entry.filename, entry.subfolder);
        const label = `node ${nodeId} ${kind}: ${path.join(entry.subfolder ?? "", entry.filename)}`;
        if (resolved === null) {
          missing.push(`${label} (outside output root)`);
        } else if (fs.existsSync(resolved)) {
          files.push({ nodeId, kind, path: resolved });
        } else {
          missing.push(`${label} (not on disk)`);
        }
      }
    }
  }

  return { files, missing };
}

/** First existing output file of the execution. */
export function resolveOutput(record: ExecutionRecord, outputRoot: string): ResolvedOutput {
  const { files, missing } = collectOutputs(record, outputRoot);
  for (const line of missing) {
    wLog(`[outputs] ${record.executionId} skipped ${line}`);
  }
  const [first] = files;
  if (!first) {
    throw new NoOutputProducedError(
      missing.length > 0
        ? `Workflow completed but no output file found (${missing.length} manifest entr${missing.length === 1 ? "y" : "ies"} missing)`
        : undefined
    );
  }
  return first;
}

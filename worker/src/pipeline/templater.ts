import { randomBytes } from "node:crypto";
import { MAX_SEED, type JobId } from "@genrelay/shared";
import type { WorkflowBindings, WorkflowField, WorkflowGraph } from "./workflow";

export interface WorkflowValues {
  jobId: JobId;
  imagePath: string;
  prompt: string;
  negativePrompt: string | null;
  seed: number | null;
}

export interface TemplateOptions {
  outputSubfolder: string;
  /** Seed source used when the job brings none; must return a value in 1..MAX_SEED. */
  randomSeed?: () => number;
}

export interface WorkflowRequest {
  graph: WorkflowGraph;
  /** The seed actually sent, generated or not. */
  seed: number;
  /** Values that had nowhere to go in this template. */
  warnings: string[];
}

/** Uniform over 1..MAX_SEED: 53 random bits, redrawn on zero. */
export function randomSeed(bytes: (size: number) => Buffer = randomBytes): number {
  for (;;) {
    const value = Number(bytes(8).readBigUInt64BE() >> 11n);
    if (value >= 1 && value <= MAX_SEED) return value;
  }
}

/**
 * Builds the concrete graph for one job. Pure apart from the seed source:
 * the template is cloned, never written to, and the same inputs with the
 * same seed yield the same graph.
 */
export function buildWorkflowRequest(
  template: WorkflowGraph,
  bindings: WorkflowBindings,
  values: WorkflowValues,
  options: TemplateOptions
): WorkflowRequest {
  const graph = structuredClone(template);
  const warnings: string[] = [];
  const seed = values.seed ?? (options.randomSeed ?? randomSeed)();

  const inject = (field: WorkflowField, value: string | number) => {
    const binding = bindings[field];
    if (!binding) {
      warnings.push(`${field}: no binding in this workflow, value skipped`);
      return;
    }
    const node = graph[binding.nodeId];
    if (!node) {
      warnings.push(`${field}: node ${binding.nodeId} not in workflow, value skipped`);
      return;
    }
    node.inputs[binding.input] = value;
  };

  inject("imageInput", values.imagePath);
  if (values.prompt !== "") inject("positivePrompt", values.prompt);
  if (values.negativePrompt !== null) inject("negativePrompt", values.negativePrompt);
  inject("seed", seed);
  inject("outputPrefix", `${options.outputSubfolder}/${values.jobId}`);

  return { graph, seed, warnings };
}

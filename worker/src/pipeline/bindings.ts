import fs from "node:fs/promises";
import path from "node:path";
import type { z } from "zod";
import { ConfigurationError, errorMessage } from "@genrelay/shared";
import {
  WORKFLOW_FIELDS,
  workflowBindingsSchema,
  workflowGraphSchema,
  type WorkflowBindings,
  type WorkflowGraph,
} from "./workflow";

export interface LoadedWorkflow {
  template: WorkflowGraph;
  bindings: WorkflowBindings;
  templatePath: string;
  bindingsPath: string;
}

/** `image_to_video.json` → `image_to_video.bindings.json` */
export function defaultBindingsPath(templatePath: string): string {
  const ext = path.extname(templatePath);
  return `${ext ? templatePath.slice(0, -ext.length) : templatePath}.bindings.json`;
}

/**
 * Every binding must point at a node the template has. Unknown field names
 * are rejected by the schema before this runs.
 */
export function validateBindings(template: WorkflowGraph, bindings: WorkflowBindings): void {
  const problems: string[] = [];
  for (const field of WORKFLOW_FIELDS) {
    const binding = bindings[field];
    if (binding && !template[binding.nodeId]) {
      problems.push(`${field} → node ${binding.nodeId} is not in the workflow`);
    }
  }
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid workflow bindings: ${problems.join("; ")}`);
  }
}

async function readJsonFile<T>(
  filePath: string,
  label: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${label} ${filePath}: ${errorMessage(err)}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid ${label} ${filePath}: ${issues}`);
  }
  return parsed.data;
}

export async function loadWorkflow(templatePath: string, bindingsPath?: string): Promise<LoadedWorkflow> {
  const resolvedBindings = bindingsPath ?? defaultBindingsPath(templatePath);
  const template = await readJsonFile(templatePath, "workflow", workflowGraphSchema);
  const bindings = await readJsonFile(resolvedBindings, "bindings", workflowBindingsSchema);
  validateBindings(template, bindings);
  return { template, bindings, templatePath, bindingsPath: resolvedBindings };
}

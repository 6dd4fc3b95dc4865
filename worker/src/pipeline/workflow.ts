import { z } from "zod";

/** One node of a backend job graph in API form. */
export const workflowNodeSchema = z
  .object({
    class_type: z.string(),
    inputs: z.record(z.unknown()),
    _meta: z.object({ title: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();
export type WorkflowNode = z.infer<typeof workflowNodeSchema>;

/** node id → node */
export const workflowGraphSchema = z.record(workflowNodeSchema);
export type WorkflowGraph = z.infer<typeof workflowGraphSchema>;

/** The job values a template knows how to receive. */
export const WORKFLOW_FIELDS = [
  "imageInput",
  "positivePrompt",
  "negativePrompt",
  "seed",
  "outputPrefix",
] as const;
export type WorkflowField = (typeof WORKFLOW_FIELDS)[number];

export const fieldBindingSchema = z.object({
  nodeId: z.string().min(1),
  input: z.string().min(1),
});
export type FieldBinding = z.infer<typeof fieldBindingSchema>;

export type WorkflowBindings = Partial<Record<WorkflowField, FieldBinding>>;

export const workflowBindingsSchema = z
  .object({
    imageInput: fieldBindingSchema.optional(),
    positivePrompt: fieldBindingSchema.optional(),
    negativePrompt: fieldBindingSchema.optional(),
    seed: fieldBindingSchema.optional(),
    outputPrefix: fieldBindingSchema.optional(),
  })
  .strict();

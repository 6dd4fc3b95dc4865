import { z } from "zod";

// Shapes of the generative backend's /prompt and /history replies. Unknown
// keys are kept so newer backend versions still parse.

export const OUTPUT_KINDS = ["images", "videos", "gifs"] as const;
export type OutputKind = (typeof OUTPUT_KINDS)[number];

export const outputEntrySchema = z
  .object({
    filename: z.string(),
    subfolder: z.string().optional(),
    /** "output" for saved files, "temp" for previews. */
    type: z.string().optional(),
  })
  .passthrough();
export type OutputEntry = z.infer<typeof outputEntrySchema>;

export const nodeOutputSchema = z
  .object({
    images: z.array(outputEntrySchema).optional(),
    videos: z.array(outputEntrySchema).optional(),
    gifs: z.array(outputEntrySchema).optional(),
  })
  .passthrough();
export type NodeOutput = z.infer<typeof nodeOutputSchema>;

export const executionStatusSchema = z
  .object({
    status_str: z.string().optional(),
    completed: z.boolean().optional(),
    messages: z.array(z.unknown()).optional(),
  })
  .passthrough();

export const historyEntrySchema = z
  .object({
    outputs: z.record(nodeOutputSchema).optional(),
    status: executionStatusSchema.optional(),
  })
  .passthrough();
export type HistoryEntry = z.infer<typeof historyEntrySchema>;

/** `GET /history/<id>`: empty while the execution is pending. */
export const historyResponseSchema = z.record(historyEntrySchema);

export const submitResponseSchema = z
  .object({
    prompt_id: z.string(),
    number: z.number().optional(),
    node_errors: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const queueResponseSchema = z
  .object({
    queue_running: z.array(z.unknown()).default([]),
    queue_pending: z.array(z.unknown()).default([]),
  })
  .passthrough();

/** A terminal, successful execution: the output manifest is present. */
export interface ExecutionRecord {
  executionId: string;
  outputs: Record<string, NodeOutput>;
  status: HistoryEntry["status"];
}

const executionErrorSchema = z
  .object({
    node_type: z.string().optional(),
    exception_type: z.string().optional(),
    exception_message: z.string().optional(),
  })
  .passthrough();

/**
 * Readable message from a failed record's status messages; the backend sends
 * them as `[event, data]` pairs and the useful one is `execution_error`.
 */
export function executionErrorMessage(entry: HistoryEntry): string {
  for (const message of entry.status?.messages ?? []) {
    if (!Array.isArray(message) || message[0] !== "execution_error") continue;
    const data = executionErrorSchema.safeParse(message[1]);
    if (!data.success) continue;
    const { node_type, exception_type, exception_message } = data.data;
    const where = node_type ? `${node_type}: ` : "";
    const what = exception_message?.trim() || exception_type || "execution error";
    return `${where}${what}`;
  }
  return "Unknown error";
}

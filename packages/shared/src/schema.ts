import { z } from "zod";

export const summaryLengthSchema = z.enum(["short", "medium", "detailed"]);
export const summaryToneSchema = z.enum(["neutral", "professional", "casual"]);

export const summaryOptionsSchema = z.object({
  length: summaryLengthSchema.optional(),
  tone: summaryToneSchema.optional(),
  bulletPoints: z.boolean().optional(),
  includeTitle: z.boolean().optional(),
  maxChars: z.number().int().positive().optional()
});

export const connectionOverridesSchema = z.object({
  apiKey: z.string().optional(),
  apiBase: z.string().optional(),
  model: z.string().optional()
});

const documentTextSchema = z.string().refine((value) => value.trim().length > 0, {
  message: "Text to summarize must not be empty"
});

export const summarizeRequestSchema = z.object({
  text: documentTextSchema,
  options: summaryOptionsSchema.optional(),
  connection: connectionOverridesSchema.optional(),
  previewPrompt: z.boolean().optional()
});

export const promptPreviewRequestSchema = z.object({
  text: documentTextSchema,
  options: summaryOptionsSchema.optional()
});

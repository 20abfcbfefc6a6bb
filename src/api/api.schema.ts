import { z } from "zod";

export const askPayloadSchema = z.object({
  question: z.string().trim().min(1, "question is required"),
  options: z.array(z.string()).default([]),
  mode: z.enum(["sync", "async"]).default("sync"),
  timeout: z.number().positive().optional(),
});

export const askResultInputSchema = z.object({
  requestId: z.string().min(1),
});

export const planPayloadSchema = z.object({
  project: z.string().trim().min(1, "project is required"),
  steps: z.array(z.string().min(1)).min(1, "at least one step is required"),
});

export const logLevelSchema = z.enum(["info", "success", "warning", "error"]);

export const logPayloadSchema = z.object({
  level: logLevelSchema.default("info"),
  message: z.string().trim().min(1, "message is required"),
  step_index: z.number().int().positive().optional(),
});

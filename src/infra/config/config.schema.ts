import { z } from "zod";

export const telegramModeSchema = z.enum(["polling", "webhook"]);

export const runtimeConfigSchema = z.object({
  projectName: z.string().min(1),
  host: z.string().min(1),
  port: z.number().int().positive().max(65535),
  decisionTimeoutSeconds: z.number().positive(),
  deliveryTimeoutMs: z.number().int().positive(),
  runtimeDir: z.string().min(1),
  dbPath: z.string().min(1),
  lockPath: z.string().min(1),
  startCodeSalt: z.string().optional(),
  telegram: z.object({
    token: z.string().min(1, "TELEGRAM_BOT_TOKEN is required"),
    operatorUsername: z
      .string()
      .trim()
      .min(2, "DEV_TELEGRAM_USERNAME is required")
      .refine((value) => value.startsWith("@"), "DEV_TELEGRAM_USERNAME must start with '@'"),
    mode: telegramModeSchema,
    dropPendingUpdates: z.boolean(),
    startReplyDelayMs: z.number().int().nonnegative(),
  }),
});

export type RuntimeConfigInput = z.input<typeof runtimeConfigSchema>;

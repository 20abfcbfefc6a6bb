import type { z } from "zod";
import type { runtimeConfigSchema, telegramModeSchema } from "./config.schema";

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export type TelegramMode = z.infer<typeof telegramModeSchema>;

import { z } from "zod";

export const telegramMessageSchema = z
  .object({
    text: z.string().optional(),
    from: z
      .object({
        id: z.number().int(),
        username: z.string().optional(),
      })
      .passthrough()
      .optional(),
    chat: z
      .object({
        id: z.union([z.number().int(), z.string()]).optional(),
        username: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const telegramUpdateSchema = z
  .object({
    update_id: z.number().int().optional(),
    message: telegramMessageSchema.optional(),
    edited_message: telegramMessageSchema.optional(),
  })
  .passthrough();

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;

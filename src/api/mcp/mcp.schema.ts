import { z } from "zod";

const jsonRpcIdSchema = z.union([z.string(), z.number(), z.null()]);

export const jsonRpcEnvelopeSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: jsonRpcIdSchema.optional(),
  method: z.string().optional(),
  params: z.unknown().optional(),
  result: z.unknown().optional(),
  error: z.unknown().optional(),
});

export const mcpRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: jsonRpcIdSchema.default(null),
  method: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

export const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
});

export const askResultArgumentsSchema = z.object({
  request_id: z.string().min(1),
});

import type { z } from "zod";
import type { jsonRpcEnvelopeSchema, mcpRequestSchema } from "./mcp.schema";

export type JsonRpcEnvelope = z.infer<typeof jsonRpcEnvelopeSchema>;
export type McpRequest = z.infer<typeof mcpRequestSchema>;
export type JsonRpcId = McpRequest["id"];

export type JsonRpcResponse =
  | { jsonrpc: "2.0"; id: JsonRpcId; result: unknown }
  | { jsonrpc: "2.0"; id: JsonRpcId; error: { code: number; message: string; data?: unknown } };

export type HeaderCheck = { ok: true } | { ok: false; status: 400 | 403; error: string };

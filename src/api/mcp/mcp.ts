import type { z } from "zod";
import { errorMessage } from "@infra/errors/errors";
import { logger } from "@infra/logger/logger";
import { askPayloadSchema, logPayloadSchema, planPayloadSchema } from "../api.schema";
import type { CommandHandlers, CommandResult } from "../api.types";
import {
  JSON_RPC_ERRORS,
  MCP_DEFAULT_PROTOCOL_VERSION,
  MCP_SERVER_INFO,
  MCP_SUPPORTED_PROTOCOL_VERSIONS,
  MCP_TOOLS,
} from "./mcp.consts";
import { askResultArgumentsSchema, toolCallParamsSchema } from "./mcp.schema";
import type { HeaderCheck, JsonRpcEnvelope, JsonRpcId, JsonRpcResponse, McpRequest } from "./mcp.types";

const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "[::1]"]);

function isSupportedVersion(value: string): boolean {
  return MCP_SUPPORTED_PROTOCOL_VERSIONS.some((version) => version === value);
}

function isLocalOrigin(origin: string): boolean {
  if (origin === "null") {
    return true;
  }
  try {
    const url = new URL(origin);
    return (url.protocol === "http:" || url.protocol === "https:") && LOCAL_HOSTS.has(url.hostname);
  } catch {
    return false;
  }
}

export function checkMcpHeaders(headers: { origin?: string | undefined; protocolVersion?: string | undefined }): HeaderCheck {
  if (headers.origin !== undefined && !isLocalOrigin(headers.origin)) {
    return { ok: false, status: 403, error: "origin not allowed" };
  }
  if (headers.protocolVersion !== undefined && !isSupportedVersion(headers.protocolVersion)) {
    return { ok: false, status: 400, error: "unsupported MCP protocol version" };
  }
  return { ok: true };
}

const TRUTHY_FLAGS = new Set(["1", "true", "yes"]);

export function isTruthyFlag(value: string | undefined): boolean {
  return value !== undefined && TRUTHY_FLAGS.has(value.trim().toLowerCase());
}

export function acceptsEventStream(accept: string | undefined): boolean {
  return (accept ?? "").toLowerCase().includes("text/event-stream");
}

export function wantsEventStream(request: {
  accept?: string | undefined;
  transport?: string | undefined;
  sse?: string | undefined;
}): boolean {
  return acceptsEventStream(request.accept)
    || request.transport?.trim().toLowerCase() === "sse"
    || isTruthyFlag(request.sse);
}

/** Notifications and client responses carry nothing to answer. */
export function needsNoReply(envelope: JsonRpcEnvelope): boolean {
  const isNotification = envelope.method !== undefined && (envelope.id === undefined || envelope.id === null);
  const isResponse = envelope.method === undefined && ("result" in envelope || "error" in envelope);
  return isNotification || isResponse;
}

function success(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

export function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: data === undefined ? { code, message } : { code, message, data } };
}

function toolResult(payload: Record<string, unknown>) {
  return {
    content: [{ type: "text", text: JSON.stringify(payload) }],
    structuredContent: payload,
    isError: false,
  };
}

type ToolOutcome =
  | { kind: "result"; value: Record<string, unknown> }
  | { kind: "invalid"; issues: z.ZodIssue[] }
  | { kind: "failed"; error: string };

function fromCommand<T extends Record<string, unknown>>(result: CommandResult<T>): ToolOutcome {
  return result.ok ? { kind: "result", value: result.value } : { kind: "failed", error: result.error };
}

async function runTool(commands: CommandHandlers, name: string, args: Record<string, unknown>): Promise<ToolOutcome | undefined> {
  switch (name) {
    case "plan": {
      const parsed = planPayloadSchema.safeParse(args);
      return parsed.success ? fromCommand(await commands.plan(parsed.data)) : { kind: "invalid", issues: parsed.error.issues };
    }
    case "log": {
      const parsed = logPayloadSchema.safeParse(args);
      return parsed.success ? fromCommand(await commands.log(parsed.data)) : { kind: "invalid", issues: parsed.error.issues };
    }
    case "ask": {
      const parsed = askPayloadSchema.safeParse(args);
      return parsed.success ? fromCommand(await commands.ask(parsed.data)) : { kind: "invalid", issues: parsed.error.issues };
    }
    case "ask_result": {
      const parsed = askResultArgumentsSchema.safeParse(args);
      return parsed.success
        ? fromCommand(commands.askResult(parsed.data.request_id))
        : { kind: "invalid", issues: parsed.error.issues };
    }
    default:
      return undefined;
  }
}

export async function handleMcpRequest(request: McpRequest, commands: CommandHandlers): Promise<JsonRpcResponse> {
  const { id, method, params } = request;

  try {
    if (method === "initialize") {
      const requested = typeof params.protocolVersion === "string" ? params.protocolVersion : undefined;
      return success(id, {
        protocolVersion: requested && isSupportedVersion(requested) ? requested : MCP_DEFAULT_PROTOCOL_VERSION,
        capabilities: { tools: {} },
        serverInfo: MCP_SERVER_INFO,
      });
    }

    if (method === "ping") {
      return success(id, {});
    }

    if (method === "tools/list") {
      return success(id, { tools: MCP_TOOLS });
    }

    if (method !== "tools/call") {
      return rpcError(id, JSON_RPC_ERRORS.methodNotFound, "Method not found");
    }

    const call = toolCallParamsSchema.safeParse(params);
    if (!call.success) {
      return rpcError(id, JSON_RPC_ERRORS.invalidParams, "Invalid params", call.error.issues);
    }

    const outcome = await runTool(commands, call.data.name, call.data.arguments);
    if (!outcome) {
      return rpcError(id, JSON_RPC_ERRORS.invalidParams, `Unknown tool: ${call.data.name}`);
    }
    if (outcome.kind === "invalid") {
      return rpcError(id, JSON_RPC_ERRORS.invalidParams, "Invalid params", outcome.issues);
    }
    if (outcome.kind === "failed") {
      return rpcError(id, JSON_RPC_ERRORS.commandFailed, outcome.error);
    }
    return success(id, toolResult(outcome.value));
  } catch (error) {
    logger.error({ method, error: errorMessage(error) }, "[stdhuman] MCP request failed.");
    return rpcError(id, JSON_RPC_ERRORS.internal, "Internal error");
  }
}

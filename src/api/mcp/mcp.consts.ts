export const MCP_DEFAULT_PROTOCOL_VERSION = "2024-11-05";
export const MCP_SUPPORTED_PROTOCOL_VERSIONS = ["2024-11-05", "2025-03-26", "2025-06-18"] as const;
export const MCP_PROTOCOL_HEADER = "mcp-protocol-version";
export const MCP_SSE_KEEPALIVE_MS = 15_000;
export const MCP_SSE_KEEPALIVE_FRAME = ": keep-alive\n\n";
export const MCP_SERVER_INFO = { name: "stdhuman-relay", version: "0.1.0" } as const;

export const JSON_RPC_ERRORS = {
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internal: -32603,
  commandFailed: -32000,
} as const;

export const MCP_TOOLS = [
  {
    name: "plan",
    description: "Announce a mission plan to the operator.",
    inputSchema: {
      type: "object",
      properties: {
        project: { type: "string" },
        steps: { type: "array", items: { type: "string" }, minItems: 1 },
      },
      required: ["project", "steps"],
    },
  },
  {
    name: "log",
    description: "Report progress to the operator, optionally completing a step.",
    inputSchema: {
      type: "object",
      properties: {
        level: { type: "string", enum: ["info", "success", "warning", "error"] },
        message: { type: "string" },
        step_index: { type: "integer", minimum: 1 },
      },
      required: ["message"],
    },
  },
  {
    name: "ask",
    description: "Ask the operator a question. Sync mode waits for the answer; async mode returns a request id.",
    inputSchema: {
      type: "object",
      properties: {
        question: { type: "string" },
        options: { type: "array", items: { type: "string" } },
        mode: { type: "string", enum: ["sync", "async"] },
        timeout: { type: "number", exclusiveMinimum: 0 },
      },
      required: ["question"],
    },
  },
  {
    name: "ask_result",
    description: "Poll the answer of an async question.",
    inputSchema: {
      type: "object",
      properties: {
        request_id: { type: "string" },
      },
      required: ["request_id"],
    },
  },
] as const;

import { Hono } from "hono";
import { streamSSE, type SSEStreamingApi } from "hono/streaming";
import type { InboundHandler } from "@bridges/telegram/telegram.types";
import { telegramUpdateSchema } from "@bridges/telegram/telegram.schema";
import { extractInboundFromUpdate, sendReplies } from "@bridges/telegram/telegram.utils";
import type { Responder } from "@core/ports/responder.types";
import { errorMessage } from "@infra/errors/errors";
import { logger } from "@infra/logger/logger";
import { createCommandHandler } from "./api";
import type { CommandHandlers } from "./api.types";
import { JSON_RPC_ERRORS, MCP_PROTOCOL_HEADER, MCP_SSE_KEEPALIVE_FRAME, MCP_SSE_KEEPALIVE_MS } from "./mcp/mcp.consts";
import {
  acceptsEventStream,
  checkMcpHeaders,
  handleMcpRequest,
  isTruthyFlag,
  needsNoReply,
  rpcError,
  wantsEventStream,
} from "./mcp/mcp";
import type { JsonRpcResponse } from "./mcp/mcp.types";
import { jsonRpcEnvelopeSchema, mcpRequestSchema } from "./mcp/mcp.schema";

const KEEP_ALIVE = Symbol("keep-alive");

async function streamWithKeepAlive(
  stream: SSEStreamingApi,
  pending: Promise<JsonRpcResponse>,
  keepAliveMs: number,
): Promise<void> {
  for (;;) {
    const next = await Promise.race([pending, stream.sleep(keepAliveMs).then((): typeof KEEP_ALIVE => KEEP_ALIVE)]);
    if (next !== KEEP_ALIVE) {
      await stream.writeSSE({ data: JSON.stringify(next) });
      return;
    }
    if (stream.aborted) {
      logger.info("[stdhuman] MCP event stream closed before the response was ready.");
      return;
    }
    await stream.write(MCP_SSE_KEEPALIVE_FRAME);
  }
}

export function createHttpApp(deps: {
  commands: CommandHandlers;
  onInbound: InboundHandler;
  responder: Responder;
  mcpKeepAliveMs?: number;
}): Hono {
  const app = new Hono();
  const keepAliveMs = deps.mcpKeepAliveMs ?? MCP_SSE_KEEPALIVE_MS;
  const commandHandler = createCommandHandler(deps.commands);

  app.use("/v1/*", async (c, next) => {
    const response = await commandHandler.handle(c.req.raw);
    if (response) {
      return response;
    }
    await next();
  });

  app.post("/telegram/webhook", async (c) => {
    const body: unknown = await c.req.json().catch(() => undefined);
    const update = telegramUpdateSchema.safeParse(body);
    if (!update.success) {
      return c.json({ ok: false, error: "invalid update" }, 400);
    }

    const extracted = extractInboundFromUpdate(update.data);
    if (extracted.kind === "ignored") {
      return c.json({ ok: true });
    }
    if (extracted.kind === "invalid") {
      return c.json({ ok: false, error: extracted.error });
    }

    const result = await deps.onInbound(extracted.message);
    await sendReplies(deps.responder, extracted.message.chatId, result);
    return result.ok ? c.json({ ok: true }) : c.json({ ok: false, error: result.error });
  });

  app.get("/mcp", (c) => {
    const headers = checkMcpHeaders({
      origin: c.req.header("origin"),
      protocolVersion: c.req.header(MCP_PROTOCOL_HEADER),
    });
    if (!headers.ok) {
      return c.json({ error: headers.error }, headers.status);
    }
    if (!acceptsEventStream(c.req.header("accept"))) {
      return c.body(null, 405);
    }

    const once = isTruthyFlag(c.req.query("once"));
    c.header("X-Accel-Buffering", "no");
    return streamSSE(c, async (stream) => {
      await stream.write(MCP_SSE_KEEPALIVE_FRAME);
      while (!once && !stream.aborted) {
        await stream.sleep(keepAliveMs);
        if (!stream.aborted) {
          await stream.write(MCP_SSE_KEEPALIVE_FRAME);
        }
      }
    });
  });

  app.post("/mcp", async (c) => {
    const headers = checkMcpHeaders({
      origin: c.req.header("origin"),
      protocolVersion: c.req.header(MCP_PROTOCOL_HEADER),
    });
    if (!headers.ok) {
      return c.json({ error: headers.error }, headers.status);
    }

    const body: unknown = await c.req.json().catch(() => undefined);
    const envelope = jsonRpcEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      return c.json({ error: "invalid JSON-RPC payload" }, 400);
    }
    if (needsNoReply(envelope.data)) {
      return c.body(null, 202);
    }

    const request = mcpRequestSchema.safeParse(body);
    if (!request.success) {
      return c.json(rpcError(envelope.data.id ?? null, JSON_RPC_ERRORS.invalidRequest, "Invalid Request"));
    }

    const streaming = wantsEventStream({
      accept: c.req.header("accept"),
      transport: c.req.query("transport"),
      sse: c.req.query("sse"),
    });
    if (!streaming) {
      return c.json(await handleMcpRequest(request.data, deps.commands));
    }

    const pending = handleMcpRequest(request.data, deps.commands);
    c.header("X-Accel-Buffering", "no");
    return streamSSE(c, (stream) => streamWithKeepAlive(stream, pending, keepAliveMs));
  });

  app.notFound((c) => c.json({ error: "not found" }, 404));

  app.onError((error, c) => {
    logger.error({ path: c.req.path, error: errorMessage(error) }, "[stdhuman] Unhandled HTTP error.");
    return c.json({ error: "internal server error" }, 500);
  });

  return app;
}

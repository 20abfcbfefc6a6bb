import { ORPCError, os } from "@orpc/server";
import { OpenAPIHandler } from "@orpc/openapi/fetch";
import { askPayloadSchema, askResultInputSchema, logPayloadSchema, planPayloadSchema } from "./api.schema";
import type { CommandFailureStatus, CommandHandlers, CommandResult } from "./api.types";

const errorCodes = {
  400: "BAD_REQUEST",
  404: "NOT_FOUND",
  408: "TIMEOUT",
  409: "CONFLICT",
  502: "BAD_GATEWAY",
} as const satisfies Record<CommandFailureStatus, string>;

function unwrap<T>(result: CommandResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw new ORPCError(errorCodes[result.status], { status: result.status, message: result.error });
}

export function createCommandRouter(commands: CommandHandlers) {
  return {
    health: os
      .route({ method: "GET", path: "/v1/health" })
      .handler(async () => ({ status: "ok" as const })),
    ask: os
      .route({ method: "POST", path: "/v1/ask" })
      .input(askPayloadSchema)
      .handler(async ({ input }) => unwrap(await commands.ask(input))),
    askResult: os
      .route({ method: "GET", path: "/v1/ask/{requestId}" })
      .input(askResultInputSchema)
      .handler(async ({ input }) => unwrap(commands.askResult(input.requestId))),
    plan: os
      .route({ method: "POST", path: "/v1/plan", successStatus: 202 })
      .input(planPayloadSchema)
      .handler(async ({ input }) => unwrap(await commands.plan(input))),
    log: os
      .route({ method: "POST", path: "/v1/log", successStatus: 202 })
      .input(logPayloadSchema)
      .handler(async ({ input }) => unwrap(await commands.log(input))),
  };
}

export function createCommandHandler(commands: CommandHandlers) {
  const router = createCommandRouter(commands);
  const handler = new OpenAPIHandler(router);

  return {
    router,
    async handle(request: Request): Promise<Response | undefined> {
      const { matched, response } = await handler.handle(request, { context: {} });
      if (!matched) {
        return undefined;
      }
      return response;
    },
  };
}

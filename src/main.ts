import { mkdir } from "node:fs/promises";
import { serve, type ServerType } from "@hono/node-server";
import { createCommandHandlers } from "@api/commands";
import { createHttpApp } from "@api/server";
import { createTelegramBridge } from "@bridges/telegram/telegram.bridge";
import type { TelegramBridge } from "@bridges/telegram/telegram.types";
import { createAnswerSlot } from "@core/decision/answer-slot/answer-slot";
import { createDecisionService } from "@core/decision/decision-service/decision-service";
import { buildInfoText, createInboundHandler } from "@core/inbound/inbound-router";
import { createMissionManager } from "@core/mission/mission-manager";
import type { RuntimeConfig } from "@infra/config/config.types";
import { createRelayDB, type RelayDB } from "@infra/db/db";
import { LockError, errorMessage } from "@infra/errors/errors";
import { tryAcquireLock } from "@infra/lock/lock";
import { logger } from "@infra/logger/logger";
import { createStartCodeProvider } from "@infra/pairing/start-code-provider";
import { createLibsqlOperatorStore } from "@infra/store/libsql-operator-store/libsql-operator-store";
import { createSystemClock } from "@infra/time/system-clock/system-clock";

export type RelayHandle = {
  server: ServerType;
  stop: () => Promise<void>;
};

export async function waitForShutdownSignal(): Promise<"SIGINT" | "SIGTERM"> {
  return await new Promise((resolveSignal) => {
    const onSigInt = () => {
      cleanup();
      resolveSignal("SIGINT");
    };
    const onSigTerm = () => {
      cleanup();
      resolveSignal("SIGTERM");
    };

    const cleanup = () => {
      process.off("SIGINT", onSigInt);
      process.off("SIGTERM", onSigTerm);
    };

    process.once("SIGINT", onSigInt);
    process.once("SIGTERM", onSigTerm);
  });
}

/**
 * Composition root: wires storage, the decision core, the Telegram bridge and
 * the HTTP surface, then starts polling (when configured) and listening.
 */
export async function startRelay(config: RuntimeConfig): Promise<RelayHandle> {
  await mkdir(config.runtimeDir, { recursive: true });

  let releaseLock: (() => Promise<void>) | undefined;
  if (config.telegram.mode === "polling") {
    const lock = await tryAcquireLock(config.lockPath);
    if (!lock.acquired) {
      throw new LockError(config.lockPath, `Telegram polling is already running (${lock.holder}).`);
    }
    releaseLock = lock.release;
  }

  let database: RelayDB | undefined;
  let bridge: TelegramBridge | undefined;
  try {
    const clock = createSystemClock();
    const relayDb = await createRelayDB(config.dbPath);
    database = relayDb;
    const operatorStore = createLibsqlOperatorStore(relayDb, clock);
    const slot = createAnswerSlot();
    const missions = createMissionManager({ clock });
    const telegram = createTelegramBridge(config);
    bridge = telegram;
    const resolveDestination = async () => (await operatorStore.get())?.chatId;

    const decisions = createDecisionService({
      slot,
      responder: telegram,
      resolveDestination,
      defaultTimeoutSeconds: config.decisionTimeoutSeconds,
      deliveryTimeoutMs: config.deliveryTimeoutMs,
      lastStatus: () => missions.current()?.lastStatus,
    });
    const commands = createCommandHandlers({
      decisions,
      missions,
      responder: telegram,
      resolveDestination,
      deliveryTimeoutMs: config.deliveryTimeoutMs,
    });
    const onInbound = createInboundHandler({
      operatorStore,
      slot,
      startCodes: createStartCodeProvider({ runtimeDir: config.runtimeDir, salt: config.startCodeSalt }),
      policy: {
        operatorUsername: config.telegram.operatorUsername,
        startReplyDelayMs: config.telegram.startReplyDelayMs,
        infoText: buildInfoText({ projectName: config.projectName, port: config.port }),
      },
    });

    const app = createHttpApp({ commands, onInbound, responder: telegram });
    await telegram.start(onInbound);

    const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
      logger.info({ host: config.host, port: info.port, mode: config.telegram.mode }, "[stdhuman] Relay listening.");
    });

    return {
      server,
      async stop() {
        logger.info("[stdhuman] Stopping relay.");
        decisions.cancelPending();
        await telegram.stop();
        await new Promise<void>((resolveClose) => {
          server.close((error) => {
            if (error) {
              logger.warn({ error: errorMessage(error) }, "[stdhuman] HTTP server closed with an error.");
            }
            resolveClose();
          });
        });
        relayDb.client.close();
        await releaseLock?.();
      },
    };
  } catch (error) {
    await bridge?.stop();
    database?.client.close();
    await releaseLock?.();
    throw error;
  }
}

#!/usr/bin/env tsx

import { cac } from "cac";
import { readRuntimeConfig, resolveDefaultRuntimeDir } from "@infra/config/config";
import { loadEnvFiles } from "@infra/config/env";
import { createRelayDB } from "@infra/db/db";
import { logger } from "@infra/logger/logger";
import { createStartCodeProvider } from "@infra/pairing/start-code-provider";
import { createLibsqlOperatorStore } from "@infra/store/libsql-operator-store/libsql-operator-store";
import { createSystemClock } from "@infra/time/system-clock/system-clock";
import { startRelay, waitForShutdownSignal } from "../main";

const cli = cac("stdhuman");

async function withCliErrors(task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Error: ${message}`);
    process.exit(1);
  }
}

cli.command("start", "Start the relay server and Telegram bot").action(async () => {
  await withCliErrors(async () => {
    const config = readRuntimeConfig();
    logger.info({ runtimeDir: config.runtimeDir }, "[stdhuman] Loaded runtime config.");
    const relay = await startRelay(config);

    const signal = await waitForShutdownSignal();
    logger.info({ signal }, "[stdhuman] Shutdown signal received.");
    await relay.stop();
  });
});

cli.command("code", "Print the start code used to pair the operator's Telegram chat").action(async () => {
  await withCliErrors(async () => {
    const runtimeDir = resolveDefaultRuntimeDir();
    loadEnvFiles({ runtimeDir });
    const provider = createStartCodeProvider({
      runtimeDir: resolveDefaultRuntimeDir(),
      salt: process.env.START_CODE_SALT?.trim() || undefined,
    });
    const code = await provider.startCode();
    process.stdout.write(`Send this to the bot: /start ${code}\n`);
  });
});

cli.command("unpair", "Forget the paired Telegram chat").action(async () => {
  await withCliErrors(async () => {
    const config = readRuntimeConfig();
    const database = await createRelayDB(config.dbPath);
    try {
      await createLibsqlOperatorStore(database, createSystemClock()).forget();
      logger.info("[stdhuman] Paired operator forgotten.");
    } finally {
      database.client.close();
    }
  });
});

cli.help();
cli.parse();

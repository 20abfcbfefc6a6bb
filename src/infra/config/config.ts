import { homedir } from "node:os";
import { resolve } from "node:path";
import { defu } from "defu";
import { ConfigurationError } from "@infra/errors/errors";
import { runtimeConfigSchema, type RuntimeConfigInput } from "./config.schema";
import type { RuntimeConfig } from "./config.types";
import { fromEnv, loadEnvFiles } from "./env";
import { toFriendlyZodError } from "./validation";

type LooseInput = Record<string, unknown>;

let cachedConfig: RuntimeConfig | undefined;

export function resolveDefaultRuntimeDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.STDHUMAN_RUNTIME_DIR?.trim() || resolve(env.HOME ?? homedir(), ".config", "stdhuman");
}

function defaultsInput(runtimeDir: string): RuntimeConfigInput {
  return {
    projectName: "StdHuman Agent",
    host: "127.0.0.1",
    port: 18081,
    decisionTimeoutSeconds: 3600,
    deliveryTimeoutMs: 5000,
    runtimeDir,
    dbPath: resolve(runtimeDir, "stdhuman.db"),
    lockPath: resolve(runtimeDir, "telegram-bot.lock"),
    telegram: {
      token: "",
      operatorUsername: "",
      mode: "polling",
      dropPendingUpdates: false,
      startReplyDelayMs: 2500,
    },
  };
}

export function buildRuntimeConfig(input: LooseInput, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const runtimeDir = typeof input.runtimeDir === "string" && input.runtimeDir.length > 0
    ? input.runtimeDir
    : resolveDefaultRuntimeDir(env);
  const merged = defu(input, defaultsInput(runtimeDir));
  const parsed = runtimeConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(toFriendlyZodError(parsed.error));
  }
  return parsed.data;
}

export function readRuntimeConfig(): RuntimeConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  loadEnvFiles({ runtimeDir: resolveDefaultRuntimeDir() });
  cachedConfig = buildRuntimeConfig(fromEnv());
  return cachedConfig;
}

export function resetRuntimeConfigCache(): void {
  cachedConfig = undefined;
}

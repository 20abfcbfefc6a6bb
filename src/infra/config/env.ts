import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { parseBoolean, parseNumber, parseSeconds } from "./validation";

type LooseInput = Record<string, unknown>;

export function loadEnvFiles(options?: { override?: boolean; runtimeDir?: string }): void {
  const override = options?.override ?? false;

  const candidates = [
    process.env.STDHUMAN_ENV_PATH,
    resolve(process.cwd(), ".env"),
    options?.runtimeDir ? resolve(options.runtimeDir, ".env") : undefined,
  ].filter((value): value is string => Boolean(value));

  for (const path of candidates) {
    loadDotenv({ path, override });
  }
}

export function fromEnv(env: NodeJS.ProcessEnv = process.env): LooseInput {
  return {
    projectName: env.STDHUMAN_PROJECT_NAME?.trim() || undefined,
    host: env.STDHUMAN_HOST?.trim() || undefined,
    port: parseNumber(env.STDHUMAN_PORT) ?? parseNumber(env.PORT),
    decisionTimeoutSeconds: parseSeconds(env.STDHUMAN_TIMEOUT_SECONDS) ?? parseSeconds(env.TIMEOUT),
    deliveryTimeoutMs: parseNumber(env.STDHUMAN_DELIVERY_TIMEOUT_MS),
    runtimeDir: env.STDHUMAN_RUNTIME_DIR?.trim() || undefined,
    dbPath: env.STDHUMAN_DB_PATH?.trim() || undefined,
    lockPath: env.STDHUMAN_LOCK_PATH?.trim() || undefined,
    startCodeSalt: env.START_CODE_SALT?.trim() || undefined,
    telegram: {
      token: env.TELEGRAM_BOT_TOKEN?.trim() || undefined,
      operatorUsername: env.DEV_TELEGRAM_USERNAME?.trim() || undefined,
      mode: env.TELEGRAM_MODE?.trim().toLowerCase() || undefined,
      dropPendingUpdates: parseBoolean(env.TELEGRAM_DROP_PENDING_UPDATES),
      startReplyDelayMs: parseNumber(env.TELEGRAM_START_REPLY_DELAY_MS),
    },
  };
}

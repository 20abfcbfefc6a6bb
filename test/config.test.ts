import { afterEach, describe, expect, it } from "vitest";
import { buildRuntimeConfig, resetRuntimeConfigCache, resolveDefaultRuntimeDir } from "@infra/config/config";
import { fromEnv } from "@infra/config/env";
import { ConfigurationError } from "@infra/errors/errors";

const runtimeDir = "/tmp/stdhuman-config-test";

describe("config", () => {
  afterEach(() => {
    resetRuntimeConfigCache();
  });

  it("fills defaults around the required telegram values", () => {
    const config = buildRuntimeConfig({
      runtimeDir,
      telegram: { token: "test-token", operatorUsername: "@alice" },
    });

    expect(config).toEqual({
      projectName: "StdHuman Agent",
      host: "127.0.0.1",
      port: 18081,
      decisionTimeoutSeconds: 3600,
      deliveryTimeoutMs: 5000,
      runtimeDir,
      dbPath: "/tmp/stdhuman-config-test/stdhuman.db",
      lockPath: "/tmp/stdhuman-config-test/telegram-bot.lock",
      telegram: {
        token: "test-token",
        operatorUsername: "@alice",
        mode: "polling",
        dropPendingUpdates: false,
        startReplyDelayMs: 2500,
      },
    });
  });

  it("maps environment variables onto the config shape", () => {
    const config = buildRuntimeConfig(fromEnv({
      STDHUMAN_RUNTIME_DIR: runtimeDir,
      PORT: "9000",
      TIMEOUT: "1.5",
      TELEGRAM_BOT_TOKEN: "  test-token  ",
      DEV_TELEGRAM_USERNAME: "@alice",
      TELEGRAM_MODE: "Webhook",
      TELEGRAM_DROP_PENDING_UPDATES: "yes",
      START_CODE_SALT: "test-salt",
    }));

    expect(config.port).toBe(9000);
    expect(config.decisionTimeoutSeconds).toBe(1.5);
    expect(config.startCodeSalt).toBe("test-salt");
    expect(config.telegram).toEqual({
      token: "test-token",
      operatorUsername: "@alice",
      mode: "webhook",
      dropPendingUpdates: true,
      startReplyDelayMs: 2500,
    });
  });

  it("prefers the prefixed port over PORT", () => {
    const config = buildRuntimeConfig(fromEnv({
      STDHUMAN_RUNTIME_DIR: runtimeDir,
      STDHUMAN_PORT: "18090",
      PORT: "9000",
      TELEGRAM_BOT_TOKEN: "test-token",
      DEV_TELEGRAM_USERNAME: "@alice",
    }));

    expect(config.port).toBe(18090);
  });

  it("reports a missing bot token", () => {
    const build = () => buildRuntimeConfig({ runtimeDir, telegram: { operatorUsername: "@alice" } });

    expect(build).toThrow(ConfigurationError);
    expect(build).toThrow("Malformed stdhuman config:\n- telegram.token: TELEGRAM_BOT_TOKEN is required");
  });

  it("requires the operator username to carry an @ prefix", () => {
    const build = () => buildRuntimeConfig({ runtimeDir, telegram: { token: "test-token", operatorUsername: "alice" } });

    expect(build).toThrow("Malformed stdhuman config:\n- telegram.operatorUsername: DEV_TELEGRAM_USERNAME must start with '@'");
  });

  it("resolves the runtime dir from the environment", () => {
    expect(resolveDefaultRuntimeDir({ STDHUMAN_RUNTIME_DIR: " /srv/stdhuman " })).toBe("/srv/stdhuman");
    expect(resolveDefaultRuntimeDir({ HOME: "/home/op" })).toBe("/home/op/.config/stdhuman");
  });
});

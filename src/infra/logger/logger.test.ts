import { describe, expect, it } from "vitest";
import { createLogger } from "./logger";
import { resolveLoggerConfig } from "./logger.utils";

describe("logger config", () => {
  it("uses test log level by default in test env", () => {
    const cfg = resolveLoggerConfig({ NODE_ENV: "test" }, "/tmp/project");
    expect(cfg.level).toBe("silent");
    expect(cfg.targets).toHaveLength(0);
  });

  it("supports explicit level, no pretty, no file logging", () => {
    const cfg = resolveLoggerConfig(
      {
        LOG_LEVEL: "debug",
        STDHUMAN_PRETTY_LOGS: "0",
        STDHUMAN_LOG_TO_FILE: "0",
      },
      "/tmp/project",
    );

    expect(cfg.level).toBe("debug");
    expect(cfg.usePretty).toBe(false);
    expect(cfg.fileLoggingEnabled).toBe(false);
    expect(cfg.targets).toHaveLength(0);
  });

  it("builds pretty and file targets with default path", () => {
    const cfg = resolveLoggerConfig({}, "/tmp/project");

    expect(cfg.level).toBe("info");
    expect(cfg.logFilePath).toBe("/tmp/project/stdhuman.log");
    expect(cfg.targets.map((target) => target.target)).toEqual(["pino-pretty", "pino/file"]);
  });

  it("honours an explicit log file path", () => {
    const cfg = resolveLoggerConfig({ STDHUMAN_PRETTY_LOGS: "0", STDHUMAN_LOG_FILE: " /var/log/relay.log " }, "/tmp/project");

    expect(cfg.logFilePath).toBe("/var/log/relay.log");
    expect(cfg.targets).toEqual([
      { target: "pino/file", options: { destination: "/var/log/relay.log", mkdir: true } },
    ]);
  });

  it("creates a named logger without transports when no targets are configured", () => {
    const logger = createLogger({ level: "warn", targets: [] });

    expect(logger.level).toBe("warn");
    expect(logger.bindings()).toMatchObject({ name: "stdhuman" });
  });
});

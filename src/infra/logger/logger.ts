import pino, { type Logger, type LoggerOptions } from "pino";
import { resolveLoggerConfig, type LoggerResolvedConfig } from "./logger.utils";

export function createLogger(config: Pick<LoggerResolvedConfig, "level" | "targets">): Logger {
  const options: LoggerOptions = { name: "stdhuman", level: config.level };
  if (config.targets.length === 0) {
    return pino(options);
  }
  return pino({ ...options, transport: { targets: config.targets } });
}

export const logger = createLogger(resolveLoggerConfig());

import pino, { type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig } from "./config.js";

/**
 * pino options shared by every server variant.
 * Development: pretty, colorized. Production: JSON lines with credential
 * headers redacted.
 */
export function loggerOptions(
  config: LoggingConfig,
): LoggerOptions {
  if (config.isDev) {
    return {
      level: config.logLevel,
      transport: {
        target: "pino-pretty",
        options: { colorize: true },
      },
    };
  }

  return {
    level: config.logLevel,
    redact: ["req.headers.authorization", "req.headers.cookie"],
  };
}

export function createLogger(
  config: LoggingConfig,
): Logger {
  return pino(loggerOptions(config));
}

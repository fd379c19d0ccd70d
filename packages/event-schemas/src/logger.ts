/**
 * pino logger factory for the event schema catalog.
 *
 * Configuration:
 *   - LOG_LEVEL env var controls the log level (default: "info")
 *   - NODE_ENV=production disables pretty printing (JSON to stdout only)
 *
 * Consumers usually inject their own service logger; the default logger is
 * only created the first time something asks for it.
 */

import { pino, type Logger } from "pino";

/** Whether the process runs in production mode */
const isProduction = process.env.NODE_ENV === "production";

/** Default log level, controllable via LOG_LEVEL env var */
const LOG_LEVEL = process.env.LOG_LEVEL || "info";

/**
 * Create a pino logger: pretty-printed in development, JSON in production.
 *
 * @param name - Logger name (appears in log entries)
 */
export function createLogger(name: string): Logger {
  if (isProduction) {
    return pino({ name, level: LOG_LEVEL });
  }

  return pino({
    name,
    level: LOG_LEVEL,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
      },
    },
  });
}

let defaultLogger: Logger | undefined;

/** Shared "event-schemas" logger, created on first use */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger("event-schemas");
  return defaultLogger;
}

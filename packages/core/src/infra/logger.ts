import { Logger } from "tslog";

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

// Module-level loggers are created at import time, before config is read.
const registry = new Set<Logger<unknown>>();

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_MAP, value);
}

export function createLogger(
  name: string,
  options?: { level?: LogLevel; redact?: boolean },
): Logger<unknown> {
  const level = options?.level ?? "info";
  const shouldRedact = options?.redact !== false;

  const logger = new Logger<unknown>({
    name,
    minLevel: LOG_LEVEL_MAP[level],
    type: "pretty",
    ...(shouldRedact && {
      maskValuesOfKeys: [
        "token",
        "password",
        "secret",
        "apiKey",
        "api_key",
        "authorization",
      ],
      maskPlaceholder: "[REDACTED]",
    }),
  });

  registry.add(logger);
  return logger;
}

/**
 * Apply a level to every logger created so far.
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of registry) {
    logger.settings.minLevel = LOG_LEVEL_MAP[level];
  }
}

import pino from "pino";
import type { DestinationStream, LevelWithSilent, Logger } from "pino";
import { ConfigError } from "./errors.js";

export type { DestinationStream, Logger } from "pino";

export type LogLevel = LevelWithSilent;

export type LoggerOptions = {
  level?: LogLevel;
  destination?: DestinationStream;
  base?: Record<string, unknown>;
};

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

const LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: "warn",
  critical: "fatal",
};

export function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  const alias = LEVEL_ALIASES[normalized];
  if (alias) return alias;
  if (isLogLevel(normalized)) return normalized;
  throw new ConfigError("config_log_level", `Invalid log level "${value}"`, {
    allowed: [...LOG_LEVELS],
  });
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const config = {
    level: options.level ?? "warn",
    base: options.base ?? { service: "cadbot" },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return options.destination
    ? pino(config, options.destination)
    : pino(config, pino.destination(2));
}

/** Every log line written by a runner carries its resolved name. */
export function runnerLogger(root: Logger, name: string): Logger {
  return root.child({ runner: name });
}

let defaultLogger: Logger | null = null;

export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({
      level: process.env["CADBOT_LOG_LEVEL"]
        ? parseLogLevel(process.env["CADBOT_LOG_LEVEL"])
        : "warn",
    });
  }
  return defaultLogger;
}

/**
 * Structured JSON Logging
 *
 * Factory for the pino-based logger.
 * Supports JSON and pretty output via CLAIMFLOW_LOG_FORMAT.
 */

import { pino, type DestinationStream, type Logger, type LoggerOptions as PinoOptions } from "pino";

export const LOG_FORMATS = ["json", "pretty"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  format?: LogFormat;
  level?: LogLevel;
  name?: string;
  /** Write JSON lines here instead of stdout (tests) */
  destination?: DestinationStream;
}

function fromEnv<T extends string>(value: string | undefined, allowed: readonly T[]): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

/**
 * Create a pino logger instance.
 *
 * Reads from env:
 *   CLAIMFLOW_LOG_FORMAT = json | pretty (default: pretty)
 *   CLAIMFLOW_LOG_LEVEL  = info | debug | warn | error (default: info)
 */
export function createLogger(options?: LoggerOptions): Logger {
  const format = options?.format ?? fromEnv(process.env["CLAIMFLOW_LOG_FORMAT"], LOG_FORMATS) ?? "pretty";
  const level = options?.level ?? fromEnv(process.env["CLAIMFLOW_LOG_LEVEL"], LOG_LEVELS) ?? "info";

  const pinoOptions: PinoOptions = {
    level,
    name: options?.name ?? "claimflow",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };

  if (options?.destination) {
    return pino(pinoOptions, options.destination);
  }

  if (format === "pretty") {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(pinoOptions);
}

/** Singleton logger for the application */
let _logger: Logger | undefined;

export function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

/** Replace the global logger (useful for testing) */
export function setLogger(logger: Logger): void {
  _logger = logger;
}

/** Create a child logger with additional bindings */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return getLogger().child(bindings);
}

/**
 * Logger Module
 * Structured logging using pino, written to stderr
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (process.env.NODE_ENV === "test") return "silent";
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "import-resolver", "reconcile-pass")
 *
 * @example
 * ```typescript
 * const logger = createLogger("diff-engine");
 * logger.debug({ added: 2 }, "Computed change set");
 * logger.error({ err }, "Failed to parse config file");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const { level = getLogLevel() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (isDevelopment() && level !== "silent") {
    try {
      return pino({
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
            destination: 2,
          },
        },
      });
    } catch {
      return pino(baseOptions, pino.destination(2));
    }
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;

/**
 * Logger Module
 * Structured logging using pino. Interactive sessions own the terminal, so
 * logs go to a file per component unless pretty console output is requested.
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";
import { getLogsDir } from "./index.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  enableFileLogging?: boolean;
  logDir?: string;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Ensures the log directory exists
 */
function ensureLogDir(logDir: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

function wantsPrettyOutput(): boolean {
  return process.env.LOG_PRETTY === "1" || process.env.LOG_PRETTY === "true";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "reconciliation", "taxonomy", "cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("store");
 * logger.info({ resource: "records" }, "Fetching record");
 * logger.error({ err }, "Request failed");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const { level = getLogLevel(), enableFileLogging = true, logDir } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (level === "silent") {
    return pino(baseOptions);
  }

  if (wantsPrettyOutput()) {
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
  }

  if (enableFileLogging) {
    const dir = logDir ?? getLogsDir();
    ensureLogDir(dir);

    const destination = pino.destination({
      dest: path.join(dir, `${component}.log`),
      sync: false,
    });

    return pino(baseOptions, destination);
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;

import { appendFileSync } from "fs";
import chalk from "chalk";
import type { LogLevel } from "./config/schema.js";

export type { LogLevel };

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  logFile?: string;
  // stdout is reserved for command output and the MCP protocol
  stream?: LogSink;
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const stream = options.stream ?? process.stderr;
  const now = options.now ?? (() => new Date());
  let logFile = options.logFile;

  function log(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }

    const timestamp = now().toISOString();
    const tag = level.toUpperCase();
    stream.write(`[${timestamp}] ${LEVEL_STYLE[level](tag)} ${message}\n`);

    if (logFile) {
      try {
        appendFileSync(logFile, `[${timestamp}] ${tag} ${message}\n`);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        stream.write(`[${timestamp}] ${LEVEL_STYLE.warn("WARN")} Log file disabled: ${reason}\n`);
        logFile = undefined;
      }
    }
  }

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message) => log("error", message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

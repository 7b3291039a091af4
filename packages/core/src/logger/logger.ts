import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error", "silent"];

// Process-wide file sink. Every logger appends here regardless of its console level.
let logFilePath: string | null = null;
let consoleLevelOverride: LogLevel | null = null;

/**
 * Sets the destination file that receives every log line (append-only).
 * Pass null to stop writing to a file.
 */
export function setLogFile(path: string | null): void {
  logFilePath = path;
  if (path) {
    mkdirSync(dirname(path), { recursive: true });
  }
}

/**
 * Overrides the console level of every logger, including ones already created.
 * Pass null to return to each logger's own level.
 */
export function setConsoleLevel(level: LogLevel | null): void {
  consoleLevelOverride = level;
}

export function getLogFile(): string | null {
  return logFilePath;
}

/**
 * Appends raw text (e.g. captured command output) to the log file, if any.
 */
export function appendToLogFile(text: string): void {
  if (!logFilePath || text.length === 0) {
    return;
  }
  appendFileSync(logFilePath, text.endsWith("\n") ? text : `${text}\n`);
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as string[]).includes(value);
}

class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const current = consoleLevelOverride ?? this.level;
    const currentLevelIndex = LEVELS.indexOf(current);
    const messageLevelIndex = LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && current !== "silent";
  }

  private writeToFile(level: LogLevel, message: string): void {
    appendToLogFile(`${new Date().toISOString()} [${level.toUpperCase()}] ${this.prefix}${message}`);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    this.writeToFile("info", message);
    if (this.shouldLog("info")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    this.writeToFile("warn", message);
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    this.writeToFile("error", message);
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }
}

/**
 * Creates a prefixed logger. Silent under NODE_ENV=test unless a level is given;
 * LOG_LEVEL overrides the default "info" otherwise.
 */
export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  const envLevel = process.env["LOG_LEVEL"];
  const logLevel: LogLevel = level ??
    (process.env["NODE_ENV"] === "test" ? "silent" : isLogLevel(envLevel) ? envLevel : "info");

  return new ConsoleLogger(prefix, logLevel);
}

export const logger = createLogger("[forkflow] ");

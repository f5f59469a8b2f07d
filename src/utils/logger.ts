import { appendFileSync, mkdirSync, renameSync, rmSync, statSync } from "node:fs";
import * as path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

let currentLevel: LogLevel = "info";
let quiet = false;

interface FileSink {
  path: string;
  maxBytes: number;
  maxFiles: number;
}

let fileSink: FileSink | null = null;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Silence console output (interactive commands render their own UI).
 * The log file still receives every line.
 */
export function setConsoleQuiet(value: boolean): void {
  quiet = value;
}

/**
 * Append every log line to a plain-text file, rotated by size.
 * Pass null to detach.
 */
export function setLogFile(
  filePath: string | null,
  options: { maxBytes?: number; maxFiles?: number } = {},
): void {
  if (filePath === null) {
    fileSink = null;
    return;
  }

  mkdirSync(path.dirname(filePath), { recursive: true });
  fileSink = {
    path: filePath,
    maxBytes: options.maxBytes ?? 5 * 1024 * 1024,
    maxFiles: options.maxFiles ?? 3,
  };
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatData(data: unknown): string {
  if (data === undefined) return "";
  if (data instanceof Error) return ` ${data.message}`;
  if (typeof data === "object") return ` ${JSON.stringify(data, null, 2)}`;
  return ` ${String(data)}`;
}

function formatMessage(
  level: LogLevel,
  timestamp: string,
  message: string,
  data?: unknown,
): string {
  const color = LEVEL_COLORS[level];
  const levelStr = level.toUpperCase().padEnd(5);

  return `${color}[${timestamp}] ${levelStr}${RESET} ${message}${formatData(data)}`;
}

export function formatFileLine(
  level: LogLevel,
  timestamp: string,
  message: string,
  data?: unknown,
): string {
  return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${message}${formatData(data)}\n`;
}

function rotate(sink: FileSink): void {
  try {
    if (statSync(sink.path).size < sink.maxBytes) return;
  } catch {
    return; // nothing written yet
  }

  rmSync(`${sink.path}.${sink.maxFiles}`, { force: true });
  for (let i = sink.maxFiles - 1; i >= 1; i--) {
    try {
      renameSync(`${sink.path}.${i}`, `${sink.path}.${i + 1}`);
    } catch {
      // gap in the rotation chain
    }
  }
  renameSync(sink.path, `${sink.path}.1`);
}

function writeToFile(level: LogLevel, timestamp: string, message: string, data?: unknown): void {
  if (!fileSink) return;

  try {
    rotate(fileSink);
    appendFileSync(fileSink.path, formatFileLine(level, timestamp, message, data));
  } catch (err) {
    const sinkPath = fileSink.path;
    fileSink = null;
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`Log file ${sinkPath} disabled: ${reason}`);
  }
}

function emit(level: LogLevel, message: string, data?: unknown): void {
  if (!shouldLog(level)) return;

  const timestamp = formatTimestamp();
  writeToFile(level, timestamp, message, data);

  if (quiet) return;

  const line = formatMessage(level, timestamp, message, data);
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function debug(message: string, data?: unknown): void {
  emit("debug", message, data);
}

export function info(message: string, data?: unknown): void {
  emit("info", message, data);
}

export function warn(message: string, data?: unknown): void {
  emit("warn", message, data);
}

export function error(message: string, data?: unknown): void {
  emit("error", message, data);
}

export const logger = {
  debug,
  info,
  warn,
  error,
};

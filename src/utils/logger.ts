import fs from "fs";
import path from "path";
import { randomUUID } from "crypto";

function appendLine(filePath: string, line: string) {
  try {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    fs.appendFileSync(filePath, line + "\n", { encoding: "utf8" });
  } catch {
    // logging must not break a turn
  }
}

function ts() {
  return new Date().toISOString();
}

function logFile(): string {
  return process.env.ANALYSIS_LOG_FILE || path.join("logs", "analysis.txt");
}

function renderArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Append analysis/debug text into a simple txt file.
 * - Path: env ANALYSIS_LOG_FILE (default: logs/analysis.txt)
 * - Adds ISO timestamp prefix per line.
 */
export function appendAnalysisLog(text: string) {
  appendLine(logFile(), `${ts()} ${text}`);
}

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  readonly traceId: string;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(scope: string): Logger;
}

export function createLogger(traceId?: string, scope?: string): Logger {
  const id = traceId && traceId.trim() ? traceId.trim() : randomUUID().slice(0, 8);
  const write = (level: LogLevel, message: string, args: unknown[]) => {
    const extra = args.length ? " " + args.map(renderArg).join(" ") : "";
    const where = scope ? ` ${scope}` : "";
    appendAnalysisLog(`[${level}] trace=${id}${where} ${message}${extra}`);
  };
  return {
    traceId: id,
    info: (message, ...args) => write("info", message, args),
    warn: (message, ...args) => write("warn", message, args),
    error: (message, ...args) => write("error", message, args),
    child: (childScope) => createLogger(id, scope ? `${scope}.${childScope}` : childScope),
  };
}

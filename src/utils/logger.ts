import * as fs from "fs";
import * as path from "path";

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export interface LoggerOptions {
  /** Error-level messages are appended here, the file grows across runs */
  errorLogPath?: string;
  sink?: (line: string, meta?: unknown) => void;
}

const consoleSink = (line: string, meta?: unknown): void => {
  if (meta !== undefined) {
    console.log(line, meta);
  } else {
    console.log(line);
  }
};

/** `2025-01-15 08:09:10 - ERROR - message`, stamped in local time */
export function formatErrorLogLine(message: string, at: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const stamp =
    `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())} ` +
    `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}`;
  return `${stamp} - ERROR - ${message}\n`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;

  const appendErrorLog = (message: string, at: Date): void => {
    if (!options.errorLogPath) return;
    const dir = path.dirname(options.errorLogPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.appendFileSync(options.errorLogPath, formatErrorLogLine(message, at), "utf-8");
  };

  const log = (level: LogLevel, message: string, meta?: unknown): void => {
    const now = new Date();
    sink(`[${now.toISOString()}] [${level.toUpperCase()}] ${message}`, meta);
    if (level === "error") {
      appendErrorLog(message, now);
    }
  };

  return {
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta)
  };
}

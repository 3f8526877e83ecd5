import fs from "fs-extra";
import path from "path";
import { generateId } from "../../process/utils/id.js";
import { getTimestamp } from "../../process/utils/time.js";

/**
 * Unified runtime logger.
 *
 * Design goals:
 * - One logger interface for the dispatcher, transports, middleware and handlers.
 * - Persist logs as JSONL to `<logsDir>/<YYYY-MM-DD>.jsonl` (one line per entry)
 *   once a logs directory is bound; otherwise console + memory only.
 * - Keep console output human-friendly, but make disk logs machine-friendly.
 *
 * Notes:
 * - `log(level, ...)` is async because it may write to disk.
 * - Convenience methods (`info/warn/...`) are sync and fire-and-forget.
 * - A small in-memory ring buffer is kept for debugging and tests.
 */
export type LogLevel = "debug" | "info" | "action" | "warn" | "error";

export interface LogEntry {
  id: string;
  timestamp: string;
  type: LogLevel;
  message: string;
  details?: Record<string, unknown>;
}

export type LoggerOptions = {
  level?: LogLevel;
  /** Print to the console. Default: true. */
  console?: boolean;
  logsDir?: string;
  maxInMemoryEntries?: number;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  action: 20,
  warn: 30,
  error: 40,
};

export class Logger {
  private logs: LogEntry[] = [];
  private logLevel: LogLevel;
  private consoleEnabled: boolean;
  private writeChain: Promise<void> = Promise.resolve();
  private readonly maxInMemoryEntries: number;
  private logsDir: string | null = null;

  constructor(options: LoggerOptions = {}) {
    this.logLevel = options.level ?? "info";
    this.consoleEnabled = options.console ?? true;
    this.maxInMemoryEntries = options.maxInMemoryEntries ?? 2000;
    if (options.logsDir) this.bindLogsDir(options.logsDir);
  }

  /**
   * 绑定日志落盘目录。
   *
   * 关键点（中文）
   * - 未绑定时只打印到 console 并保留内存 ring buffer
   * - 由启动入口（CLI / 应用）在读取配置后决定是否落盘
   */
  bindLogsDir(logsDir: string): void {
    const dir = String(logsDir || "").trim();
    this.logsDir = dir ? path.resolve(dir) : null;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  /**
   * Generic async logger. Accepts `info|warn|error|debug|action`
   * (case-insensitive, unknown values fall back to `info`).
   */
  async log(
    level: string,
    message: string,
    details?: Record<string, unknown>,
  ): Promise<void> {
    await this.emit(normalizeLevel(level), message, details);
  }

  info(message: string, details?: Record<string, unknown>): void {
    void this.emit("info", message, details);
  }

  warn(message: string, details?: Record<string, unknown>): void {
    void this.emit("warn", message, details);
  }

  error(message: string, details?: Record<string, unknown>): void {
    void this.emit("error", message, details);
  }

  debug(message: string, details?: Record<string, unknown>): void {
    void this.emit("debug", message, details);
  }

  action(message: string, details?: Record<string, unknown>): void {
    void this.emit("action", message, details);
  }

  private async emit(
    type: LogLevel,
    message: string,
    details?: Record<string, unknown>,
  ): Promise<void> {
    const entry: LogEntry = {
      id: generateId(12),
      timestamp: getTimestamp(),
      type,
      message,
      details,
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxInMemoryEntries) {
      this.logs.splice(0, this.logs.length - this.maxInMemoryEntries);
    }
    if (this.consoleEnabled && LEVEL_RANK[type] >= LEVEL_RANK[this.logLevel]) {
      this.printLog(entry);
    }

    const logsDir = this.logsDir;
    if (!logsDir) return;
    // 写盘串行化：保证同一文件内的行顺序与调用顺序一致
    this.writeChain = this.writeChain.then(() =>
      this.saveToFile(logsDir, entry).catch((error: unknown) => {
        console.error(`[logger] failed to persist log entry: ${String(error)}`);
      }),
    );
    await this.writeChain;
  }

  private printLog(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toLocaleTimeString();
    const level = entry.type.toUpperCase().padEnd(7);
    const suffix =
      entry.details && Object.keys(entry.details).length > 0
        ? ` ${JSON.stringify(entry.details)}`
        : "";
    const message = `[${timestamp}] [${level}] ${entry.message}${suffix}`;

    switch (entry.type) {
      case "error":
        console.error(`\x1b[31m${message}\x1b[0m`);
        break;
      case "warn":
        console.warn(`\x1b[33m${message}\x1b[0m`);
        break;
      case "debug":
        console.log(`\x1b[90m${message}\x1b[0m`);
        break;
      case "action":
        console.log(`\x1b[36m${message}\x1b[0m`);
        break;
      default:
        console.log(message);
    }
  }

  private async saveToFile(logsDir: string, entry: LogEntry): Promise<void> {
    const date = entry.timestamp.split("T")[0];
    const logFile = path.join(logsDir, `${date}.jsonl`);
    await fs.ensureDir(logsDir);
    await fs.appendFile(logFile, JSON.stringify(entry) + "\n");
  }

  /** Waits for pending disk writes. */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  getLogs(): LogEntry[] {
    return this.logs;
  }

  getLogsByType(type: LogLevel): LogEntry[] {
    return this.logs.filter((log) => log.type === type);
  }

  getRecentLogs(count: number = 10): LogEntry[] {
    return this.logs.slice(-count);
  }

  clearLogs(): void {
    this.logs = [];
  }
}

export function normalizeLevel(level: string): LogLevel {
  const s = String(level || "")
    .trim()
    .toLowerCase();
  if (s === "warn" || s === "warning") return "warn";
  if (s === "error" || s === "err") return "error";
  if (s === "debug" || s === "trace") return "debug";
  if (s === "action") return "action";
  return "info";
}

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

export const logger = new Logger();

import { join } from "node:path";
import { nanoid } from "nanoid";
import pino, { type Logger } from "pino";
import { safeTrySync } from "../utils/safe-try-sync.js";

export type LogLevel = "info" | "warn" | "error";

export type LogMode = "prod" | "dev" | "silent";

export type LogChunking = "monthly" | "daily" | "weekly" | "none";

export interface Log {
  atFunction: string;
  appName: string;
  message: string;
  data?: unknown;
  level?: LogLevel;
  log_id?: string;
}

export interface LoggerConfig {
  /** Directory holding log files */
  logDir: string;
  /** prod writes files, dev prints to the console, silent drops records */
  mode: LogMode;
  /** Time-based chunking strategy. Default: 'none' (single file per app) */
  chunking?: LogChunking;
}

/**
 * Resolves the correct log file path based on app name and chunking config.
 * - 'none' (default): {logDir}/{appName}.log
 * - 'monthly': {logDir}/{appName}/YYYY-MM.log
 * - 'daily': {logDir}/{appName}/YYYY-MM-DD.log
 * - 'weekly': {logDir}/{appName}/YYYY-WNN.log (ISO week number)
 */
export function resolveLogPath(
  appName: string,
  config: LoggerConfig,
  now: Date = new Date()
): string {
  const chunking = config.chunking ?? "none";

  if (chunking === "none") {
    return join(config.logDir, `${appName}.log`);
  }

  return join(
    config.logDir,
    appName,
    `${formatChunkName(now, chunking)}.log`
  );
}

/**
 * Formats a date into the chunk filename for the given strategy.
 */
export function formatChunkName(
  date: Date,
  chunking: Exclude<LogChunking, "none">
): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");

  if (chunking === "monthly") {
    return `${year}-${month}`;
  }

  if (chunking === "daily") {
    const day = String(date.getDate()).padStart(2, "0");
    return `${year}-${month}-${day}`;
  }

  const { weekYear, week } = getISOWeek(date);
  return `${weekYear}-W${String(week).padStart(2, "0")}`;
}

/** ISO 8601 week number and the year that week belongs to */
function getISOWeek(date: Date): { weekYear: number; week: number } {
  const target = new Date(date.valueOf());
  // Nearest Thursday decides the week's year
  const dayNum = target.getDay() || 7;
  target.setDate(target.getDate() + 4 - dayNum);
  const yearStart = new Date(target.getFullYear(), 0, 1);
  const week = Math.ceil(
    ((target.getTime() - yearStart.getTime()) / 86_400_000 + 1) / 7
  );
  return { weekYear: target.getFullYear(), week };
}

const fileLoggers = new Map<string, Logger>();
const unwritableLogFiles = new Set<string>();

/**
 * Returns the pino logger writing to the given file, creating it on first use.
 * Writes are synchronous: every record is on disk when the call returns.
 */
function getFileLogger(logFile: string): Logger {
  const cached = fileLoggers.get(logFile);
  if (cached) {
    return cached;
  }

  const logger = pino(
    {
      base: null,
      timestamp: () => `,"time":"${new Date().toISOString()}"`,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    pino.destination({ dest: logFile, sync: true, mkdir: true })
  );

  fileLoggers.set(logFile, logger);
  return logger;
}

/** Reported once per file; the command carries on without the record */
function reportUnwritable(logFile: string, error: unknown) {
  if (unwritableLogFiles.has(logFile)) {
    return;
  }
  unwritableLogFiles.add(logFile);
  console.error(`Could not write log file ${logFile}: ${String(error)}`);
}

/**
 * Creates a new log entry.
 * @returns The log ID of the record, also when the record was dropped
 * @throws {Error} If appName is missing in the log object
 */
export const createLog = (log: Log, config: LoggerConfig): string => {
  if (!log.appName) {
    throw new Error(`Missing appName in log: ${JSON.stringify(log)}`);
  }

  const level = log.level ?? "info";
  const log_id = log.log_id ?? nanoid(6);

  const logRecord = {
    log_id,
    appName: log.appName,
    atFunction: log.atFunction,
    message: log.message,
    data: log.data ?? null,
  };

  if (config.mode === "silent") {
    return log_id;
  }

  if (config.mode === "prod") {
    const logFile = resolveLogPath(log.appName, config);
    const written = safeTrySync(() => getFileLogger(logFile)[level](logRecord));
    if (written.isErr) {
      reportUnwritable(logFile, written.error);
    }
    return log_id;
  }

  console.log({
    ...logRecord,
    level,
    time: new Date().toISOString(),
    data: JSON.stringify(logRecord.data, null, 2),
  });
  return log_id;
};

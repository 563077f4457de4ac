import { createLog, type Log, type LoggerConfig } from "./logger.js";

type LogInput = Omit<Log, "appName" | "level">;

export interface TrackerLogger {
  info: (input: LogInput) => string;
  warn: (input: LogInput) => string;
  error: (input: LogInput) => string;
}

/**
 * Creates a logger instance bound to a specific app name.
 * @param appName - The application name (determines log file/directory)
 * @param config - Destination, mode and chunking of the records
 */
export const createLogger = (
  appName: string,
  config: LoggerConfig
): TrackerLogger => {
  return {
    info: (input) => createLog({ ...input, appName, level: "info" }, config),
    warn: (input) => createLog({ ...input, appName, level: "warn" }, config),
    error: (input) => createLog({ ...input, appName, level: "error" }, config),
  };
};

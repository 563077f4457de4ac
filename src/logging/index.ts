// biome-ignore lint/performance/noBarrelFile: Public API entry point for logging module
export { createLogger, type TrackerLogger } from "./create-log.js";
export {
  createLog,
  formatChunkName,
  type Log,
  type LogChunking,
  type LoggerConfig,
  type LogLevel,
  type LogMode,
  resolveLogPath,
} from "./logger.js";

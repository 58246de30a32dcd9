export { Logger, createLogger, loggers } from "./logger.js";
export type { LogLevel, LogContext } from "./logger.js";

export {
  formatDate,
  formatTimestamp,
  formatTime,
  formatDateTime,
  toWallClockUtc,
  fromWallClockUtc,
} from "./date-helpers.js";

/**
 * Centralized Logging
 *
 * ```typescript
 * import { Logger, ConsoleTransport, FileTransport } from "@nudge/shared/logging";
 *
 * const logger = new Logger({
 *   minLevel: "debug",
 *   component: "server",
 *   transports: [
 *     new ConsoleTransport({ colors: true }),
 *     new FileTransport({ logDir: "~/.nudge/logs" })
 *   ]
 * });
 *
 * logger.info("Dispatcher started", { shortHorizonMs: 60000 });
 *
 * const guildLog = logger.child({ component: "server.actions", guildId: "81384788765712384" });
 * guildLog.warn("Reminder content empty");
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export {
  Logger
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  formatPlainText,
  type ConsoleTransportOptions,
  type FileTransportOptions
} from "./transports/index.js";

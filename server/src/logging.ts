/**
 * Logging Setup for the Server
 *
 * Initializes the shared logging system with console and file transports and
 * hands out component loggers.
 */

import * as path from "path";
import * as os from "os";
import {
  Logger,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type LogContext,
  type LogLevel,
  type LogTransport
} from "@nudge/shared/logging";

// ============================================
// CONFIGURATION
// ============================================

export interface LoggingOptions {
  /** Minimum level to log (default: "debug" in dev, "info" in prod) */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Enable file output (default: true) */
  file?: boolean;
  /** Directory for the file transport (default: ~/.nudge/logs) */
  logDir?: string;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
}

// ============================================
// INITIALIZATION
// ============================================

let logger: Logger | null = null;

/**
 * Initialize the logging system for the server. Calling it again replaces the
 * root logger; component loggers pick up the new one on their next write.
 */
export function initServerLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const minLevel = options.minLevel ?? (isDev ? "debug" : "info");

  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: options.colors,
      prettyPrint: isDev
    }));
  }

  if (options.file !== false) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir ?? path.join(os.homedir(), ".nudge", "logs"),
      filename: "server",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 10
    }));
  }

  logger = new Logger({
    minLevel,
    component: "server",
    transports
  });

  return logger;
}

/**
 * Get the server logger instance. Auto-initializes with defaults if accessed
 * before `initServerLogging()`.
 */
export function getServerLogger(): Logger {
  return logger ?? initServerLogging();
}

// ============================================
// COMPONENT LOGGERS
// ============================================

/**
 * Resolves its parent lazily, so a module-level component logger created at
 * import time still writes through whatever `initServerLogging()` set up later.
 */
class ComponentLogger implements ILogger {
  private root: Logger | null = null;
  private delegate: ILogger | null = null;

  constructor(private readonly context: LogContext & { component: string }) {}

  private current(): ILogger {
    const root = getServerLogger();
    if (root !== this.root || !this.delegate) {
      this.root = root;
      this.delegate = root.child(this.context);
    }
    return this.delegate;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.current().trace(message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.current().debug(message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.current().info(message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.current().warn(message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.current().error(message, error, data);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.current().fatal(message, error, data);
  }

  child(context: LogContext & { component?: string }): ILogger {
    return new ComponentLogger({ ...this.context, ...context, component: context.component ?? this.context.component });
  }

  flush(): Promise<void> {
    return this.current().flush();
  }
}

/**
 * Create a namespaced logger for a specific component.
 */
export function createComponentLogger(component: string): ILogger {
  return new ComponentLogger({ component: `server.${component}` });
}

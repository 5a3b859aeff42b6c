/**
 * Logging Types
 *
 * Structured log entries, transports, and the logger contract shared by
 * every package in the workspace.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

// ============================================
// CONTEXT
// ============================================

/**
 * Fields carried by a logger and stamped onto every entry it writes.
 * `guildId` and `channelId` identify the chat context an entry relates to.
 */
export interface LogContext {
  correlationId?: string;
  guildId?: string;
  channelId?: string;
}

// ============================================
// LOG ENTRY
// ============================================

export interface LogEntry extends LogContext {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Dotted component path, e.g. "server.actions.dispatcher" */
  component: string;
  message: string;
  /** Structured payload, already redacted */
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  name: string;
  /** Minimum level this transport handles */
  minLevel: LogLevel;
  log(entry: LogEntry): void;
  /** Flush any buffered output (graceful shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LoggerConfig {
  /** Entries below this level are dropped before reaching any transport */
  minLevel: LogLevel;
  component: string;
  defaultContext?: LogContext;
  transports: LogTransport[];
  /** Data keys matching any of these are replaced with "[REDACTED]" */
  redactPatterns?: RegExp[];
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Derive a logger with a different component and/or extra context */
  child(context: LogContext & { component?: string }): ILogger;

  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /apiKey/i,
  /api_key/i,
  /password/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /credential/i,
];

/**
 * Console Transport
 *
 * One line per entry with level color coding. Warnings and errors go to
 * stderr, everything else to stdout.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

// ============================================
// STYLES
// ============================================

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const MAGENTA = "\x1b[35m";

const LEVEL_STYLES: Record<LogLevel, { label: string; color: string }> = {
  trace: { label: "TRC", color: "\x1b[90m" },
  debug: { label: "DBG", color: "\x1b[36m" },
  info: { label: "INF", color: "\x1b[34m" },
  warn: { label: "WRN", color: "\x1b[33m" },
  error: { label: "ERR", color: RED },
  fatal: { label: "FTL", color: "\x1b[41m\x1b[37m" },
  silent: { label: "   ", color: RESET },
};

// ============================================
// CONSOLE TRANSPORT
// ============================================

export interface ConsoleOutput {
  write(chunk: string): unknown;
}

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Use colors (default: true when stdout is a TTY) */
  colors?: boolean;
  /** Show HH:MM:SS timestamps (default: true) */
  timestamps?: boolean;
  /** Multi-line JSON for data objects (default: true) */
  prettyPrint?: boolean;
  /** Defaults to process.stdout / process.stderr */
  stdout?: ConsoleOutput;
  stderr?: ConsoleOutput;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private readonly colors: boolean;
  private readonly timestamps: boolean;
  private readonly prettyPrint: boolean;
  private readonly stdout: ConsoleOutput;
  private readonly stderr: ConsoleOutput;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "debug";
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.timestamps = options.timestamps ?? true;
    this.prettyPrint = options.prettyPrint ?? true;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  format(entry: LogEntry): string {
    const style = LEVEL_STYLES[entry.level];
    const head: string[] = [];

    if (this.timestamps) {
      head.push(this.paint(entry.timestamp.slice(11, 19), DIM));
    }
    head.push(this.paint(style.label, style.color));
    head.push(this.paint(`[${entry.component}]`, MAGENTA));

    // Discord location, when the entry is tied to one
    if (entry.guildId || entry.channelId) {
      const where = [entry.guildId, entry.channelId].filter(Boolean).join("/");
      head.push(this.paint(`<${where}>`, DIM));
    }
    if (entry.correlationId) {
      head.push(this.paint(`(${entry.correlationId.slice(0, 8)})`, DIM));
    }
    head.push(entry.message);

    const lines = [head.join(" ")];

    if (entry.data && Object.keys(entry.data).length > 0) {
      if (this.prettyPrint) {
        lines.push(this.paint(JSON.stringify(entry.data, null, 2), DIM));
      } else {
        lines[0] += " " + this.paint(JSON.stringify(entry.data), DIM);
      }
    }

    if (entry.error) {
      lines.push(this.paint(`${entry.error.name}: ${entry.error.message}`, RED));
      if (entry.error.stack) lines.push(this.paint(entry.error.stack, DIM));
    }

    return lines.join("\n");
  }

  log(entry: LogEntry): void {
    if (entry.level === "silent") return;

    const stream = entry.level === "warn" || entry.level === "error" || entry.level === "fatal"
      ? this.stderr
      : this.stdout;
    stream.write(this.format(entry) + "\n");
  }

  private paint(text: string, color: string): string {
    return this.colors ? `${color}${text}${RESET}` : text;
  }
}

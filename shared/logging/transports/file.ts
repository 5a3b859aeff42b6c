/**
 * File Transport
 *
 * Appends entries to a daily log file (`<filename>-YYYY-MM-DD.log`) and
 * rotates it by size, keeping `maxFiles` numbered generations.
 */

import * as fs from "fs";
import * as path from "path";
import { LogTransport, LogEntry, LogLevel } from "../types.js";

// ============================================
// FILE TRANSPORT
// ============================================

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "nudge") */
  filename?: string;
  /** Max file size in bytes before rotation (default: 10MB) */
  maxSize?: number;
  /** Max number of rotated files to keep (default: 5) */
  maxFiles?: number;
  /** Write as JSON lines (default: true) */
  jsonFormat?: boolean;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private logDir: string;
  private filename: string;
  private maxSize: number;
  private maxFiles: number;
  private jsonFormat: boolean;
  private currentPath: string;
  private writeStream: fs.WriteStream | null = null;
  private currentSize = 0;
  private writeQueue: string[] = [];
  private isWriting = false;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.logDir = options.logDir;
    this.filename = options.filename ?? "nudge";
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    this.jsonFormat = options.jsonFormat ?? true;
    this.currentPath = this.getLogPath();

    fs.mkdirSync(this.logDir, { recursive: true });
    this.openStream();
  }

  private getLogPath(): string {
    const date = new Date().toISOString().slice(0, 10);
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private openStream(): void {
    this.currentPath = this.getLogPath();

    try {
      this.currentSize = fs.statSync(this.currentPath).size;
    } catch {
      this.currentSize = 0; // new file
    }

    this.writeStream = fs.createWriteStream(this.currentPath, { flags: "a" });
    this.writeStream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
  }

  log(entry: LogEntry): void {
    const line = this.jsonFormat
      ? JSON.stringify(entry) + "\n"
      : formatPlainText(entry) + "\n";

    this.writeQueue.push(line);
    this.processQueue();
  }

  private processQueue(): void {
    if (this.isWriting || !this.writeStream) return;
    const line = this.writeQueue.shift();
    if (line === undefined) return;

    this.isWriting = true;

    if (this.currentSize + line.length > this.maxSize) {
      this.rotate();
    } else if (this.getLogPath() !== this.currentPath) {
      // Day rolled over
      this.writeStream.end();
      this.openStream();
    }

    const stream = this.writeStream;
    stream.write(line, (err: Error | null | undefined) => {
      if (!err) {
        this.currentSize += line.length;
      }
      this.isWriting = false;
      this.processQueue();
    });
  }

  private rotate(): void {
    this.writeStream?.end();

    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${this.currentPath}.${i}`;
      if (!fs.existsSync(oldPath)) continue;
      if (i === this.maxFiles - 1) {
        fs.unlinkSync(oldPath);
      } else {
        fs.renameSync(oldPath, `${this.currentPath}.${i + 1}`);
      }
    }

    if (fs.existsSync(this.currentPath)) {
      fs.renameSync(this.currentPath, `${this.currentPath}.1`);
    }

    this.openStream();
  }

  async flush(): Promise<void> {
    await new Promise<void>((resolve) => {
      const waitForQueue = (): void => {
        if (this.writeQueue.length > 0 || this.isWriting) {
          setTimeout(waitForQueue, 10);
          return;
        }
        const stream = this.writeStream;
        if (!stream || stream.writableLength === 0) {
          resolve();
          return;
        }
        stream.once("drain", () => resolve());
      };
      waitForQueue();
    });
  }

  async close(): Promise<void> {
    await this.flush();
    const stream = this.writeStream;
    this.writeStream = null;
    if (!stream) return;
    await new Promise<void>((resolve) => stream.end(() => resolve()));
  }
}

export function formatPlainText(entry: LogEntry): string {
  const parts = [
    entry.timestamp,
    entry.level.toUpperCase().padEnd(5),
    `[${entry.component}]`,
    entry.message
  ];

  if (entry.guildId) parts.push(`guild=${entry.guildId}`);
  if (entry.channelId) parts.push(`channel=${entry.channelId}`);
  if (entry.correlationId) parts.push(`cid=${entry.correlationId}`);

  if (entry.data) {
    parts.push(JSON.stringify(entry.data));
  }

  if (entry.error) {
    parts.push(`ERROR: ${entry.error.name}: ${entry.error.message}`);
    if (entry.error.stack) {
      parts.push(entry.error.stack);
    }
  }

  return parts.join(" ");
}

/**
 * File Transport
 *
 * JSON lines, one file per day (`<name>-YYYY-MM-DD.log`). A file that grows
 * past maxSize is shifted to `.1`, `.1` to `.2` and so on; the oldest beyond
 * maxFiles is deleted.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { LogEntry, LogLevel, LogTransport } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  /** A leading ~ expands to the home directory */
  logDir: string;
  /** File name prefix (default "framewise") */
  filename?: string;
  /** Bytes before rotation (default 10MB) */
  maxSize?: number;
  /** Rotated files kept per day (default 5) */
  maxFiles?: number;
  /** Clock for file naming; tests pin the date */
  now?: () => Date;
}

export class FileTransport implements LogTransport {
  readonly name = "file";
  minLevel: LogLevel;
  private readonly dir: string;
  private readonly prefix: string;
  private readonly maxSize: number;
  private readonly maxFiles: number;
  private readonly now: () => Date;
  private stream: fs.WriteStream | null = null;
  /** Streams replaced by a rotation or a new day, still draining */
  private retiring: Promise<void>[] = [];
  private currentPath = "";
  private size = 0;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.dir = options.logDir.startsWith("~") ? path.join(os.homedir(), options.logDir.slice(1)) : options.logDir;
    this.prefix = options.filename ?? "framewise";
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    this.now = options.now ?? (() => new Date());
    fs.mkdirSync(this.dir, { recursive: true });
  }

  /** Path for the current day's file */
  get path(): string {
    return path.join(this.dir, `${this.prefix}-${this.now().toISOString().slice(0, 10)}.log`);
  }

  log(entry: LogEntry): void {
    const line = `${JSON.stringify(entry)}\n`;
    const bytes = Buffer.byteLength(line);
    const target = this.path;

    if (target !== this.currentPath) {
      this.open(target);
    } else if (this.size > 0 && this.size + bytes > this.maxSize) {
      this.rotate();
    }
    this.stream?.write(line);
    this.size += bytes;
  }

  // Opened synchronously so a rotation right after sees the file on disk
  private open(target: string): void {
    this.retire();
    const fd = fs.openSync(target, "a");
    this.currentPath = target;
    this.size = fs.fstatSync(fd).size;
    const stream = fs.createWriteStream(target, { fd });
    stream.on("error", (err) => console.error("[file transport] write failed:", err));
    this.stream = stream;
  }

  private retire(): void {
    const old = this.stream;
    this.stream = null;
    if (old) this.retiring.push(new Promise((resolve) => old.end(() => resolve())));
  }

  private rotate(): void {
    this.retire();
    const base = this.currentPath;
    const oldest = `${base}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) fs.unlinkSync(oldest);
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      if (fs.existsSync(`${base}.${i}`)) fs.renameSync(`${base}.${i}`, `${base}.${i + 1}`);
    }
    if (fs.existsSync(base)) fs.renameSync(base, `${base}.1`);
    this.currentPath = "";
    this.open(base);
  }

  /** Resolves once everything written so far has reached the OS */
  async flush(): Promise<void> {
    await Promise.all(this.retiring.splice(0));
    const stream = this.stream;
    if (stream?.writableNeedDrain) await new Promise<void>((resolve) => stream.once("drain", () => resolve()));
  }

  async close(): Promise<void> {
    this.retire();
    this.currentPath = "";
    await this.flush();
  }
}

/**
 * Memory Transport
 *
 * Collects entries in an array. Used by tests that assert on what was logged.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  constructor(public minLevel: LogLevel = "trace") {}

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}

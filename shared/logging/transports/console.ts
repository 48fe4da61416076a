/**
 * Console Transport
 *
 *   14:02:11 INF [server.routing.router] (k3Jd9x#4) Routed {"nextAction":"probe"}
 */

import type { LogEntry, LogLevel, LogTransport } from "../types.js";

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";

const LEVELS: Record<LogLevel, { label: string; color: string }> = {
  trace: { label: "TRC", color: "\x1b[90m" },
  debug: { label: "DBG", color: "\x1b[36m" },
  info: { label: "INF", color: "\x1b[34m" },
  warn: { label: "WRN", color: "\x1b[33m" },
  error: { label: "ERR", color: "\x1b[31m" },
  fatal: { label: "FTL", color: "\x1b[41m\x1b[37m" },
  silent: { label: "   ", color: RESET },
};

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Default: stdout is a TTY */
  colors?: boolean;
  /** Multi-line data payloads (default false) */
  prettyPrint?: boolean;
}

export class ConsoleTransport implements LogTransport {
  readonly name = "console";
  minLevel: LogLevel;
  private readonly colors: boolean;
  private readonly prettyPrint: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "debug";
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  /** The line as printed, without colors when disabled */
  format(entry: LogEntry): string {
    const { label, color } = LEVELS[entry.level];
    let line = [
      this.paint(entry.timestamp.slice(11, 19), DIM),
      this.paint(label, color),
      `[${entry.component}]`,
      ...(entry.conversationId ? [this.paint(`(${entry.conversationId}${entry.turn !== undefined ? `#${entry.turn}` : ""})`, DIM)] : []),
      entry.message,
    ].join(" ");

    if (entry.data && Object.keys(entry.data).length > 0) {
      const body = this.prettyPrint ? `\n${JSON.stringify(entry.data, null, 2)}` : ` ${JSON.stringify(entry.data)}`;
      line += this.paint(body, DIM);
    }
    if (entry.error) {
      line += `\n${this.paint(`${entry.error.name}: ${entry.error.message}`, LEVELS.error.color)}`;
      if (entry.error.stack) line += `\n${this.paint(entry.error.stack, DIM)}`;
    }
    return line;
  }

  log(entry: LogEntry): void {
    const line = this.format(entry);
    if (entry.level === "warn") console.warn(line);
    else if (entry.level === "error" || entry.level === "fatal") console.error(line);
    else if (entry.level !== "silent") console.log(line);
  }

  private paint(text: string, color: string): string {
    return this.colors ? `${color}${text}${RESET}` : text;
  }
}

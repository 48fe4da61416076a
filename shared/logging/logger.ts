/**
 * Logger
 *
 * Fans entries out to transports. Children share their parent's transports
 * and ring buffer, adding a component name or turn context.
 */

import {
  DEFAULT_REDACT_PATTERNS,
  passes,
  type ILogger,
  type LogContext,
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
} from "./types.js";

class RingBuffer<T> {
  private readonly items: T[] = [];

  constructor(private readonly capacity: number) {}

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) this.items.shift();
  }

  last(n: number): T[] {
    return this.items.slice(-n);
  }
}

function describeError(error: unknown): LogEntry["error"] {
  if (error instanceof Error) return { name: error.name, message: error.message, stack: error.stack };
  return { name: "Unknown", message: String(error) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class Logger implements ILogger {
  private readonly redactPatterns: RegExp[];
  private readonly buffer: RingBuffer<LogEntry>;

  constructor(
    private readonly config: LoggerConfig,
    buffer?: RingBuffer<LogEntry>,
  ) {
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.buffer = buffer ?? new RingBuffer<LogEntry>(config.ringBufferSize ?? 1000);
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>, error?: unknown): void {
    if (!passes(level, this.config.minLevel)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      ...this.config.context,
    };
    if (data) entry.data = this.redact(data);
    if (error !== undefined) entry.error = describeError(error);

    this.buffer.push(entry);
    for (const transport of this.config.transports) {
      if (!passes(level, transport.minLevel)) continue;
      try {
        transport.log(entry);
      } catch (e) {
        // Last resort: a broken transport must not take the turn down
        console.error(`[logger] transport ${transport.name} failed:`, e);
      }
    }
  }

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some((p) => p.test(key))) out[key] = "[REDACTED]";
      else out[key] = isRecord(value) ? this.redact(value) : value;
    }
    return out;
  }

  child(context: LogContext & { component?: string }): Logger {
    const { component, ...rest } = context;
    return new Logger(
      {
        ...this.config,
        component: component ?? this.config.component,
        context: { ...this.config.context, ...rest },
      },
      this.buffer,
    );
  }

  /** Most recent entries across this logger and all of its children */
  getRecentLogs(count = 100): LogEntry[] {
    return this.buffer.last(count);
  }

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map((t) => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map((t) => t.close?.()));
  }
}

// ============================================
// PROCESS LOGGER
// ============================================

let rootLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  rootLogger = new Logger(config);
  return rootLogger;
}

export function getLogger(): Logger {
  if (!rootLogger) throw new Error("Logger not initialized. Call initLogger() first.");
  return rootLogger;
}

/**
 * Logging Types
 *
 * Entries are structured records. Anything logged while a turn is running
 * carries the conversation id and turn number, so one turn can be read back
 * across router, assembler and executor output.
 */

// ============================================
// LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/** True when `level` passes a `threshold` */
export function passes(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[threshold];
}

// ============================================
// ENTRIES
// ============================================

export interface LogContext {
  conversationId?: string;
  turn?: number;
}

export interface LogEntry extends LogContext {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Dotted source name, e.g. "server.routing.router" */
  component: string;
  message: string;
  data?: Record<string, unknown>;
  error?: { name: string; message: string; stack?: string };
}

export interface LogTransport {
  readonly name: string;
  minLevel: LogLevel;
  log(entry: LogEntry): void;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER
// ============================================

export interface LoggerConfig {
  minLevel: LogLevel;
  component: string;
  context?: LogContext;
  transports: LogTransport[];
  /** Keys matching any of these have their values replaced */
  redactPatterns?: RegExp[];
  /** Entries kept in memory for getRecentLogs (default 1000) */
  ringBufferSize?: number;
}

export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  /** Same transports, narrower context */
  child(context: LogContext & { component?: string }): ILogger;
}

// API keys reach the log through client options; never write them out.
export const DEFAULT_REDACT_PATTERNS = [/api_?key/i, /secret/i, /password/i, /^token$/i, /authorization/i];

/**
 * Structured logging shared by the engine and its HTTP surface.
 *
 * ```typescript
 * initLogger({
 *   minLevel: "debug",
 *   component: "server",
 *   transports: [new ConsoleTransport(), new FileTransport({ logDir: "~/.framewise/logs" })],
 * });
 *
 * const turnLog = getLogger().child({ component: "server.routing", conversationId: "k3Jd9x", turn: 4 });
 * turnLog.info("Routed", { nextAction: "probe" });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  passes,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

export { Logger, initLogger, getLogger } from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions,
} from "./transports/index.js";

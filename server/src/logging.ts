/**
 * Server Logging
 *
 * Every module logs through createComponentLogger("area.name"), which
 * resolves the process logger on first use so loggers can be created at
 * import time, before main has called initServerLogging().
 */

import * as path from "node:path";
import * as os from "node:os";
import {
  initLogger,
  isLogLevel,
  ConsoleTransport,
  FileTransport,
  type Logger,
  type ILogger,
  type LogLevel,
  type LogTransport,
} from "@framewise/shared/logging";

export interface LoggingOptions {
  /** Default: LOG_LEVEL, else "info" in production and "debug" otherwise */
  minLevel?: LogLevel;
  console?: boolean;
  /** Default: on, except under NODE_ENV=test */
  file?: boolean;
  /** Default: LOG_DIR, else ~/.framewise/logs */
  logDir?: string;
  colors?: boolean;
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

let logger: Logger | null = null;

export function initServerLogging(options: LoggingOptions = {}): Logger {
  const env = process.env.NODE_ENV;
  const minLevel = options.minLevel ?? defaultLevel();
  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({ minLevel, colors: options.colors, prettyPrint: env === "development" }));
  }
  if (options.file ?? env !== "test") {
    // The file keeps debug detail even when the console is quieter
    transports.push(
      new FileTransport({
        minLevel: minLevel === "silent" ? "silent" : "debug",
        logDir: options.logDir ?? process.env.LOG_DIR ?? path.join(os.homedir(), ".framewise", "logs"),
        filename: "server",
        maxFiles: 10,
      }),
    );
  }

  logger = initLogger({ minLevel, component: "server", transports, ringBufferSize: 2000 });
  return logger;
}

export function getServerLogger(): Logger {
  return logger ?? initServerLogging();
}

export function createComponentLogger(component: string): ILogger {
  let bound: { root: Logger; child: ILogger } | null = null;
  const resolve = (): ILogger => {
    const root = getServerLogger();
    if (!bound || bound.root !== root) bound = { root, child: root.child({ component: `server.${component}` }) };
    return bound.child;
  };
  return {
    debug: (message, data) => resolve().debug(message, data),
    info: (message, data) => resolve().info(message, data),
    warn: (message, data) => resolve().warn(message, data),
    error: (message, error, data) => resolve().error(message, error, data),
    child: (context) => resolve().child(context),
  };
}

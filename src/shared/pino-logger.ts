/**
 * Pino-based logging for the provisioner
 *
 * STDOUT IS RESERVED FOR LINKER DIRECTIVES:
 * 1. The host build reads every stdout line looking for directives
 * 2. Log records therefore go to stderr only, never stdout
 * 3. Pretty output (pino-pretty) is also pointed at fd 2
 */

import type { LoggerOptions, Logger as PinoLogger } from "pino";
import pino from "pino";
import { buildConfig } from "./build-config.js";

export type Logger = PinoLogger;

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogFormat = "json" | "pretty";

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
}

const globalConfig: { isInitialized: boolean; format: LogFormat } = {
  isInitialized: false,
  format: "json",
};

/**
 * Stream that forwards every record to stderr
 */
function createStderrStream() {
  return {
    write(msg: string) {
      process.stderr.write(msg);
    },
  };
}

function createPinoOptions(config?: Partial<LoggingConfig>): LoggerOptions {
  const options: LoggerOptions = {
    name: buildConfig.serviceName,
    level: config?.level || "info",
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (config?.format === "pretty" && process.env["NODE_ENV"] !== "production") {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        destination: 2,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return options;
}

function createRootLogger(config?: Partial<LoggingConfig>): Logger {
  const options = createPinoOptions(config);
  // pino rejects a destination stream alongside a transport
  return options.transport ? pino(options) : pino(options, createStderrStream());
}

let rootLogger = createRootLogger();

const loggerCache = new Map<string, Logger>();

/**
 * Apply level and format. A format change replaces the root logger and
 * drops cached children, so callers must not hold on to a Logger across
 * re-initialisation; resolve it through getLogger() instead.
 */
export function initializeLogging(config: LoggingConfig): void {
  if (config.format !== globalConfig.format) {
    rootLogger = createRootLogger(config);
    loggerCache.clear();
  }

  rootLogger.level = config.level;
  for (const child of loggerCache.values()) {
    child.level = config.level;
  }

  globalConfig.format = config.format;
  globalConfig.isInitialized = true;
}

/**
 * Get logger instance - always returns a working logger
 */
export function getLogger(name: string): Logger {
  let logger = loggerCache.get(name);
  if (logger) {
    return logger;
  }

  logger = rootLogger.child({ module: name });
  loggerCache.set(name, logger);

  return logger;
}

export function isLoggingInitialized(): boolean {
  return globalConfig.isInitialized;
}

/**
 * Create a logger with extra bound context (stage, url, ...)
 */
export function getLoggerWithContext(name: string, context: Record<string, unknown>): Logger {
  return getLogger(name).child(context);
}

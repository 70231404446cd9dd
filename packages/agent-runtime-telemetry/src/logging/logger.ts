/**
 * Pino Logger Factory
 *
 * Structured logging for every runtime component. Each module asks for a
 * child of the shared root logger: `getLogger("permission-channel")`.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export interface LoggerConfig {
  level?: LogLevel;
  /** Pretty printing through pino-pretty (development only) */
  pretty?: boolean;
  /** Bindings included in every line */
  base?: Record<string, unknown>;
  transport?: LoggerOptions["transport"];
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

function resolveDefaultConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  return {
    level: parseLevel(env.STEWARD_LOG_LEVEL) ?? parseLevel(env.LOG_LEVEL) ?? "info",
    pretty: env.STEWARD_LOG_PRETTY === "1",
    base: { service: "steward-agent-runtime" },
  };
}

export function createLogger(config?: LoggerConfig): Logger {
  const mergedConfig = { ...resolveDefaultConfig(), ...config };

  const options: LoggerOptions = {
    level: mergedConfig.level,
    base: mergedConfig.base,
  };

  if (mergedConfig.transport) {
    options.transport = mergedConfig.transport;
  } else if (mergedConfig.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return pino(options);
}

export interface RuntimeLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

export function createRuntimeLogger(config?: LoggerConfig & { module?: string }): RuntimeLogger {
  const base = createLogger(config);
  const logger = config?.module ? base.child({ module: config.module }) : base;

  return wrapLogger(logger);
}

export function wrapLogger(logger: Logger): RuntimeLogger {
  return {
    trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err) {
        logger.error(err, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

export type { Logger } from "pino";

let rootLogger: RuntimeLogger | null = null;

/**
 * Get the shared runtime logger, or a child bound to `module`.
 */
export function getLogger(module?: string): RuntimeLogger {
  if (!rootLogger) {
    rootLogger = createRuntimeLogger();
  }
  return module ? rootLogger.child({ module }) : rootLogger;
}

/** Replace the shared root logger (tests, embedding hosts). */
export function setRootLogger(logger: RuntimeLogger): void {
  rootLogger = logger;
}

/** A logger that discards everything. */
export function createNoopLogger(): RuntimeLogger {
  const noop = (): void => undefined;
  const logger: RuntimeLogger = {
    trace: noop,
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}

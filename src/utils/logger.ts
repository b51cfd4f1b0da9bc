import winston from "winston";
import path from "path";
import { existsSync, mkdirSync } from "fs";

/**
 * Console log format with timestamp and colorized output
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(
    ({ timestamp, level, message, stack, context, ...meta }) => {
      const contextStr = context ? ` [${String(context)}]` : "";
      const metaStr =
        Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";

      if (stack) {
        return `${timestamp} [${level}]${contextStr}: ${message}${metaStr}\n${stack}`;
      }
      return `${timestamp} [${level}]${contextStr}: ${message}${metaStr}`;
    },
  ),
);

/**
 * File log format with JSON structure for easier parsing
 */
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

/**
 * Rotation limits shared by both log files
 */
const FILE_ROTATION = {
  maxsize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
  tailable: true,
};

/**
 * Create the log directory if needed
 *
 * @returns The directory, or null when it cannot be created
 */
function ensureLogDirectory(logDir: string): string | null {
  if (!existsSync(logDir)) {
    try {
      mkdirSync(logDir, { recursive: true });
    } catch {
      // Fall back to console only
      console.warn(`Failed to create log directory: ${logDir}`);
      return null;
    }
  }
  return logDir;
}

/**
 * combined.log and error.log transports for a directory
 */
function createFileTransports(logDir: string): winston.transport[] {
  const dir = ensureLogDirectory(logDir);
  if (!dir) {
    return [];
  }

  return [
    new winston.transports.File({
      filename: path.join(dir, "combined.log"),
      format: fileFormat,
      ...FILE_ROTATION,
    }),
    new winston.transports.File({
      filename: path.join(dir, "error.log"),
      level: "error",
      format: fileFormat,
      ...FILE_ROTATION,
    }),
  ];
}

/**
 * Options for createLogger
 */
export interface LoggerOptions {
  level?: string;
  silent?: boolean;
  context?: string;
  /** Directory for combined.log and error.log; console only when absent */
  logDirectory?: string;
}

/**
 * Create a Winston logger instance
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: 'debug', context: 'EventLoop' });
 * logger.info('Loop started');
 * logger.error('Handler failed', { error });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ];

  if (options.logDirectory) {
    transports.push(...createFileTransports(options.logDirectory));
  }

  return winston.createLogger({
    level: options.level ?? "info",
    silent: options.silent ?? false,
    transports,
    defaultMeta: options.context ? { context: options.context } : undefined,
  });
}

/**
 * Directory the default logger writes to, from the environment
 *
 * SLOTLOOP_PROJECT_ROOT enables `<root>/.slotloop/logs` unless
 * DISABLE_FILE_LOGGING is "true".
 */
function logDirectoryFromEnv(): string | undefined {
  const root = process.env["SLOTLOOP_PROJECT_ROOT"];
  if (!root || process.env["DISABLE_FILE_LOGGING"] === "true") {
    return undefined;
  }
  return path.join(root, ".slotloop", "logs");
}

/**
 * Default logger instance for the application
 *
 * Uses LOG_LEVEL if set, otherwise 'info'.
 */
export const logger = createLogger({
  level: process.env["LOG_LEVEL"] ?? "info",
  logDirectory: logDirectoryFromEnv(),
});

/** File transports added by configureLogging, replaced on every call */
let configuredFileTransports: winston.transport[] = [];

/**
 * Create a child logger with a specific context
 *
 * @param context - Context name (e.g., 'EventLoop', 'SignalBus')
 *
 * @example
 * ```ts
 * const logger = createContextLogger('SignalBus');
 * logger.debug('Connected'); // [SignalBus] Connected
 * ```
 */
export function createContextLogger(context: string): winston.Logger {
  return logger.child({ context });
}

/**
 * Apply the `logging` section of slotloop.json to the default logger
 *
 * Sets the level for the logger and every child created from it. With a
 * directory, file transports are (re)attached there; without one, file
 * transports from an earlier call are detached.
 *
 * @returns Files the default logger now writes to
 *
 * @example
 * ```ts
 * configureLogging({ level: 'debug', directory: '.slotloop/logs' });
 * ```
 */
export function configureLogging(settings: {
  level: string;
  directory?: string;
}): string[] {
  logger.level = settings.level;

  for (const transport of configuredFileTransports) {
    logger.remove(transport);
    transport.close?.();
  }
  if (!settings.directory) {
    configuredFileTransports = [];
    return [];
  }

  const directory = settings.directory;
  configuredFileTransports = createFileTransports(directory);
  for (const transport of configuredFileTransports) {
    logger.add(transport);
  }

  return configuredFileTransports.length > 0
    ? [
        path.join(directory, "combined.log"),
        path.join(directory, "error.log"),
      ]
    : [];
}

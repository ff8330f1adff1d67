/**
 * Logger Factory
 *
 * Initializes the root winston logger and caches per-component Logger wrappers.
 *
 * Usage:
 *   import { getLogger } from '../logging/index.js';
 *
 *   const logger = getLogger('channel');
 *   logger.info('Source 5551 ready');
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * Winston uses lower numbers for higher priority: error=0 ... trace=4.
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
    default:
      return 'info';
  }
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

/**
 * Initialize the logging subsystem. If getLogger() is called first, it
 * lazy-initializes with defaults (console transport, INFO level).
 */
export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();

  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [
    new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport(),
  ];

  if (config.logFile) {
    transports.push(new FileTransport(config.logFile, config.logFormat).createWinstonTransport());
  }

  if (additionalTransports) {
    for (const t of additionalTransports) {
      transports.push(t.createWinstonTransport());
    }
  }

  const logger = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: toWinstonLevel(currentGlobalLevel),
    transports,
    exitOnError: false,
  });
  rootLogger = logger;

  setGlobalLevelProvider(() => currentGlobalLevel);
  initFromEnv(config.debugComponents);

  return logger;
}

/**
 * Get (or create) a Logger for a named component.
 *
 * The returned wrapper resolves the root logger on every call, so module-level
 * `const logger = getLogger(...)` keeps working after re-initialization.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, () => rootLogger ?? initializeLogging());
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime.
 */
export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
  if (rootLogger) {
    rootLogger.level = toWinstonLevel(level);
  }
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const logger = rootLogger;
  if (!logger) {
    return;
  }
  await new Promise<void>((resolve) => {
    logger.on('finish', resolve);
    logger.end();
  });
  rootLogger = null;
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}

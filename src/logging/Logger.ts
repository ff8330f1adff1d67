/**
 * Logger
 *
 * Lightweight wrapper around a winston logger instance, bound to a component
 * name. Level filtering goes through DebugModeRegistry so single components
 * can be turned up without touching the global level.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { shouldLog } from './DebugModeRegistry.js';

/** Reference to the factory's global level getter, injected to avoid circular imports */
let globalLevelFn: () => LogLevel = () => LogLevel.INFO;

/**
 * Set the global level provider function.
 * Called by LoggerFactory during initialization.
 * @internal
 */
export function setGlobalLevelProvider(fn: () => LogLevel): void {
  globalLevelFn = fn;
}

/** A winston logger, or a getter for one that may be replaced at runtime. */
export type WinstonSource = winston.Logger | (() => winston.Logger);

export class Logger {
  constructor(
    private readonly component: string,
    private readonly winstonSource: WinstonSource
  ) {}

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.TRACE, 'trace', message, undefined, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.DEBUG, 'debug', message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.INFO, 'info', message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.WARN, 'warn', message, undefined, metadata);
  }

  /**
   * Log an ERROR-level message with an optional Error object.
   */
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.ERROR, 'error', message, error, metadata);
  }

  isDebugEnabled(): boolean {
    return shouldLog(this.component, LogLevel.DEBUG, globalLevelFn());
  }

  /**
   * Create a child logger with a sub-component suffix.
   * e.g., logger.child('5551') on component "udp-receiver" yields "udp-receiver.5551"
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.winstonSource);
  }

  getComponent(): string {
    return this.component;
  }

  private logAt(
    level: LogLevel,
    winstonLevel: string,
    message: string,
    error?: Error,
    metadata?: Record<string, unknown>
  ): void {
    if (!shouldLog(this.component, level, globalLevelFn())) {
      return;
    }

    const meta: Record<string, unknown> = {
      component: this.component,
      ...metadata,
    };
    if (error?.stack) {
      meta['errorStack'] = error.stack;
    }
    const target =
      typeof this.winstonSource === 'function' ? this.winstonSource() : this.winstonSource;
    target.log(winstonLevel, message, meta);
  }
}

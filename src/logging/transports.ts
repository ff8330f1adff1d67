/**
 * Logging Transports
 *
 * Winston transport wrappers. Text lines look like:
 *   WARN  2026-02-10 14:30:15,042 [udp-receiver.5551] Dropped datagram
 */

import winston from 'winston';

/** Levels written to stderr; everything else goes to stdout. */
export const DIAGNOSTIC_LEVELS = ['error', 'warn'];

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * Format a Date as local time yyyy-MM-dd HH:mm:ss,SSS
 */
export function formatLocalTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const millis = String(date.getMilliseconds()).padStart(3, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds},${millis}`;
}

/**
 * Render one log record as a text line. Exported for tests.
 */
export function formatTextLine(
  info: { level: string; message: unknown; [key: string]: unknown },
  timestampFormat: 'local' | 'iso',
  now: Date = new Date()
): string {
  const level = info.level.toUpperCase().padEnd(5);
  const component = typeof info['component'] === 'string' ? info['component'] : undefined;
  const timestamp = timestampFormat === 'iso' ? now.toISOString() : formatLocalTimestamp(now);
  const componentPart = component ? ` [${component}]` : '';
  let line = `${level} ${timestamp}${componentPart} ${String(info.message)}`;
  const errorStack = info['errorStack'];
  if (typeof errorStack === 'string') {
    line += '\n' + errorStack;
  }
  return line;
}

function buildTextFormat(timestampFormat: 'local' | 'iso'): winston.Logform.Format {
  return winston.format.printf((info) => formatTextLine(info, timestampFormat));
}

/**
 * Console transport. Warnings and errors go to stderr, the rest to stdout.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: 'text' | 'json',
    private timestampFormat: 'local' | 'iso'
  ) {}

  createWinstonTransport(): winston.transport {
    if (this.format === 'json') {
      return new winston.transports.Console({
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        stderrLevels: DIAGNOSTIC_LEVELS,
      });
    }

    return new winston.transports.Console({
      format: buildTextFormat(this.timestampFormat),
      stderrLevels: DIAGNOSTIC_LEVELS,
    });
  }
}

/**
 * File transport with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: 'text' | 'json'
  ) {}

  createWinstonTransport(): winston.transport {
    const formatCombine =
      this.format === 'json'
        ? winston.format.combine(winston.format.timestamp(), winston.format.json())
        : buildTextFormat('local');

    return new winston.transports.File({
      filename: this.filePath,
      format: formatCombine,
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}

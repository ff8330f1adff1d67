/**
 * Logging configuration, read from the environment once and cached.
 *
 *   LOG_LEVEL               TRACE | DEBUG | INFO | WARN | ERROR (default INFO)
 *   LOG_FORMAT              text | json (default text)
 *   LOG_FILE                also write to this file
 *   LOG_TIMESTAMP_FORMAT    local | iso (default local)
 *   ACARS_DEBUG_COMPONENTS  comma-separated component[:LEVEL] overrides
 *
 * Unrecognised values fall back to the default rather than failing startup.
 */

import { z } from 'zod';
import { LogLevel, parseLogLevel } from './LogLevel.js';

function splitComponentList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

const LoggingEnvSchema = z.object({
  LOG_LEVEL: z.string().default(LogLevel.INFO).transform((value) => parseLogLevel(value)),
  LOG_FORMAT: z.enum(['text', 'json']).catch('text'),
  LOG_FILE: z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined)),
  LOG_TIMESTAMP_FORMAT: z.enum(['local', 'iso']).catch('local'),
  ACARS_DEBUG_COMPONENTS: z.string().optional().transform(splitComponentList),
});

type LoggingEnv = z.output<typeof LoggingEnvSchema>;

export interface LoggingConfiguration {
  logLevel: LogLevel;
  /** Entries of ACARS_DEBUG_COMPONENTS, handed to the debug registry */
  debugComponents: string[];
  logFormat: LoggingEnv['LOG_FORMAT'];
  logFile?: string;
  /** 'local' is yyyy-MM-dd HH:mm:ss,SSS in local time */
  timestampFormat: LoggingEnv['LOG_TIMESTAMP_FORMAT'];
}

let cachedConfig: LoggingConfiguration | null = null;

export function getLoggingConfig(): LoggingConfiguration {
  if (!cachedConfig) {
    const env = LoggingEnvSchema.parse(process.env);
    cachedConfig = {
      logLevel: env.LOG_LEVEL,
      debugComponents: env.ACARS_DEBUG_COMPONENTS,
      logFormat: env.LOG_FORMAT,
      logFile: env.LOG_FILE,
      timestampFormat: env.LOG_TIMESTAMP_FORMAT,
    };
  }
  return cachedConfig;
}

/**
 * Forget the cached configuration so the next read sees the current environment.
 */
export function resetLoggingConfig(): void {
  cachedConfig = null;
}

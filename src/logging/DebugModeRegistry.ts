/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Module-scoped state with a reset for tests.
 *
 * Operators can turn on DEBUG/TRACE for one component (e.g. "udp-receiver:TRACE")
 * without flooding the rest of the output.
 */

import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  levelOverride?: LogLevel;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Set a log level override for a specific component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    registry.set(name, { name, levelOverride: level });
  }
}

/**
 * Clear a component's level override, reverting to global level.
 */
export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

/**
 * Effective level for a component. Child components ("a.b") inherit the
 * override of their parent ("a") unless they carry their own.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let current: string | undefined = name;
  while (current) {
    const override = registry.get(current)?.levelOverride;
    if (override) {
      return override;
    }
    const dot = current.lastIndexOf('.');
    current = dot > 0 ? current.substring(0, dot) : undefined;
  }
  return globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return shouldDisplayLogLevel(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * Apply overrides parsed from entries like ["channel", "udp-receiver:TRACE"].
 * Entries without a level suffix get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  registry.clear();
}

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  getGlobalLevel,
  getLogger,
  initializeLogging,
  resetLogging,
  setGlobalLevel,
} from '../../../src/logging/LoggerFactory.js';
import { resetLoggingConfig } from '../../../src/logging/config.js';
import { resetDebugRegistry } from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';

describe('LoggerFactory', () => {
  let savedLevel: string | undefined;

  beforeEach(() => {
    savedLevel = process.env['LOG_LEVEL'];
    resetLoggingConfig();
    resetLogging();
    resetDebugRegistry();
  });

  afterEach(() => {
    if (savedLevel === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = savedLevel;
    }
    resetLoggingConfig();
    resetLogging();
  });

  it('should cache loggers per component', () => {
    expect(getLogger('channel')).toBe(getLogger('channel'));
    expect(getLogger('channel')).not.toBe(getLogger('splitter'));
  });

  it('should take the initial level from LOG_LEVEL', () => {
    process.env['LOG_LEVEL'] = 'WARN';

    const root = initializeLogging();

    expect(getGlobalLevel()).toBe(LogLevel.WARN);
    expect(root.level).toBe('warn');
  });

  it('should change the root level at runtime', () => {
    const root = initializeLogging();

    setGlobalLevel(LogLevel.DEBUG);

    expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
    expect(root.level).toBe('debug');
  });

  it('should reset the global level', () => {
    setGlobalLevel(LogLevel.ERROR);

    resetLogging();

    expect(getGlobalLevel()).toBe(LogLevel.INFO);
  });
});

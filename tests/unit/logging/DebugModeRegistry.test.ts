import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  clearComponentLevel,
  getEffectiveLevel,
  initFromEnv,
  resetDebugRegistry,
  setComponentLevel,
  shouldLog,
} from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';

describe('DebugModeRegistry', () => {
  beforeEach(() => {
    resetDebugRegistry();
  });

  it('should return the global level when no override exists', () => {
    expect(getEffectiveLevel('channel', LogLevel.WARN)).toBe(LogLevel.WARN);
  });

  it('should apply a component override', () => {
    setComponentLevel('channel', LogLevel.DEBUG);

    expect(getEffectiveLevel('channel', LogLevel.INFO)).toBe(LogLevel.DEBUG);
    expect(shouldLog('channel', LogLevel.DEBUG, LogLevel.INFO)).toBe(true);
    expect(shouldLog('splitter', LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
  });

  it('should let children inherit the parent override', () => {
    setComponentLevel('udp-receiver', LogLevel.DEBUG);

    expect(getEffectiveLevel('udp-receiver.5551', LogLevel.INFO)).toBe(LogLevel.DEBUG);
  });

  it('should prefer the most specific override', () => {
    setComponentLevel('udp-receiver', LogLevel.DEBUG);
    setComponentLevel('udp-receiver.5552', LogLevel.ERROR);

    expect(getEffectiveLevel('udp-receiver.5551', LogLevel.INFO)).toBe(LogLevel.DEBUG);
    expect(getEffectiveLevel('udp-receiver.5552', LogLevel.INFO)).toBe(LogLevel.ERROR);
  });

  it('should revert to the global level once cleared', () => {
    setComponentLevel('channel', LogLevel.TRACE);
    clearComponentLevel('channel');

    expect(getEffectiveLevel('channel', LogLevel.INFO)).toBe(LogLevel.INFO);
  });

  describe('initFromEnv', () => {
    it('should default entries without a level to DEBUG', () => {
      initFromEnv(['channel', 'udp-receiver:TRACE']);

      expect(getEffectiveLevel('channel', LogLevel.INFO)).toBe(LogLevel.DEBUG);
      expect(getEffectiveLevel('udp-receiver', LogLevel.INFO)).toBe(LogLevel.TRACE);
    });
  });
});

import { describe, it, expect } from '@jest/globals';
import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from '../../../src/logging/LogLevel.js';

describe('LogLevel', () => {
  describe('parseLogLevel', () => {
    it('should parse level names case-insensitively', () => {
      expect(parseLogLevel('trace')).toBe(LogLevel.TRACE);
      expect(parseLogLevel('Debug')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel('ERROR')).toBe(LogLevel.ERROR);
    });

    it('should accept long aliases', () => {
      expect(parseLogLevel('warning')).toBe(LogLevel.WARN);
      expect(parseLogLevel('information')).toBe(LogLevel.INFO);
    });

    it('should fall back to INFO', () => {
      expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
      expect(parseLogLevel('')).toBe(LogLevel.INFO);
    });
  });

  describe('shouldDisplayLogLevel', () => {
    it('should pass levels at or above the filter', () => {
      expect(shouldDisplayLogLevel(LogLevel.INFO, LogLevel.INFO)).toBe(true);
      expect(shouldDisplayLogLevel(LogLevel.ERROR, LogLevel.WARN)).toBe(true);
    });

    it('should reject levels below the filter', () => {
      expect(shouldDisplayLogLevel(LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
      expect(shouldDisplayLogLevel(LogLevel.TRACE, LogLevel.DEBUG)).toBe(false);
    });
  });
});

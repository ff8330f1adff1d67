import { describe, it, expect } from '@jest/globals';
import {
  ConfigurationError,
  DecodeError,
  SplitterError,
  WriteError,
  describeError,
  hasErrorCode,
  toError,
} from '../../../src/util/errors.js';

describe('errors', () => {
  describe('ConfigurationError', () => {
    it('should append issues to the message', () => {
      const error = new ConfigurationError('Invalid configuration', ['ports.0: too big', 'host: required']);

      expect(error.message).toBe('Invalid configuration: ports.0: too big; host: required');
      expect(error.issues).toEqual(['ports.0: too big', 'host: required']);
      expect(error.name).toBe('ConfigurationError');
      expect(error).toBeInstanceOf(SplitterError);
    });

    it('should keep a bare message without issues', () => {
      expect(new ConfigurationError('No UDP ports specified in the configuration file').message).toBe(
        'No UDP ports specified in the configuration file'
      );
    });
  });

  describe('DecodeError', () => {
    it('should name the port and size', () => {
      const error = new DecodeError(5551, 12);

      expect(error.message).toBe('Received 12 bytes on port 5551 that could not be decoded as UTF-8');
      expect(error.port).toBe(5551);
      expect(error.byteLength).toBe(12);
    });
  });

  describe('WriteError', () => {
    it('should name the file and keep the cause', () => {
      const cause = new Error('EACCES: permission denied');
      const error = new WriteError('/out/acars_label_52.txt', cause);

      expect(error.message).toBe('Failed to write /out/acars_label_52.txt: EACCES: permission denied');
      expect(error.filePath).toBe('/out/acars_label_52.txt');
      expect(error.cause).toBe(cause);
    });
  });

  describe('helpers', () => {
    it('should describe any thrown value', () => {
      expect(describeError(new Error('boom'))).toBe('boom');
      expect(describeError('plain')).toBe('plain');
      expect(describeError(42)).toBe('42');
    });

    it('should coerce to Error', () => {
      const error = new Error('boom');

      expect(toError(error)).toBe(error);
      expect(toError('plain')).toEqual(new Error('plain'));
    });

    it('should match a system error code by shape', () => {
      const enoent = Object.assign(new Error('stat failed'), { code: 'ENOENT' });

      expect(hasErrorCode(enoent, 'ENOENT')).toBe(true);
      expect(hasErrorCode({ code: 'EADDRINUSE', message: 'bind failed' }, 'EADDRINUSE')).toBe(true);
      expect(hasErrorCode(enoent, 'EACCES')).toBe(false);
      expect(hasErrorCode(new Error('no code'), 'ENOENT')).toBe(false);
      expect(hasErrorCode('ENOENT', 'ENOENT')).toBe(false);
      expect(hasErrorCode(null, 'ENOENT')).toBe(false);
    });
  });
});

import { describe, it, expect } from '@jest/globals';
import { SourceBuffer } from '../../../../src/donkey/channel/SourceBuffer.js';

describe('SourceBuffer', () => {
  it('should start empty with the creation time as last activity', () => {
    const buffer = new SourceBuffer(5551, 1000);

    expect(buffer.port).toBe(5551);
    expect(buffer.isEmpty()).toBe(true);
    expect(buffer.length).toBe(0);
    expect(buffer.getLastActivity()).toBe(1000);
  });

  it('should append in order', () => {
    const buffer = new SourceBuffer(5551, 0);

    buffer.append('abc');
    buffer.append('def');

    expect(buffer.getContents()).toBe('abcdef');
    expect(buffer.length).toBe(6);
  });

  it('should consume a prefix and return it', () => {
    const buffer = new SourceBuffer(5551, 0);
    buffer.append('abcdef');

    expect(buffer.consume(4)).toBe('abcd');
    expect(buffer.getContents()).toBe('ef');
  });

  it('should clear everything', () => {
    const buffer = new SourceBuffer(5551, 0);
    buffer.append('abcdef');

    expect(buffer.clear()).toBe('abcdef');
    expect(buffer.isEmpty()).toBe(true);
  });

  it('should not move last activity on append', () => {
    const buffer = new SourceBuffer(5551, 1000);

    buffer.append('abc');

    expect(buffer.idleFor(4000)).toBe(3000);
  });

  it('should measure idle time from the last mark', () => {
    const buffer = new SourceBuffer(5551, 1000);

    buffer.markActivity(2500);

    expect(buffer.getLastActivity()).toBe(2500);
    expect(buffer.idleFor(4000)).toBe(1500);
  });
});

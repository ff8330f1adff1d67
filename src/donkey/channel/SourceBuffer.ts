/**
 * Purpose: Per-port accumulation buffer and last-activity timestamp
 *
 * Key behaviors:
 * - Append-only, except for flushes which remove a prefix
 * - lastActivity is only moved by the owner (on ordinary or forced flushes)
 */

export class SourceBuffer {
  private buffer = '';
  private lastActivity: number;

  constructor(
    readonly port: number,
    createdAt: number
  ) {
    this.lastActivity = createdAt;
  }

  append(text: string): void {
    this.buffer += text;
  }

  getContents(): string {
    return this.buffer;
  }

  get length(): number {
    return this.buffer.length;
  }

  isEmpty(): boolean {
    return this.buffer.length === 0;
  }

  /**
   * Drop the first `prefixLength` characters and return them.
   */
  consume(prefixLength: number): string {
    const removed = this.buffer.slice(0, prefixLength);
    this.buffer = this.buffer.slice(prefixLength);
    return removed;
  }

  /**
   * Empty the buffer, returning what it held.
   */
  clear(): string {
    return this.consume(this.buffer.length);
  }

  getLastActivity(): number {
    return this.lastActivity;
  }

  markActivity(now: number): void {
    this.lastActivity = now;
  }

  /**
   * Milliseconds since the last flush.
   */
  idleFor(now: number): number {
    return now - this.lastActivity;
  }
}

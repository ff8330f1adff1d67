/**
 * Purpose: Owns every source's buffer and routes reassembled messages
 *
 * Key behaviors:
 * - One SourceBuffer per configured port, created up front, never shared
 * - All mutation of a source happens under that port's lock (datagram path and
 *   sweeper alike), so frames of one source are written in delimiter order
 * - Ordinary framing emits each delimiter pair and keeps the unbounded tail
 * - Idle sources (no flush for more than 2 x bufferTimeout) are force-flushed
 *   from their first delimiter to buffer end
 * - A buffer without any delimiter is reported once per episode and discarded
 *   once it grows past maxBufferSize
 * - Write failures are logged and counted per message; other messages and
 *   sources keep flowing
 */

import { EventEmitter } from 'events';
import { SourceBuffer } from './SourceBuffer.js';
import { KeyedMutex } from './KeyedMutex.js';
import { Statistics } from './Statistics.js';
import type { SourceStatistics } from './Statistics.js';
import type { DestinationConnector } from './DestinationConnector.js';
import {
  extractFrames,
  extractPendingFrame,
  findFirstDelimiter,
} from '../message/TimestampFramer.js';
import type { MessageClassifier } from '../../datatypes/acars/AcarsClassifier.js';
import type { DecodeError } from '../../util/errors.js';
import { toError } from '../../util/errors.js';
import { getLogger } from '../../logging/index.js';
import type { Logger } from '../../logging/index.js';

/** Default cap on a single source's pending text, in characters. */
export const DEFAULT_MAX_BUFFER_SIZE = 1024 * 1024;

/**
 * Why a message left the buffer.
 */
export enum FlushReason {
  /** Bounded by the next delimiter */
  FRAMED = 'FRAMED',
  /** Sweeper flush of an idle source */
  TIMEOUT = 'TIMEOUT',
  /** Buffer cap reached */
  OVERFLOW = 'OVERFLOW',
}

const FLUSH_LABELS: Record<FlushReason, string> = {
  [FlushReason.FRAMED]: '',
  [FlushReason.TIMEOUT]: 'timeout ',
  [FlushReason.OVERFLOW]: 'overflow ',
};

export interface RoutedMessage {
  port: number;
  key: string | null;
  message: string;
  reason: FlushReason;
  /** Where the destination put it, undefined when the write failed */
  destination?: string;
  error?: Error;
}

export interface ChannelConfig {
  ports: number[];
  classifier: MessageClassifier;
  destination: DestinationConnector;
  /** Sweep period in seconds; sources idle for twice this are force-flushed */
  bufferTimeout: number;
  maxBufferSize?: number;
  /** Epoch-millisecond clock, injectable for tests */
  clock?: () => number;
  logger?: Logger;
}

export class Channel extends EventEmitter {
  private readonly sources = new Map<number, SourceBuffer>();
  private readonly mutex = new KeyedMutex<number>();
  private readonly statistics = new Statistics();
  /** Ports whose delimiter-free buffer has already been reported */
  private readonly unboundedReported = new Set<number>();

  private readonly classifier: MessageClassifier;
  private readonly destination: DestinationConnector;
  private readonly bufferTimeoutMs: number;
  private readonly maxBufferSize: number;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(config: ChannelConfig) {
    super();
    if (config.ports.length === 0) {
      throw new Error('A channel needs at least one port');
    }
    this.classifier = config.classifier;
    this.destination = config.destination;
    this.bufferTimeoutMs = config.bufferTimeout * 1000;
    this.maxBufferSize = config.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE;
    this.clock = config.clock ?? Date.now;
    this.logger = config.logger ?? getLogger('channel');

    const now = this.clock();
    for (const port of config.ports) {
      if (!this.sources.has(port)) {
        this.sources.set(port, new SourceBuffer(port, now));
      }
    }
  }

  getPorts(): number[] {
    return [...this.sources.keys()];
  }

  getSource(port: number): SourceBuffer | undefined {
    return this.sources.get(port);
  }

  getStatistics(port: number): SourceStatistics {
    return this.statistics.get(port);
  }

  getTotalStatistics(): SourceStatistics {
    return this.statistics.getTotals();
  }

  /**
   * Append decoded text from `port` and emit every message it completes.
   *
   * @returns number of messages routed (successfully or not)
   * @throws Error for a port this channel was not configured with
   */
  async receive(port: number, text: string): Promise<number> {
    const source = this.requireSource(port);
    return this.mutex.runExclusive(port, async () => {
      this.statistics.increment(port, 'datagramsReceived');
      source.append(text);
      const emitted = await this.frameSource(source);
      return emitted + (await this.enforceBufferLimit(source));
    });
  }

  /**
   * Count a datagram dropped by the receiver.
   */
  recordDecodeError(error: DecodeError): void {
    this.statistics.increment(error.port, 'decodeErrors');
  }

  /**
   * Force-flush every source that has gone quiet for more than twice the
   * buffer timeout.
   *
   * @returns number of sources flushed
   */
  async sweep(now: number = this.clock()): Promise<number> {
    let flushed = 0;
    for (const source of this.sources.values()) {
      const didFlush = await this.mutex.runExclusive(source.port, () =>
        this.sweepSource(source, now)
      );
      if (didFlush) {
        flushed++;
      }
    }
    return flushed;
  }

  /**
   * True when `source` holds data and has not flushed for more than 2 x bufferTimeout.
   */
  isIdle(source: SourceBuffer, now: number): boolean {
    return !source.isEmpty() && source.idleFor(now) > this.bufferTimeoutMs * 2;
  }

  private requireSource(port: number): SourceBuffer {
    const source = this.sources.get(port);
    if (!source) {
      throw new Error(`Port ${port} is not a configured source`);
    }
    return source;
  }

  private async frameSource(source: SourceBuffer): Promise<number> {
    const { frames, consumed } = extractFrames(source.getContents());
    if (frames.length === 0) {
      this.checkUnbounded(source);
      return 0;
    }

    for (const frame of frames) {
      await this.route(source.port, frame.text, FlushReason.FRAMED);
    }
    source.consume(consumed);
    source.markActivity(this.clock());
    this.statistics.increment(source.port, 'framesEmitted', frames.length);
    this.unboundedReported.delete(source.port);
    return frames.length;
  }

  private async sweepSource(source: SourceBuffer, now: number): Promise<boolean> {
    if (!this.isIdle(source, now)) {
      return false;
    }
    const flushed = await this.flushPending(source, now, FlushReason.TIMEOUT);
    if (!flushed) {
      // Left untouched; retried on the next sweep.
      this.logger.warn(
        `Port ${source.port}: ${source.length} buffered characters contain no timestamp header; cannot flush`,
        { port: source.port, bufferLength: source.length }
      );
    }
    return flushed;
  }

  private async enforceBufferLimit(source: SourceBuffer): Promise<number> {
    if (source.length <= this.maxBufferSize) {
      return 0;
    }
    if (await this.flushPending(source, this.clock(), FlushReason.OVERFLOW)) {
      return 1;
    }
    const discarded = source.clear();
    this.statistics.increment(source.port, 'bufferResets');
    this.unboundedReported.delete(source.port);
    this.logger.warn(
      `Port ${source.port}: discarded ${discarded.length} buffered characters with no timestamp header (limit ${this.maxBufferSize})`,
      { port: source.port, discarded: discarded.length }
    );
    this.emit('bufferReset', { port: source.port, discarded: discarded.length });
    return 0;
  }

  /**
   * Emit everything from the first delimiter to buffer end and clear the
   * buffer. Returns false (buffer untouched) when there is no delimiter.
   */
  private async flushPending(
    source: SourceBuffer,
    now: number,
    reason: FlushReason
  ): Promise<boolean> {
    const frame = extractPendingFrame(source.getContents());
    if (!frame) {
      return false;
    }
    await this.route(source.port, frame.text, reason);
    source.clear();
    source.markActivity(now);
    this.statistics.increment(
      source.port,
      reason === FlushReason.TIMEOUT ? 'timeoutFlushes' : 'bufferResets'
    );
    this.unboundedReported.delete(source.port);
    return true;
  }

  private checkUnbounded(source: SourceBuffer): void {
    if (source.isEmpty() || findFirstDelimiter(source.getContents()) >= 0) {
      this.unboundedReported.delete(source.port);
      return;
    }
    if (this.unboundedReported.has(source.port)) {
      return;
    }
    this.unboundedReported.add(source.port);
    this.logger.warn(
      `Port ${source.port}: no timestamp header found in ${source.length} buffered characters; ` +
        `is the producer writing JAERO output format 3? Buffer is discarded past ${this.maxBufferSize} characters`,
      { port: source.port, bufferLength: source.length }
    );
  }

  private async route(port: number, message: string, reason: FlushReason): Promise<void> {
    const routed: RoutedMessage = { port, key: null, message, reason };
    try {
      routed.key = this.classifier.classify(message);
      routed.destination = await this.destination.send(routed.key, message);
      this.logger.info(
        `Port ${port}: Processed ${FLUSH_LABELS[reason]}message with ${this.classifier.strategy}: ${routed.key ?? 'unclassified'}`,
        { port, destination: routed.destination }
      );
    } catch (error) {
      routed.error = toError(error);
      this.statistics.increment(port, 'writeErrors');
      this.logger.error(`Port ${port}: failed to route message`, routed.error, {
        port,
        key: routed.key,
      });
    }
    this.emit('routed', routed);
  }
}

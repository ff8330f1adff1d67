/**
 * Purpose: Streaming splitter lifecycle
 *
 * Key behaviors:
 * - Create the output directory before any socket binds
 * - One UdpReceiver per configured port, all feeding one Channel
 * - One TimeoutSweeper for all sources, period = bufferTimeout
 * - run(signal) starts everything, waits for the signal, then shuts down:
 *   sweeper cancelled, sockets closed, in-flight datagrams drained
 */

import { Channel } from '../donkey/channel/Channel.js';
import { TimeoutSweeper } from '../donkey/channel/TimeoutSweeper.js';
import { UdpReceiver } from '../connectors/udp/UdpReceiver.js';
import type { DatagramSocketFactory } from '../connectors/udp/UdpReceiver.js';
import { FileDispatcher } from '../connectors/file/FileDispatcher.js';
import { createClassifier } from '../datatypes/acars/AcarsClassifier.js';
import type { SplitterConfig } from './SplitterConfig.js';
import { describeSplitterConfig } from './SplitterConfig.js';
import { STATISTIC_KEYS } from '../donkey/channel/Statistics.js';
import type { SourceStatistics } from '../donkey/channel/Statistics.js';
import { toError } from '../util/errors.js';
import { getLogger } from '../logging/index.js';

const logger = getLogger('splitter');

export interface SplitterOptions {
  /** Replaces dgram sockets, e.g. with in-process fakes */
  socketFactory?: DatagramSocketFactory;
  /** Epoch-millisecond clock shared by the channel */
  clock?: () => number;
}

export class Splitter {
  private readonly config: SplitterConfig;
  private readonly dispatcher: FileDispatcher;
  private readonly channel: Channel;
  private readonly receivers: UdpReceiver[];
  private readonly sweeper: TimeoutSweeper;
  private running = false;

  constructor(config: SplitterConfig, options: SplitterOptions = {}) {
    this.config = config;

    this.dispatcher = new FileDispatcher({
      properties: {
        directory: config.outputDir,
        splitBy: config.splitBy,
        outputAppend: true,
      },
    });

    this.channel = new Channel({
      ports: config.ports,
      classifier: createClassifier(config.splitBy, config.keyword),
      destination: this.dispatcher,
      bufferTimeout: config.bufferTimeout,
      maxBufferSize: config.maxBufferSize,
      clock: options.clock,
    });

    this.receivers = config.ports.map((port) => {
      const receiver = new UdpReceiver({
        properties: { host: config.host, port },
        socketFactory: options.socketFactory,
        onDecodeError: (error) => this.channel.recordDecodeError(error),
      });
      receiver.setMessageHandler(async (text) => {
        await this.channel.receive(port, text);
      });
      return receiver;
    });

    this.sweeper = new TimeoutSweeper({
      target: this.channel,
      intervalMs: config.bufferTimeout * 1000,
    });
  }

  getChannel(): Channel {
    return this.channel;
  }

  getReceivers(): UdpReceiver[] {
    return this.receivers;
  }

  getSweeper(): TimeoutSweeper {
    return this.sweeper;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Create the output directory, bind every port and start the sweeper.
   * If any port fails to bind, the ones already bound are closed again.
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error('Splitter is already running');
    }

    for (const line of describeSplitterConfig(this.config)) {
      logger.info(line);
    }

    await this.dispatcher.start();

    try {
      await Promise.all(this.receivers.map((receiver) => receiver.start()));
    } catch (error) {
      await this.stopReceivers();
      await this.dispatcher.stop();
      throw error;
    }

    this.sweeper.start();
    this.running = true;
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    await this.sweeper.stop();
    await this.stopReceivers();
    await this.dispatcher.stop();

    for (const port of this.channel.getPorts()) {
      const pending = this.channel.getSource(port)?.length ?? 0;
      if (pending > 0) {
        logger.warn(`Port ${port}: discarding ${pending} unflushed characters at shutdown`);
      }
    }
    this.logStatistics();
  }

  /**
   * Start, then run until `signal` aborts, then stop.
   */
  async run(signal: AbortSignal): Promise<void> {
    await this.start();
    try {
      await new Promise<void>((resolve) => {
        if (signal.aborted) {
          resolve();
          return;
        }
        signal.addEventListener('abort', () => resolve(), { once: true });
      });
    } finally {
      await this.stop();
    }
  }

  private async stopReceivers(): Promise<void> {
    const results = await Promise.allSettled(this.receivers.map((receiver) => receiver.stop()));
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.error('Failed to close UDP receiver', toError(result.reason));
      }
    }
  }

  private logStatistics(): void {
    const summarize = (stats: SourceStatistics) =>
      STATISTIC_KEYS.map((key) => `${key}=${stats[key]}`).join(' ');
    for (const port of this.channel.getPorts()) {
      logger.info(`Port ${port}: ${summarize(this.channel.getStatistics(port))}`);
    }
    logger.info(`All ports: ${summarize(this.channel.getTotalStatistics())}`);
  }
}

/**
 * Purpose: UDP source connector receiving decoded ACARS text from one port
 *
 * Key behaviors:
 * - Binds (host, port), retrying on EADDRINUSE
 * - Each datagram is decoded as strict UTF-8; undecodable datagrams are dropped
 *   with a warning and never stop the receiver
 * - Datagrams are processed one at a time in arrival order: the next one is not
 *   handed on until the previous one's buffering, framing and writes finished
 * - stop() closes the socket and waits for datagrams already queued
 * - stop() during start() cancels the bind: a pending retry is cut short and a
 *   socket bound after the cancel is closed again
 */

import * as dgram from 'dgram';
import { EventEmitter } from 'events';
import { TextDecoder } from 'util';
import { SourceConnector } from '../../donkey/channel/SourceConnector.js';
import {
  UdpReceiverProperties,
  UdpSocketType,
  getDefaultUdpReceiverProperties,
  socketTypeForHost,
} from './UdpConnectorProperties.js';
import { DecodeError, describeError, hasErrorCode, toError } from '../../util/errors.js';
import { getLogger } from '../../logging/index.js';
import type { Logger } from '../../logging/index.js';

/**
 * The part of dgram.Socket the receiver uses.
 */
export interface DatagramSocket extends EventEmitter {
  bind(port: number, address: string, callback: () => void): unknown;
  close(callback?: () => void): unknown;
}

export type DatagramSocketFactory = (type: UdpSocketType) => DatagramSocket;

const createDgramSocket: DatagramSocketFactory = (type) => dgram.createSocket(type);

export interface UdpReceiverConfig {
  name?: string;
  properties?: Partial<UdpReceiverProperties>;
  socketFactory?: DatagramSocketFactory;
  /** Called for every datagram dropped as undecodable */
  onDecodeError?: (error: DecodeError) => void;
  logger?: Logger;
}

/**
 * Wait `ms`, or less if `signal` aborts first.
 */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

interface PendingBind {
  controller: AbortController;
  socket: Promise<DatagramSocket>;
}

function closeSocket(socket: DatagramSocket): Promise<void> {
  socket.removeAllListeners('message');
  return new Promise((resolve) => {
    socket.close(() => resolve());
  });
}

export class UdpReceiver extends SourceConnector {
  private properties: UdpReceiverProperties;
  private readonly socketFactory: DatagramSocketFactory;
  private readonly onDecodeError?: (error: DecodeError) => void;
  private readonly logger: Logger;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });
  private socket: DatagramSocket | null = null;
  private pendingBind: PendingBind | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(config: UdpReceiverConfig = {}) {
    const properties = { ...getDefaultUdpReceiverProperties(), ...config.properties };
    super({
      name: config.name ?? `UDP Listener ${properties.port}`,
      transportName: 'UDP',
    });
    this.properties = properties;
    this.socketFactory = config.socketFactory ?? createDgramSocket;
    this.onDecodeError = config.onDecodeError;
    this.logger = config.logger ?? getLogger('udp-receiver').child(String(properties.port));
  }

  getProperties(): UdpReceiverProperties {
    return this.properties;
  }

  /**
   * Update properties. Takes effect on the next start().
   */
  setProperties(properties: Partial<UdpReceiverProperties>): void {
    this.properties = { ...this.properties, ...properties };
  }

  getPort(): number {
    return this.properties.port;
  }

  async start(): Promise<void> {
    if (this.running || this.pendingBind) {
      throw new Error('UDP Receiver is already running');
    }

    const controller = new AbortController();
    const pending: PendingBind = { controller, socket: this.bindWithRetry(controller.signal) };
    this.pendingBind = pending;
    try {
      this.socket = await pending.socket;
    } finally {
      this.pendingBind = null;
    }

    this.running = true;
    this.logger.info(
      `Listening for ACARS messages on ${this.properties.host}:${this.properties.port}...`
    );
  }

  async stop(): Promise<void> {
    const pending = this.pendingBind;
    if (pending) {
      pending.controller.abort();
      // start() reports the outcome to its own caller
      await Promise.allSettled([pending.socket]);
    }

    if (!this.running) {
      return;
    }
    this.running = false;

    const socket = this.socket;
    this.socket = null;
    if (socket) {
      await closeSocket(socket);
    }

    await this.drain();
    this.logger.debug(`Closed ${this.properties.host}:${this.properties.port}`);
  }

  /**
   * Resolves once every datagram received so far has been processed.
   */
  async drain(): Promise<void> {
    await this.queue;
  }

  /**
   * Queue one datagram behind those already received.
   */
  handleDatagram(data: Buffer): Promise<void> {
    this.queue = this.queue.then(() => this.processDatagram(data));
    return this.queue;
  }

  private async bindWithRetry(signal: AbortSignal): Promise<DatagramSocket> {
    const maxAttempts = this.properties.bindRetryAttempts;
    let bindAttempts = 0;

    while (true) {
      if (signal.aborted) {
        throw new Error(`UDP Receiver on port ${this.properties.port} stopped before binding`);
      }
      bindAttempts++;

      let socket: DatagramSocket;
      try {
        socket = await this.attemptBind();
      } catch (error: unknown) {
        if (hasErrorCode(error, 'EADDRINUSE') && bindAttempts < maxAttempts) {
          this.logger.warn(
            `Port ${this.properties.port} in use, retrying in ${this.properties.bindRetryInterval} ms (attempt ${bindAttempts}/${maxAttempts})`
          );
          await sleep(this.properties.bindRetryInterval, signal);
          continue;
        }
        throw error;
      }

      if (signal.aborted) {
        await closeSocket(socket);
        throw new Error(`UDP Receiver on port ${this.properties.port} stopped before binding`);
      }
      return socket;
    }
  }

  private attemptBind(): Promise<DatagramSocket> {
    return new Promise((resolve, reject) => {
      const socket = this.socketFactory(socketTypeForHost(this.properties.host));

      const onBindError = (error: Error) => {
        socket.removeAllListeners();
        socket.close();
        reject(error);
      };
      socket.once('error', onBindError);

      socket.bind(this.properties.port, this.properties.host, () => {
        socket.off('error', onBindError);
        socket.on('error', (error: Error) => {
          this.logger.error(`Socket error on port ${this.properties.port}`, error);
        });
        socket.on('message', (data: Buffer) => {
          void this.handleDatagram(data);
        });
        resolve(socket);
      });
    });
  }

  private async processDatagram(data: Buffer): Promise<void> {
    let text: string;
    try {
      text = this.decoder.decode(data);
    } catch (error) {
      const decodeError = new DecodeError(this.properties.port, data.length, { cause: error });
      this.logger.warn(`Warning: ${decodeError.message}`, {
        port: this.properties.port,
        reason: describeError(error),
      });
      this.onDecodeError?.(decodeError);
      return;
    }

    try {
      await this.dispatchRawMessage(text);
    } catch (error) {
      this.logger.error(`Failed to process datagram on port ${this.properties.port}`, toError(error));
    }
  }
}

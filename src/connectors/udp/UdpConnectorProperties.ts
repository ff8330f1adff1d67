/**
 * Purpose: Configuration properties for the UDP source connector
 *
 * Key behaviors:
 * - One receiver per (host, port)
 * - Bind retried on EADDRINUSE a bounded number of times
 */

import * as net from 'net';

export type UdpSocketType = 'udp4' | 'udp6';

export interface UdpReceiverProperties {
  /** Address to bind to */
  host: string;
  /** Port to listen on */
  port: number;
  /** Bind attempts before giving up on EADDRINUSE */
  bindRetryAttempts: number;
  /** Delay between bind attempts (ms) */
  bindRetryInterval: number;
}

export function getDefaultUdpReceiverProperties(): UdpReceiverProperties {
  return {
    host: '127.0.0.1',
    port: 5555,
    bindRetryAttempts: 10,
    bindRetryInterval: 1000,
  };
}

/**
 * Socket family for a bind address.
 */
export function socketTypeForHost(host: string): UdpSocketType {
  return net.isIPv6(host) ? 'udp6' : 'udp4';
}

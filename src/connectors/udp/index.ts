/**
 * UDP Connector Module
 *
 * Source connector receiving decoded ACARS text over UDP.
 */

export {
  getDefaultUdpReceiverProperties,
  socketTypeForHost,
} from './UdpConnectorProperties.js';
export type { UdpReceiverProperties, UdpSocketType } from './UdpConnectorProperties.js';

export { UdpReceiver } from './UdpReceiver.js';
export type { UdpReceiverConfig, DatagramSocket, DatagramSocketFactory } from './UdpReceiver.js';

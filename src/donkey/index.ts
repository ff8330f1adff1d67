/**
 * Reassembly engine module exports
 */

// Channel components
export { Channel, FlushReason, DEFAULT_MAX_BUFFER_SIZE } from './channel/Channel.js';
export type { ChannelConfig, RoutedMessage } from './channel/Channel.js';
export { SourceConnector } from './channel/SourceConnector.js';
export type { SourceConnectorConfig } from './channel/SourceConnector.js';
export type { MessageHandler } from './channel/SourceConnector.js';
export { DestinationConnector } from './channel/DestinationConnector.js';
export type { DestinationConnectorConfig } from './channel/DestinationConnector.js';
export { SourceBuffer } from './channel/SourceBuffer.js';
export { KeyedMutex } from './channel/KeyedMutex.js';
export { Statistics, STATISTIC_KEYS } from './channel/Statistics.js';
export type { SourceStatistics, StatisticKey } from './channel/Statistics.js';
export { TimeoutSweeper } from './channel/TimeoutSweeper.js';
export type { SweepTarget, TimeoutSweeperConfig } from './channel/TimeoutSweeper.js';

// Message framing
export {
  DELIMITER_PATTERN,
  findDelimiterOffsets,
  findFirstDelimiter,
  extractFrames,
  extractPendingFrame,
  splitAll,
} from './message/TimestampFramer.js';
export type { Frame, FrameExtraction } from './message/TimestampFramer.js';

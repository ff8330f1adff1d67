/**
 * ACARS DataType Module
 *
 * Split strategies and the pure classification functions that pick a bucket
 * key for each reassembled message.
 */

export {
  SplitStrategy,
  AcarsMessageType,
  MESSAGE_TYPE_MARKERS,
  DEFAULT_SPLIT_STRATEGY,
  isSplitStrategy,
  parseSplitStrategy,
} from './AcarsProperties.js';

export {
  extractMessageLabel,
  extractTailNumber,
  determineMessageType,
  containsKeyword,
  keywordMatchKey,
  keywordMissKey,
  classify,
  createClassifier,
} from './AcarsClassifier.js';
export type { MessageClassifier } from './AcarsClassifier.js';

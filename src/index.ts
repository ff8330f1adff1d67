/**
 * ACARS Splitter
 *
 * Library entry point. The command line lives in ./cli/index.ts.
 */

export * from './logging/index.js';
export * from './datatypes/acars/index.js';
export * from './donkey/index.js';
export * from './connectors/udp/index.js';
export * from './connectors/file/index.js';
export {
  SplitterError,
  ConfigurationError,
  DecodeError,
  WriteError,
  describeError,
  toError,
} from './util/errors.js';
export { Splitter } from './server/Splitter.js';
export type { SplitterOptions } from './server/Splitter.js';
export {
  DEFAULT_HOST,
  DEFAULT_BUFFER_TIMEOUT,
  SplitterConfigFileSchema,
  parseSplitterConfig,
  loadSplitterConfig,
  describeSplitterConfig,
} from './server/SplitterConfig.js';
export type { SplitterConfig } from './server/SplitterConfig.js';
export { splitLogFile, groupMessages } from './server/FileSplitter.js';
export type { FileSplitOptions, FileSplitResult, BucketSummary } from './server/FileSplitter.js';

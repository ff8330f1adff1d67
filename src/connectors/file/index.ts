/**
 * File Connector Module
 *
 * Destination connector writing classified messages to per-bucket text files.
 */

export {
  BUCKET_PATTERNS,
  DEFAULT_OUTPUT_DIRECTORY,
  getDefaultFileDispatcherProperties,
  sanitizeKey,
  generateOutputFilename,
  getBucketFilename,
} from './FileConnectorProperties.js';
export type { FileDispatcherProperties } from './FileConnectorProperties.js';

export { FileDispatcher } from './FileDispatcher.js';
export type { FileDispatcherConfig } from './FileDispatcher.js';

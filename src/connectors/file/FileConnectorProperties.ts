/**
 * Purpose: Configuration properties and bucket naming for the file destination
 *
 * Key behaviors:
 * - Bucket file name = strategy-specific pattern with the classification key
 *   substituted, or a single fallback name for unclassified messages
 * - Keys are sanitized so a bucket can never leave the output directory
 * - Messages in one file are separated by exactly one blank line
 */

import { SplitStrategy } from '../../datatypes/acars/AcarsProperties.js';

/**
 * File Dispatcher (Destination) Properties
 */
export interface FileDispatcherProperties {
  /** Output directory, created on start */
  directory: string;
  /** Strategy whose naming pattern applies */
  splitBy: SplitStrategy;
  /** File name used when a message has no key */
  fallbackFilename: string;
  /** Extension appended to every bucket name */
  fileExtension: string;
  /** Append to existing files (listen mode) or overwrite */
  outputAppend: boolean;
  /** Written between consecutive messages of one file */
  separator: string;
  /** Character encoding for written files */
  charsetEncoding: BufferEncoding;
}

/**
 * Bucket name patterns, `${key}` is the sanitized classification key.
 */
export const BUCKET_PATTERNS: Record<SplitStrategy, string> = {
  [SplitStrategy.LABEL]: 'acars_label_${key}',
  [SplitStrategy.TAIL]: 'acars_tail_${key}',
  [SplitStrategy.TYPE]: 'acars_type_${key}',
  [SplitStrategy.KEYWORD]: 'acars_${key}',
};

export const DEFAULT_OUTPUT_DIRECTORY = 'acars_split';

export function getDefaultFileDispatcherProperties(): FileDispatcherProperties {
  return {
    directory: DEFAULT_OUTPUT_DIRECTORY,
    splitBy: SplitStrategy.LABEL,
    fallbackFilename: 'acars_unclassified.txt',
    fileExtension: '.txt',
    outputAppend: true,
    separator: '\n\n',
    charsetEncoding: 'utf-8',
  };
}

/**
 * Replace anything outside [A-Za-z0-9._-] with "_" and neutralise "." / "..".
 */
export function sanitizeKey(key: string): string {
  const cleaned = key.replace(/[^A-Za-z0-9._-]/g, '_');
  return /^\.+$/.test(cleaned) ? cleaned.replace(/\./g, '_') : cleaned;
}

/**
 * Substitute `${name}` variables in a filename pattern.
 */
export function generateOutputFilename(
  pattern: string,
  variables: Record<string, string> = {}
): string {
  return pattern.replace(/\$\{([A-Za-z0-9_]+)\}/g, (match, name: string) => variables[name] ?? match);
}

/**
 * Bucket file name (no directory) for a classification key.
 */
export function getBucketFilename(
  key: string | null,
  properties: Pick<FileDispatcherProperties, 'splitBy' | 'fallbackFilename' | 'fileExtension'>
): string {
  if (key === null || key.length === 0) {
    return properties.fallbackFilename;
  }
  const base = generateOutputFilename(BUCKET_PATTERNS[properties.splitBy], { key: sanitizeKey(key) });
  return `${base}${properties.fileExtension}`;
}

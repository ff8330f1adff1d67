/**
 * Purpose: One-shot split of a saved ACARS log file
 *
 * Key behaviors:
 * - Every message is framed, the last one running to end of file
 * - Messages are grouped by classification key, then each bucket is written
 *   once (overwriting), messages joined by a blank line
 * - No timestamp header at all, or no message classifiable, writes nothing
 */

import * as fs from 'fs/promises';
import { splitAll } from '../donkey/message/TimestampFramer.js';
import { FileDispatcher } from '../connectors/file/FileDispatcher.js';
import { createClassifier } from '../datatypes/acars/AcarsClassifier.js';
import { SplitStrategy } from '../datatypes/acars/AcarsProperties.js';
import { ConfigurationError, describeError } from '../util/errors.js';
import { getLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';

export interface FileSplitOptions {
  outputDir: string;
  splitBy: SplitStrategy;
  keyword?: string;
  logger?: Logger;
}

export interface BucketSummary {
  key: string | null;
  filePath: string;
  messageCount: number;
}

export interface FileSplitResult {
  messageCount: number;
  buckets: BucketSummary[];
}

/**
 * Group messages by key, preserving first-seen key order and message order.
 */
export function groupMessages(
  messages: string[],
  classify: (message: string) => string | null
): Map<string | null, string[]> {
  const groups = new Map<string | null, string[]>();
  for (const message of messages) {
    const key = classify(message);
    const group = groups.get(key);
    if (group) {
      group.push(message);
    } else {
      groups.set(key, [message]);
    }
  }
  return groups;
}

/**
 * Split `inputPath` into bucket files under `options.outputDir`.
 *
 * @throws ConfigurationError when the input file cannot be read
 * @throws WriteError when a bucket cannot be written
 */
export async function splitLogFile(inputPath: string, options: FileSplitOptions): Promise<FileSplitResult> {
  const logger = options.logger ?? getLogger('file-splitter');
  const classifier = createClassifier(options.splitBy, options.keyword);

  let content: string;
  try {
    content = await fs.readFile(inputPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Input file '${inputPath}' not found or unreadable`, [describeError(error)], {
      cause: error,
    });
  }

  const messages = splitAll(content).map((frame) => frame.text);

  if (messages.length === 0) {
    logger.warn("Warning: Can't distinguish headers--bad formatting? Set JAERO to output format 3.");
    return { messageCount: 0, buckets: [] };
  }

  const groups = groupMessages(messages, (text) => classifier.classify(text));
  if (groups.size === 1 && groups.has(null)) {
    logger.warn(`Warning: No messages could be classified by ${options.splitBy}.`);
    return { messageCount: messages.length, buckets: [] };
  }

  const dispatcher = new FileDispatcher({
    properties: {
      directory: options.outputDir,
      splitBy: options.splitBy,
      outputAppend: false,
    },
  });
  await dispatcher.start();

  const buckets: BucketSummary[] = [];
  for (const [key, group] of groups) {
    const filePath = await dispatcher.writeBatch(key, group);
    logger.info(`Created ${filePath} with ${group.length} messages`);
    buckets.push({ key, filePath, messageCount: group.length });
  }
  await dispatcher.stop();

  return { messageCount: messages.length, buckets };
}

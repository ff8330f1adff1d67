/**
 * Purpose: File destination connector that appends each message to its bucket file
 *
 * Key behaviors:
 * - Output directory created (recursively) on start
 * - Buckets are created lazily on first write
 * - Append mode: separator written first only when the file already has content;
 *   no trailing separator after the message
 * - Overwrite mode (writeBatch): one file per bucket, messages joined by the separator
 * - Writes to one bucket file are serialized, whichever source they come from
 * - Any filesystem failure surfaces as WriteError naming the bucket path
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { DestinationConnector } from '../../donkey/channel/DestinationConnector.js';
import {
  FileDispatcherProperties,
  getDefaultFileDispatcherProperties,
  getBucketFilename,
} from './FileConnectorProperties.js';
import { KeyedMutex } from '../../donkey/channel/KeyedMutex.js';
import { WriteError, hasErrorCode } from '../../util/errors.js';
import { getLogger } from '../../logging/index.js';

const logger = getLogger('file-connector');

export interface FileDispatcherConfig {
  name?: string;
  properties?: Partial<FileDispatcherProperties>;
}

/**
 * Size of a file in bytes, 0 when it does not exist.
 */
async function fileSize(filePath: string): Promise<number> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return 0;
    }
    throw error;
  }
}

export class FileDispatcher extends DestinationConnector {
  private properties: FileDispatcherProperties;
  /** Held across the size check and the append of one message */
  private readonly fileLocks = new KeyedMutex<string>();

  constructor(config: FileDispatcherConfig = {}) {
    super({
      name: config.name ?? 'File Writer',
      transportName: 'File',
    });

    this.properties = {
      ...getDefaultFileDispatcherProperties(),
      ...config.properties,
    };
  }

  getProperties(): FileDispatcherProperties {
    return this.properties;
  }

  setProperties(properties: Partial<FileDispatcherProperties>): void {
    this.properties = { ...this.properties, ...properties };
  }

  /**
   * Full path of the bucket file for a key.
   */
  getOutputPath(key: string | null): string {
    return path.join(this.properties.directory, getBucketFilename(key, this.properties));
  }

  /**
   * Create the output directory.
   *
   * @throws WriteError when the directory cannot be created
   */
  async start(): Promise<void> {
    try {
      await fs.mkdir(this.properties.directory, { recursive: true });
    } catch (error) {
      throw new WriteError(this.properties.directory, error);
    }
    this.running = true;
    logger.debug(`Writing buckets to ${path.resolve(this.properties.directory)}`);
  }

  /**
   * Write one message to its bucket.
   *
   * @returns the bucket file path
   * @throws WriteError on any filesystem failure
   */
  async send(key: string | null, message: string): Promise<string> {
    const filePath = this.getOutputPath(key);
    const encoding = this.properties.charsetEncoding;

    await this.fileLocks.runExclusive(filePath, async () => {
      try {
        if (this.properties.outputAppend) {
          const hasContent = (await fileSize(filePath)) > 0;
          const data = hasContent ? this.properties.separator + message : message;
          await fs.appendFile(filePath, data, { encoding });
        } else {
          await fs.writeFile(filePath, message, { encoding });
        }
      } catch (error) {
        throw new WriteError(filePath, error);
      }
    });

    return filePath;
  }

  /**
   * Replace a bucket with `messages`, joined by the separator.
   *
   * @returns the bucket file path
   * @throws WriteError on any filesystem failure
   */
  async writeBatch(key: string | null, messages: string[]): Promise<string> {
    const filePath = this.getOutputPath(key);
    await this.fileLocks.runExclusive(filePath, async () => {
      try {
        await fs.writeFile(filePath, messages.join(this.properties.separator), {
          encoding: this.properties.charsetEncoding,
        });
      } catch (error) {
        throw new WriteError(filePath, error);
      }
    });
    return filePath;
  }
}

/**
 * Splitter Configuration
 *
 * Loads the JSON or YAML configuration file (js-yaml reads both), validates it
 * with zod and applies the downgrade rules:
 * - missing/empty `ports` is fatal (ConfigurationError)
 * - a `split_by` that is not exactly label, tail, type or keyword (wrong case,
 *   a number, an empty YAML value) falls back to `label` with a warning
 * - `split_by: keyword` without a keyword falls back to `label` with a warning
 */

import * as fs from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import {
  DEFAULT_SPLIT_STRATEGY,
  SplitStrategy,
  parseSplitStrategy,
} from '../datatypes/acars/AcarsProperties.js';
import { DEFAULT_OUTPUT_DIRECTORY } from '../connectors/file/FileConnectorProperties.js';
import { DEFAULT_MAX_BUFFER_SIZE } from '../donkey/channel/Channel.js';
import { ConfigurationError, describeError } from '../util/errors.js';
import { getLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_BUFFER_TIMEOUT = 60;
/** Largest sweep period, in seconds, that a Node.js timer can hold */
export const MAX_BUFFER_TIMEOUT = Math.floor((2 ** 31 - 1) / 1000);

const PortSchema = z.coerce.number().int().min(1).max(65535);

/**
 * On-disk shape. Keys are snake_case as written in the file.
 */
export const SplitterConfigFileSchema = z.object({
  host: z.string().min(1).default(DEFAULT_HOST),
  ports: z.array(PortSchema).optional(),
  output_dir: z.string().min(1).default(DEFAULT_OUTPUT_DIRECTORY),
  buffer_timeout: z.number().positive().max(MAX_BUFFER_TIMEOUT).default(DEFAULT_BUFFER_TIMEOUT),
  split_by: z.unknown().default(DEFAULT_SPLIT_STRATEGY),
  keyword: z.string().optional(),
  max_buffer_size: z.number().int().positive().default(DEFAULT_MAX_BUFFER_SIZE),
});

export type SplitterConfigFile = z.input<typeof SplitterConfigFileSchema>;

export interface SplitterConfig {
  host: string;
  /** Distinct ports, in file order */
  ports: number[];
  outputDir: string;
  /** Seconds */
  bufferTimeout: number;
  splitBy: SplitStrategy;
  /** Set when splitBy is KEYWORD */
  keyword?: string;
  /** Characters a source may buffer before the cap-and-reset policy applies */
  maxBufferSize: number;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate an already-parsed configuration object.
 *
 * @throws ConfigurationError when the object is invalid or lists no ports
 */
export function parseSplitterConfig(raw: unknown, logger: Logger = getLogger('config')): SplitterConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Configuration must be a key/value mapping');
  }

  const result = SplitterConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid configuration', formatIssues(result.error));
  }
  const file = result.data;

  if (!file.ports || file.ports.length === 0) {
    throw new ConfigurationError('No UDP ports specified in the configuration file');
  }

  let splitBy = parseSplitStrategy(file.split_by);
  if (splitBy === null) {
    logger.warn(`Warning: Invalid split_by value: '${String(file.split_by)}'. Using 'label' instead.`);
    splitBy = DEFAULT_SPLIT_STRATEGY;
  }

  const keyword = file.keyword && file.keyword.length > 0 ? file.keyword : undefined;
  if (splitBy === SplitStrategy.KEYWORD && keyword === undefined) {
    logger.warn("Warning: split_by is 'keyword' but no keyword specified. Using 'label' instead.");
    splitBy = DEFAULT_SPLIT_STRATEGY;
  }

  return {
    host: file.host,
    ports: [...new Set(file.ports)],
    outputDir: file.output_dir,
    bufferTimeout: file.buffer_timeout,
    splitBy,
    keyword: splitBy === SplitStrategy.KEYWORD ? keyword : undefined,
    maxBufferSize: file.max_buffer_size,
  };
}

/**
 * Read and validate a configuration file.
 *
 * @throws ConfigurationError when the file is missing, unparsable or invalid
 */
export function loadSplitterConfig(filePath: string, logger?: Logger): SplitterConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${filePath}`, [describeError(error)], {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = yaml.load(text, { filename: filePath });
  } catch (error) {
    throw new ConfigurationError(`Cannot parse configuration file ${filePath}`, [describeError(error)], {
      cause: error,
    });
  }

  return parseSplitterConfig(raw, logger);
}

/**
 * Human-readable summary printed at startup.
 */
export function describeSplitterConfig(config: SplitterConfig): string[] {
  const lines = [
    'ACARS Message Processor Configuration:',
    `  Host: ${config.host}`,
    `  Ports: ${config.ports.join(', ')}`,
    `  Output Directory: ${config.outputDir}`,
    `  Split by: ${config.splitBy}`,
  ];
  if (config.splitBy === SplitStrategy.KEYWORD && config.keyword !== undefined) {
    lines.push(`  Keyword: ${config.keyword}`);
  }
  lines.push(`  Buffer Timeout: ${config.bufferTimeout} seconds`);
  return lines;
}

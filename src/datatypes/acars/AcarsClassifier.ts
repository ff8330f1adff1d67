/**
 * Purpose: Extract a classification key from a reassembled ACARS message
 *
 * Key behaviors:
 * - classify() is pure: same text + strategy (+ keyword) always gives the same key
 * - label and tail may return null; type and keyword never do
 *
 * Header example (JAERO output format 3):
 *   00:16:25 18-03-25 UTC AES:E4920F GES:D0 2 .PT-ZNG ! 52 A
 */

import { AcarsMessageType, MESSAGE_TYPE_MARKERS, SplitStrategy } from './AcarsProperties.js';

const LABEL_PATTERN = /!\s+([A-Za-z0-9]{2})\s+[A-Za-z0-9]/;

const TAIL_PATTERN = /AES:[A-F0-9]+\s+GES:[A-Z0-9]+\s+\d+\s+(\.?[A-Za-z0-9-]+)/;

/**
 * Extract the two-character message label that follows the "!" marker.
 */
export function extractMessageLabel(message: string): string | null {
  const match = LABEL_PATTERN.exec(message);
  return match?.[1] ?? null;
}

/**
 * Extract the aircraft registration that follows the AES/GES/priority fields.
 * At most one leading dot is allowed and stripped; "..PTZNG" has no tail.
 */
export function extractTailNumber(message: string): string | null {
  const match = TAIL_PATTERN.exec(message);
  const raw = match?.[1];
  return raw ? raw.replace(/^\./, '') : null;
}

export function determineMessageType(message: string): AcarsMessageType {
  for (const [type, marker] of MESSAGE_TYPE_MARKERS) {
    if (message.includes(marker)) {
      return type;
    }
  }
  return AcarsMessageType.OTHER;
}

/**
 * Case-insensitive substring test.
 */
export function containsKeyword(message: string, keyword: string): boolean {
  return message.toLowerCase().includes(keyword.toLowerCase());
}

/**
 * Bucket keys produced by the keyword strategy.
 */
export function keywordMatchKey(keyword: string): string {
  return `containing_${keyword}`;
}

export function keywordMissKey(keyword: string): string {
  return `not_containing_${keyword}`;
}

/**
 * Compute the classification key for a message under a strategy.
 *
 * @param keyword - required for SplitStrategy.KEYWORD, ignored otherwise
 * @throws Error when the keyword strategy is used without a keyword
 */
export function classify(message: string, strategy: SplitStrategy, keyword?: string): string | null {
  switch (strategy) {
    case SplitStrategy.LABEL:
      return extractMessageLabel(message);
    case SplitStrategy.TAIL:
      return extractTailNumber(message);
    case SplitStrategy.TYPE:
      return determineMessageType(message);
    case SplitStrategy.KEYWORD:
      if (!keyword) {
        throw new Error('The keyword strategy requires a keyword');
      }
      return containsKeyword(message, keyword) ? keywordMatchKey(keyword) : keywordMissKey(keyword);
  }
}

/**
 * A classifier bound to one strategy, as used by the channel.
 */
export interface MessageClassifier {
  readonly strategy: SplitStrategy;
  readonly keyword?: string;
  classify(message: string): string | null;
}

export function createClassifier(strategy: SplitStrategy, keyword?: string): MessageClassifier {
  if (strategy === SplitStrategy.KEYWORD && !keyword) {
    throw new Error('The keyword strategy requires a keyword');
  }
  return {
    strategy,
    keyword,
    classify: (message: string) => classify(message, strategy, keyword),
  };
}

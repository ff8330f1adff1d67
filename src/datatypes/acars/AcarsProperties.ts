/**
 * Purpose: Split strategies and shared constants for ACARS log records
 *
 * Key behaviors:
 * - Four classification strategies: label, tail, type, keyword
 * - parseSplitStrategy takes only the exact lowercase names; callers decide the fallback
 */

/**
 * How reassembled messages are grouped into output buckets
 */
export enum SplitStrategy {
  /** Two-character ACARS label following the "!" marker */
  LABEL = 'label',
  /** Aircraft registration following the AES/GES header fields */
  TAIL = 'tail',
  /** CPDLC / ADS-C / MIAM / OTHER */
  TYPE = 'type',
  /** Whether the message contains one configured keyword */
  KEYWORD = 'keyword',
}

/**
 * Message types recognised by the `type` strategy, in priority order, with the
 * catch-all last.
 */
export enum AcarsMessageType {
  CPDLC = 'CPDLC',
  ADS_C = 'ADS-C',
  MIAM = 'MIAM',
  OTHER = 'OTHER',
}

/**
 * Marker substring searched for each message type, in priority order.
 */
export const MESSAGE_TYPE_MARKERS: ReadonlyArray<readonly [AcarsMessageType, string]> = [
  [AcarsMessageType.CPDLC, 'FANS-1/A CPDLC'],
  [AcarsMessageType.ADS_C, 'ADS-C'],
  [AcarsMessageType.MIAM, 'MIAM'],
];

export const DEFAULT_SPLIT_STRATEGY = SplitStrategy.LABEL;

export function isSplitStrategy(value: string): value is SplitStrategy {
  return Object.values<string>(SplitStrategy).includes(value);
}

/**
 * Parse a configured split strategy. Returns null for anything other than one
 * of the four names exactly as written (so 'TYPE', ' tail ' and 5 are null).
 */
export function parseSplitStrategy(value: unknown): SplitStrategy | null {
  return typeof value === 'string' && isSplitStrategy(value) ? value : null;
}

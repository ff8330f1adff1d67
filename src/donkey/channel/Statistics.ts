/**
 * Purpose: Per-source counters for the splitter channel
 *
 * Key behaviors:
 * - One counter set per port, created lazily
 * - get() returns a copy; callers cannot mutate the live counters
 * - getTotals() aggregates across all ports
 */

export interface SourceStatistics {
  /** Datagrams decoded and appended to the buffer */
  datagramsReceived: number;
  /** Datagrams dropped because they were not valid UTF-8 */
  decodeErrors: number;
  /** Messages written by ordinary (delimiter-pair) framing */
  framesEmitted: number;
  /** Messages force-flushed by the sweeper */
  timeoutFlushes: number;
  /** Buffers over the size cap, flushed when they held a header and discarded otherwise */
  bufferResets: number;
  /** Messages that could not be written to their bucket */
  writeErrors: number;
}

export type StatisticKey = keyof SourceStatistics;

export const STATISTIC_KEYS: readonly StatisticKey[] = [
  'datagramsReceived',
  'decodeErrors',
  'framesEmitted',
  'timeoutFlushes',
  'bufferResets',
  'writeErrors',
];

function emptyStatistics(): SourceStatistics {
  return {
    datagramsReceived: 0,
    decodeErrors: 0,
    framesEmitted: 0,
    timeoutFlushes: 0,
    bufferResets: 0,
    writeErrors: 0,
  };
}

export class Statistics {
  private stats = new Map<number, SourceStatistics>();

  private getOrCreate(port: number): SourceStatistics {
    let entry = this.stats.get(port);
    if (!entry) {
      entry = emptyStatistics();
      this.stats.set(port, entry);
    }
    return entry;
  }

  increment(port: number, key: StatisticKey, count: number = 1): void {
    this.getOrCreate(port)[key] += count;
  }

  get(port: number): SourceStatistics {
    return { ...(this.stats.get(port) ?? emptyStatistics()) };
  }

  getPorts(): number[] {
    return [...this.stats.keys()].sort((a, b) => a - b);
  }

  getTotals(): SourceStatistics {
    const totals = emptyStatistics();
    for (const entry of this.stats.values()) {
      for (const key of STATISTIC_KEYS) {
        totals[key] += entry[key];
      }
    }
    return totals;
  }
}

/**
 * Purpose: Single background loop that force-flushes idle sources
 *
 * Key behaviors:
 * - Wakes every `intervalMs`; each wake asks the target to sweep
 * - A wake that arrives while the previous sweep is still running is skipped
 * - The timer is unref'd so it never keeps the process alive on its own
 * - Sweep failures are logged; the loop keeps running
 */

import { getLogger } from '../../logging/index.js';
import type { Logger } from '../../logging/index.js';
import { toError } from '../../util/errors.js';

export interface SweepTarget {
  sweep(): Promise<number>;
}

export interface TimeoutSweeperConfig {
  target: SweepTarget;
  intervalMs: number;
  logger?: Logger;
}

export class TimeoutSweeper {
  private readonly target: SweepTarget;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private sweeping: Promise<number> | null = null;

  constructor(config: TimeoutSweeperConfig) {
    if (!(config.intervalMs > 0)) {
      throw new Error(`Sweep interval must be positive, got ${config.intervalMs}`);
    }
    this.target = config.target;
    this.intervalMs = config.intervalMs;
    this.logger = config.logger ?? getLogger('timeout-sweeper');
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref();
    this.logger.debug(`Sweeping idle sources every ${this.intervalMs} ms`);
  }

  /**
   * Cancel the timer and wait for a sweep already in progress.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.sweeping) {
      await this.sweeping;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getIntervalMs(): number {
    return this.intervalMs;
  }

  /**
   * Run one sweep now. Resolves to the number of sources flushed (0 when a
   * sweep was already in progress or failed).
   */
  async tick(): Promise<number> {
    if (this.sweeping) {
      return 0;
    }
    this.sweeping = this.runSweep();
    try {
      return await this.sweeping;
    } finally {
      this.sweeping = null;
    }
  }

  private async runSweep(): Promise<number> {
    try {
      const flushed = await this.target.sweep();
      if (flushed > 0) {
        this.logger.debug(`Flushed ${flushed} idle source(s)`);
      }
      return flushed;
    } catch (error) {
      this.logger.error('Timeout sweep failed', toError(error));
      return 0;
    }
  }
}

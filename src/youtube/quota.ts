/**
 * Daily YouTube Data API quota accounting.
 *
 * The API does not report remaining quota, so usage is counted locally and
 * persisted to a small JSON file that resets when the local date changes.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { format } from 'date-fns';

import { QuotaExceededError } from '../errors.js';
import { logger } from '../logger.js';

export const QUOTA_COSTS = {
  search: 100,
  playlistInsert: 50,
  playlistItemInsert: 50
} as const;

export const DEFAULT_DAILY_QUOTA = 10000;

interface QuotaFile {
  date: string;
  used: number;
}

export interface QuotaUsage {
  date: string;
  used: number;
  limit: number;
  remaining: number;
}

const isQuotaFile = (value: unknown): value is QuotaFile =>
  typeof value === 'object' &&
  value !== null &&
  'date' in value &&
  'used' in value &&
  typeof value.date === 'string' &&
  typeof value.used === 'number';

/**
 * Estimated cost of matching and inserting a setlist.
 * Assumes the first query for every uncached song succeeds.
 */
export const estimateRunCost = (songCount: number, cachedCount = 0): number => {
  const uncached = Math.max(songCount - cachedCount, 0);
  return (
    QUOTA_COSTS.playlistInsert +
    uncached * QUOTA_COSTS.search +
    songCount * QUOTA_COSTS.playlistItemInsert
  );
};

export class QuotaTracker {
  private state: QuotaFile;

  constructor(
    private readonly filePath: string | null,
    private readonly dailyLimit: number = DEFAULT_DAILY_QUOTA,
    private readonly now: () => Date = () => new Date()
  ) {
    this.state = this.load();
  }

  usage(): QuotaUsage {
    this.rollOver();
    return {
      date: this.state.date,
      used: this.state.used,
      limit: this.dailyLimit,
      remaining: this.remaining()
    };
  }

  remaining(): number {
    this.rollOver();
    return Math.max(this.dailyLimit - this.state.used, 0);
  }

  wouldExceed(units: number): boolean {
    return units > this.remaining();
  }

  assertAvailable(units: number, operation: string): void {
    if (this.wouldExceed(units)) {
      throw new QuotaExceededError(
        'youtube',
        `Daily YouTube quota exhausted before ${operation} (${this.state.used}/${this.dailyLimit} units used)`
      );
    }
  }

  charge(units: number): void {
    this.rollOver();
    this.state.used += units;
    this.persist();
  }

  /**
   * Check and charge in one synchronous step, so concurrent callers cannot
   * all pass the check before any of them is charged.
   */
  reserve(units: number, operation: string): void {
    this.assertAvailable(units, operation);
    this.charge(units);
  }

  /**
   * Give back units reserved for a request that never reached the API
   */
  release(units: number): void {
    this.rollOver();
    this.state.used = Math.max(this.state.used - units, 0);
    this.persist();
  }

  private today(): string {
    return format(this.now(), 'yyyy-MM-dd');
  }

  private rollOver(): void {
    const today = this.today();
    if (this.state.date !== today) {
      logger.debug({ previous: this.state.date, today }, 'quota day rolled over');
      this.state = { date: today, used: 0 };
    }
  }

  private load(): QuotaFile {
    const fresh = { date: this.today(), used: 0 };
    if (!this.filePath || !existsSync(this.filePath)) {
      return fresh;
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, 'utf8'));
      if (isQuotaFile(parsed) && parsed.date === fresh.date) {
        return { date: parsed.date, used: parsed.used };
      }
      return fresh;
    } catch (error) {
      logger.warn({ path: this.filePath, err: error }, 'quota file unreadable, starting from zero');
      return fresh;
    }
  }

  private persist(): void {
    if (!this.filePath) {
      return;
    }
    writeFileSync(this.filePath, JSON.stringify(this.state, null, 2), 'utf8');
  }
}

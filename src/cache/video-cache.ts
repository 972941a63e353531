import { existsSync, readFileSync, statSync, writeFileSync } from 'fs';
import { addDays, isAfter, isValid, parseISO, subDays } from 'date-fns';

import { logger } from '../logger.js';
import type { MatchResult } from '../matching/types.js';
import type { MatchCache } from '../playlist/assembler.js';
import type { SetlistSong } from '../setlist/types.js';

export const DEFAULT_CACHE_TTL_DAYS = 7;

export interface VideoCacheEntry {
  videoId: string;
  title: string;
  channel: string;
  /** ISO timestamp of when the match was stored */
  timestamp: string;
  searchQuery: string;
  confidence: 'exact' | 'fuzzy';
}

export interface VideoCacheStats {
  totalEntries: number;
  /** Entries stored within the last 24 hours */
  recentEntries: number;
  fileSize: number;
}

const isCacheEntry = (value: unknown): value is VideoCacheEntry => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const entry: Partial<Record<keyof VideoCacheEntry, unknown>> = value;
  return (
    typeof entry.videoId === 'string' &&
    typeof entry.title === 'string' &&
    typeof entry.channel === 'string' &&
    typeof entry.timestamp === 'string' &&
    typeof entry.searchQuery === 'string' &&
    (entry.confidence === 'exact' || entry.confidence === 'fuzzy')
  );
};

export const cacheKey = (songTitle: string, artist: string): string =>
  `${songTitle.toLowerCase().trim()}|${artist.toLowerCase().trim()}`;

/**
 * JSON-file cache of songs already matched to a video, so repeat runs
 * skip the 100-unit search calls.
 */
export class VideoCache implements MatchCache {
  private entries = new Map<string, VideoCacheEntry>();

  constructor(
    private readonly filePath: string,
    private readonly ttlDays: number = DEFAULT_CACHE_TTL_DAYS,
    private readonly now: () => Date = () => new Date()
  ) {
    this.load();
  }

  get size(): number {
    return this.entries.size;
  }

  get(songTitle: string, artist: string): VideoCacheEntry | null {
    const key = cacheKey(songTitle, artist);
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (this.isFresh(entry)) {
      return entry;
    }

    this.entries.delete(key);
    this.save();
    return null;
  }

  set(songTitle: string, artist: string, entry: Omit<VideoCacheEntry, 'timestamp'>): void {
    this.entries.set(cacheKey(songTitle, artist), {
      ...entry,
      timestamp: this.now().toISOString()
    });
    this.save();
  }

  has(songTitle: string, artist: string): boolean {
    return this.get(songTitle, artist) !== null;
  }

  lookup(song: SetlistSong): MatchResult | null {
    const entry = this.get(song.title, song.performingArtist);
    if (!entry) {
      return null;
    }
    return Object.freeze({
      song,
      videoId: entry.videoId,
      matchedQuery: entry.searchQuery,
      matchedTitle: entry.title,
      channelTitle: entry.channel,
      confidence: entry.confidence,
      fromCache: true
    });
  }

  remember(result: MatchResult): void {
    if (result.confidence === 'none' || !result.videoId) {
      return;
    }
    this.set(result.song.title, result.song.performingArtist, {
      videoId: result.videoId,
      title: result.matchedTitle ?? '',
      channel: result.channelTitle ?? '',
      searchQuery: result.matchedQuery ?? '',
      confidence: result.confidence
    });
  }

  /**
   * Drop expired entries, returning how many were removed
   */
  clearExpired(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (!this.isFresh(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      this.save();
      logger.info({ removed }, 'cleared expired video cache entries');
    }
    return removed;
  }

  clear(): void {
    const removed = this.entries.size;
    this.entries.clear();
    this.save();
    logger.info({ removed }, 'cleared video cache');
  }

  stats(): VideoCacheStats {
    const dayAgo = subDays(this.now(), 1);
    let recentEntries = 0;
    for (const entry of this.entries.values()) {
      const storedAt = parseISO(entry.timestamp);
      if (isValid(storedAt) && isAfter(storedAt, dayAgo)) {
        recentEntries++;
      }
    }

    return {
      totalEntries: this.entries.size,
      recentEntries,
      fileSize: existsSync(this.filePath) ? statSync(this.filePath).size : 0
    };
  }

  private isFresh(entry: VideoCacheEntry): boolean {
    const storedAt = parseISO(entry.timestamp);
    return isValid(storedAt) && isAfter(addDays(storedAt, this.ttlDays), this.now());
  }

  private load(): void {
    if (!existsSync(this.filePath)) {
      return;
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, 'utf8'));
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error('cache file is not a JSON object');
      }
      for (const [key, value] of Object.entries(parsed)) {
        if (isCacheEntry(value)) {
          this.entries.set(key, value);
        }
      }
      logger.debug({ path: this.filePath, entries: this.entries.size }, 'loaded video cache');
    } catch (error) {
      logger.warn({ path: this.filePath, err: error }, 'video cache unreadable, starting empty');
      this.entries.clear();
    }
  }

  private save(): void {
    const data = Object.fromEntries(this.entries);
    writeFileSync(this.filePath, JSON.stringify(data, null, 2), 'utf8');
  }
}

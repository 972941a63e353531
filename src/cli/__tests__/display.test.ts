import { describe, it, expect } from 'vitest';

import type { MatchResult } from '../../matching/types.js';
import type { AssemblyResult } from '../../playlist/types.js';
import {
  formatMatchLine,
  formatProgressLine,
  formatQuotaStatus,
  formatSetlistInfo,
  formatSummary,
  formatTracksTable
} from '../display.js';
import { createMockSetlist, createMockSong } from '../../__tests__/helpers/index.js';

const songA = createMockSong({ title: 'Song A', position: 1 });
const songB = createMockSong({ title: 'Song B', position: 2 });

const matched = (overrides: Partial<MatchResult> = {}): MatchResult => ({
  song: songA,
  videoId: 'vid-1',
  matchedQuery: 'Song A Test Band',
  confidence: 'exact',
  fromCache: false,
  ...overrides
});

const unmatched: MatchResult = { song: songB, confidence: 'none', fromCache: false };

const assembly = (overrides: Partial<AssemblyResult> = {}): AssemblyResult => ({
  spec: {
    title: 'Test Band - Test Hall (14-06-2024)',
    description: '',
    privacy: 'private',
    orderedVideoIds: ['vid-1']
  },
  matches: [matched(), unmatched],
  dryRun: false,
  ...overrides
});

describe('formatSetlistInfo', () => {
  it('lists artist, venue, date and track count', () => {
    expect(formatSetlistInfo(createMockSetlist(['Song A', 'Song B']))).toBe(
      [
        'Setlist Information',
        '  Artist: Test Band',
        '  Venue:  Test Hall, Springfield, IL',
        '  Date:   14-06-2024',
        '  Tracks: 2'
      ].join('\n')
    );
  });
});

describe('formatTracksTable', () => {
  it('aligns columns and notes covers', () => {
    const setlist = createMockSetlist(['Song A', { title: 'Borrowed Tune', originalArtist: 'Other Band' }]);

    expect(formatTracksTable(setlist).split('\n')).toEqual([
      '  #  Song           Artist      Notes',
      '  1  Song A         Test Band',
      '  2  Borrowed Tune  Other Band  Cover of Other Band'
    ]);
  });

  it('truncates long titles', () => {
    const setlist = createMockSetlist(['A'.repeat(50)]);

    expect(formatTracksTable(setlist).split('\n')[1]).toBe(`  1  ${'A'.repeat(39)}…  Test Band`);
  });
});

describe('formatMatchLine', () => {
  it('shows the watch URL on a dry run', () => {
    expect(formatMatchLine(matched(), true)).toBe('✓ [ 1] Song A -> https://www.youtube.com/watch?v=vid-1');
  });

  it('tags fuzzy and cached matches', () => {
    expect(formatMatchLine(matched({ confidence: 'fuzzy', fromCache: true }), false)).toBe(
      '✓ [ 1] Song A (fuzzy, cached)'
    );
  });

  it('marks songs without a match', () => {
    expect(formatMatchLine(unmatched, false)).toBe('✗ [ 2] Song B (no match found)');
  });
});

describe('formatProgressLine', () => {
  it('shows position, percent and ETA', () => {
    expect(
      formatProgressLine({ current: 1, total: 4, message: 'Searching for: Song B', percent: 25, eta: 30 })
    ).toBe('[1/4] 25% ETA 30s Searching for: Song B');
  });
});

describe('formatQuotaStatus', () => {
  it('combines quota usage and cache stats', () => {
    expect(
      formatQuotaStatus(
        { date: '2024-06-14', used: 1550, limit: 10000, remaining: 8450 },
        { totalEntries: 12, recentEntries: 3, fileSize: 2048 }
      )
    ).toBe(
      [
        'Quota Usage: 1550/10000 units used (8450 remaining today)',
        'Cache entries: 12 songs cached',
        'Recent cache entries: 3 in last 24h'
      ].join('\n')
    );
  });
});

describe('formatSummary', () => {
  it('reports a created playlist and the songs left out', () => {
    expect(formatSummary(assembly({ playlistId: 'PL-test' }))).toBe(
      [
        'Playlist created successfully!',
        'https://www.youtube.com/playlist?list=PL-test',
        'Added 1 out of 2 tracks',
        '',
        'Tracks not found:',
        '  • Song B'
      ].join('\n')
    );
  });

  it('reports a dry run with quota usage', () => {
    expect(
      formatSummary(assembly({ dryRun: true, matches: [matched()] }), {
        date: '2024-06-14',
        used: 100,
        limit: 10000,
        remaining: 9900
      })
    ).toBe(
      [
        'Dry run completed!',
        'Found matches for 1 out of 1 tracks',
        '',
        'Quota Usage: 100/10000 units used (9900 remaining today)'
      ].join('\n')
    );
  });

  it('explains when nothing matched', () => {
    const result = assembly({
      spec: { title: 'Test', description: '', privacy: 'private', orderedVideoIds: [] },
      matches: [unmatched]
    });

    expect(formatSummary(result).split('\n').slice(0, 2)).toEqual([
      'No playlist created: none of the tracks matched a video',
      'Matched 0 out of 1 tracks'
    ]);
  });
});

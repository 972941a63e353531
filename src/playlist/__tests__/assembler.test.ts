import { describe, it, expect, vi } from 'vitest';

import { InputError, QuotaExceededError } from '../../errors.js';
import type { ExternalSearchHit, MatchResult, QueryCandidate } from '../../matching/types.js';
import type { SetlistSong } from '../../setlist/types.js';
import {
  assemblePlaylist,
  buildPlaylistDescription,
  buildPlaylistTitle,
  type MatchCache,
  type PlaylistCollaborators
} from '../assembler.js';
import { createMockSetlist, createMockSong, hit } from '../../__tests__/helpers/index.js';

const unmatchable = new Set(['Song B']);

/** Every test title is "Song X"; each query echoes back as the top hit */
const fakeSearch = async (candidate: QueryCandidate): Promise<ExternalSearchHit[]> => {
  const title = candidate.text.slice(0, 6);
  if (unmatchable.has(title)) {
    return [];
  }
  return [hit(`vid-${title.slice(-1)}`, candidate.text)];
};

function collaborators() {
  return {
    search: vi.fn(fakeSearch),
    createPlaylist: vi.fn(async (): Promise<string> => 'PL-test'),
    addVideo: vi.fn(async (): Promise<void> => undefined)
  } satisfies PlaylistCollaborators;
}

describe('buildPlaylistTitle', () => {
  it('combines artist, venue and event date', () => {
    expect(buildPlaylistTitle(createMockSetlist(['Song A']))).toBe('Test Band - Test Hall (14-06-2024)');
  });

  it('shows a placeholder when the date is unknown', () => {
    expect(buildPlaylistTitle(createMockSetlist(['Song A'], { eventDate: undefined }))).toBe(
      'Test Band - Test Hall (Unknown Date)'
    );
  });
});

describe('buildPlaylistDescription', () => {
  it('names the show, the source and the track count', () => {
    expect(buildPlaylistDescription(createMockSetlist(['Song A', 'Song B']))).toBe(
      [
        'Setlist from Test Band at Test Hall, Springfield, IL on 14-06-2024',
        '',
        'Generated from: https://www.setlist.fm/setlist/test-band/2024/test-hall-springfield-usa-1bd6b5a8.html',
        'Source: setlist.fm',
        'Total tracks: 2'
      ].join('\n')
    );
  });
});

describe('assemblePlaylist', () => {
  it('inserts matched videos in setlist order and skips unmatched songs', async () => {
    const deps = collaborators();
    const setlist = createMockSetlist(['Song A', 'Song B', 'Song C']);

    const result = await assemblePlaylist(setlist, deps, { privacy: 'unlisted' });

    expect(result.playlistId).toBe('PL-test');
    expect(result.dryRun).toBe(false);
    expect(result.spec.orderedVideoIds).toEqual(['vid-A', 'vid-C']);
    expect(result.spec.privacy).toBe('unlisted');
    expect(result.matches.map(match => match.confidence)).toEqual(['exact', 'none', 'exact']);
    expect(deps.createPlaylist).toHaveBeenCalledTimes(1);
    expect(deps.createPlaylist).toHaveBeenCalledWith(result.spec);
    expect(deps.addVideo.mock.calls).toEqual([
      ['PL-test', 'vid-A', 0],
      ['PL-test', 'vid-C', 1]
    ]);
  });

  it('keeps repeated songs as repeated entries', async () => {
    const deps = collaborators();

    const result = await assemblePlaylist(createMockSetlist(['Song A', 'Song A']), deps, { privacy: 'private' });

    expect(result.spec.orderedVideoIds).toEqual(['vid-A', 'vid-A']);
    expect(deps.addVideo).toHaveBeenCalledTimes(2);
  });

  it('creates nothing on a dry run', async () => {
    const deps = collaborators();

    const result = await assemblePlaylist(createMockSetlist(['Song A', 'Song C']), deps, {
      privacy: 'private',
      dryRun: true
    });

    expect(result.dryRun).toBe(true);
    expect(result.playlistId).toBeUndefined();
    expect(result.spec.orderedVideoIds).toEqual(['vid-A', 'vid-C']);
    expect(deps.createPlaylist).not.toHaveBeenCalled();
    expect(deps.addVideo).not.toHaveBeenCalled();
  });

  it('creates no playlist when nothing matched', async () => {
    const deps = collaborators();

    const result = await assemblePlaylist(createMockSetlist(['Song B']), deps, { privacy: 'private' });

    expect(result.playlistId).toBeUndefined();
    expect(result.spec.orderedVideoIds).toEqual([]);
    expect(deps.createPlaylist).not.toHaveBeenCalled();
  });

  it('rejects a setlist without songs', async () => {
    const deps = collaborators();

    await expect(assemblePlaylist(createMockSetlist([]), deps, { privacy: 'private' })).rejects.toBeInstanceOf(InputError);
    expect(deps.search).not.toHaveBeenCalled();
  });

  it('aborts on a search failure before creating the playlist', async () => {
    const failure = new QuotaExceededError('youtube', 'quota gone');
    const deps = {
      ...collaborators(),
      search: vi.fn(async (candidate: QueryCandidate) => {
        if (candidate.text.startsWith('Song B')) {
          throw failure;
        }
        return fakeSearch(candidate);
      })
    };

    await expect(
      assemblePlaylist(createMockSetlist(['Song A', 'Song B', 'Song C']), deps, { privacy: 'private' })
    ).rejects.toBe(failure);
    expect(deps.createPlaylist).not.toHaveBeenCalled();
  });

  it('stops inserting at the first failed insert', async () => {
    const deps = {
      ...collaborators(),
      addVideo: vi.fn()
        .mockResolvedValueOnce(undefined)
        .mockRejectedValueOnce(new Error('insert failed'))
    };

    await expect(
      assemblePlaylist(createMockSetlist(['Song A', 'Song C', 'Song D']), deps, { privacy: 'private' })
    ).rejects.toThrow('insert failed');
    expect(deps.addVideo).toHaveBeenCalledTimes(2);
  });

  it('reports matches in setlist order even when searches finish out of order', async () => {
    const delays: Record<string, number> = { A: 30, C: 10, D: 0 };
    const deps = {
      ...collaborators(),
      search: vi.fn(async (candidate: QueryCandidate) => {
        await new Promise(resolve => setTimeout(resolve, delays[candidate.text.charAt(5)] ?? 0));
        return fakeSearch(candidate);
      })
    };
    const seen: Array<[string, number, number]> = [];

    const result = await assemblePlaylist(createMockSetlist(['Song A', 'Song C', 'Song D']), deps, {
      privacy: 'private',
      concurrency: 3,
      onMatch: (match, index, total) => seen.push([match.song.title, index, total])
    });

    expect(seen).toEqual([
      ['Song A', 0, 3],
      ['Song C', 1, 3],
      ['Song D', 2, 3]
    ]);
    expect(result.spec.orderedVideoIds).toEqual(['vid-A', 'vid-C', 'vid-D']);
  });

  it('follows song positions when the setlist is out of order', async () => {
    const deps = collaborators();
    const base = createMockSetlist([]);
    const setlist = {
      ...base,
      songs: [
        createMockSong({ title: 'Song C', position: 3 }),
        createMockSong({ title: 'Song A', position: 1 }),
        createMockSong({ title: 'Song D', position: 2 })
      ]
    };
    const seen: Array<[string, number, string | undefined]> = [];

    const result = await assemblePlaylist(setlist, deps, {
      privacy: 'private',
      onMatch: (match, index, _total, next) => seen.push([match.song.title, index, next?.title])
    });

    expect(seen).toEqual([
      ['Song A', 0, 'Song D'],
      ['Song D', 1, 'Song C'],
      ['Song C', 2, undefined]
    ]);
    expect(result.spec.orderedVideoIds).toEqual(['vid-A', 'vid-D', 'vid-C']);
    expect(deps.addVideo.mock.calls).toEqual([
      ['PL-test', 'vid-A', 0],
      ['PL-test', 'vid-D', 1],
      ['PL-test', 'vid-C', 2]
    ]);
  });

  it('uses cached matches without searching and remembers new ones', async () => {
    const cachedResult = (song: SetlistSong): MatchResult => ({
      song,
      videoId: 'vid-cached',
      confidence: 'exact',
      fromCache: true
    });
    const cache: MatchCache = {
      lookup: vi.fn((song: SetlistSong) => (song.title === 'Song A' ? cachedResult(song) : null)),
      remember: vi.fn()
    };
    const deps = { ...collaborators(), cache };

    const result = await assemblePlaylist(createMockSetlist(['Song A', 'Song B', 'Song C']), deps, {
      privacy: 'private'
    });

    expect(result.spec.orderedVideoIds).toEqual(['vid-cached', 'vid-C']);
    expect(result.matches[0].fromCache).toBe(true);
    expect(deps.search.mock.calls.some(([candidate]) => candidate.text.startsWith('Song A'))).toBe(false);
    expect(cache.remember).toHaveBeenCalledTimes(1);
    expect(cache.remember).toHaveBeenCalledWith(result.matches[2]);
  });
});

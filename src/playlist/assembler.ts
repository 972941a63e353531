import pLimit from 'p-limit';

import { InputError } from '../errors.js';
import { logger } from '../logger.js';
import { selectMatch } from '../matching/match-selector.js';
import { generateQueries } from '../matching/query-generator.js';
import type { MatchResult, SearchFn } from '../matching/types.js';
import { formatEventDate } from '../setlist/parser.js';
import type { Setlist, SetlistSong } from '../setlist/types.js';
import type { AssemblyResult, PlaylistSpec, PrivacyStatus } from './types.js';

/**
 * Lookup of earlier matches, consulted before any search is issued
 */
export interface MatchCache {
  lookup(song: SetlistSong): MatchResult | null;
  remember(result: MatchResult): void;
}

export interface PlaylistCollaborators {
  search: SearchFn;
  createPlaylist(spec: PlaylistSpec): Promise<string>;
  addVideo(playlistId: string, videoId: string, position: number): Promise<void>;
  cache?: MatchCache;
}

export interface AssembleOptions {
  privacy: PrivacyStatus;
  dryRun?: boolean;
  /** Songs searched at once; results are still ordered by setlist position */
  concurrency?: number;
  /** Called in position order; `next` is the song matched after this one */
  onMatch?: (result: MatchResult, index: number, total: number, next?: SetlistSong) => void;
}

type SongOutcome =
  | { ok: true; result: MatchResult }
  | { ok: false; error: unknown };

export const buildPlaylistTitle = (setlist: Setlist): string =>
  `${setlist.artistName} - ${setlist.venueName} (${formatEventDate(setlist.eventDate)})`;

export const buildPlaylistDescription = (setlist: Setlist): string => {
  const date = formatEventDate(setlist.eventDate);
  return [
    `Setlist from ${setlist.artistName} at ${setlist.venueName}, ${setlist.cityName} on ${date}`,
    '',
    `Generated from: ${setlist.sourceUrl}`,
    'Source: setlist.fm',
    `Total tracks: ${setlist.songs.length}`
  ].join('\n');
};

export const buildPlaylistSpec = (
  setlist: Setlist,
  matches: readonly MatchResult[],
  privacy: PrivacyStatus
): PlaylistSpec => {
  const orderedVideoIds: string[] = [];
  for (const match of matches) {
    if (match.confidence !== 'none' && match.videoId) {
      orderedVideoIds.push(match.videoId);
    }
  }

  return Object.freeze({
    title: buildPlaylistTitle(setlist),
    description: buildPlaylistDescription(setlist),
    privacy,
    orderedVideoIds: Object.freeze(orderedVideoIds)
  });
};

const matchSong = async (song: SetlistSong, collaborators: PlaylistCollaborators): Promise<MatchResult> => {
  const cached = collaborators.cache?.lookup(song);
  if (cached) {
    logger.debug({ position: song.position, title: song.title, videoId: cached.videoId }, 'using cached match');
    return cached;
  }

  const result = await selectMatch(song, generateQueries(song), collaborators.search);
  if (result.confidence !== 'none') {
    collaborators.cache?.remember(result);
  }
  return result;
};

/**
 * Match every song of a setlist and build the playlist from the matches.
 *
 * Songs without a match are left out. Any collaborator failure stops the
 * run at that point; videos inserted before it stay in the playlist.
 */
export const assemblePlaylist = async (
  setlist: Setlist,
  collaborators: PlaylistCollaborators,
  options: AssembleOptions
): Promise<AssemblyResult> => {
  const songs = [...setlist.songs].sort((a, b) => a.position - b.position);
  if (songs.length === 0) {
    throw new InputError('setlist contains no songs');
  }

  const dryRun = options.dryRun ?? false;
  const limit = pLimit(Math.max(1, Math.floor(options.concurrency ?? 1)));

  logger.info(
    { setlistId: setlist.setlistId, songs: songs.length, dryRun, concurrency: limit.concurrency },
    'matching setlist songs'
  );

  const pending = songs.map(song =>
    limit(async (): Promise<SongOutcome> => {
      try {
        return { ok: true, result: await matchSong(song, collaborators) };
      } catch (error) {
        return { ok: false, error };
      }
    })
  );

  const matches: MatchResult[] = [];
  for (let index = 0; index < pending.length; index++) {
    const outcome = await pending[index];
    if (!outcome.ok) {
      limit.clearQueue();
      throw outcome.error;
    }
    matches.push(outcome.result);
    options.onMatch?.(outcome.result, index, songs.length, songs[index + 1]);
  }

  const spec = buildPlaylistSpec(setlist, matches, options.privacy);
  logger.info(
    { matched: spec.orderedVideoIds.length, unmatched: matches.length - spec.orderedVideoIds.length },
    'matching finished'
  );

  if (dryRun || spec.orderedVideoIds.length === 0) {
    return { spec, matches, dryRun };
  }

  const playlistId = await collaborators.createPlaylist(spec);
  for (let position = 0; position < spec.orderedVideoIds.length; position++) {
    await collaborators.addVideo(playlistId, spec.orderedVideoIds[position], position);
  }

  return { spec, matches, playlistId, dryRun };
};

import { stringSimilarity } from 'string-similarity-js';

import { logger } from '../logger.js';
import type { SetlistSong } from '../setlist/types.js';
import type { MatchConfidence, MatchResult, QueryCandidate, SearchFn } from './types.js';

export const normalizeTitle = (str: string): string => {
  return str
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '') // Remove punctuation
    .replace(/\s+/g, ' ') // Normalize whitespace
    .trim();
};

export const classifyHit = (songTitle: string, hitTitle: string): MatchConfidence => {
  const needle = normalizeTitle(songTitle);
  if (!needle) {
    return 'fuzzy';
  }
  return normalizeTitle(hitTitle).includes(needle) ? 'exact' : 'fuzzy';
};

/**
 * Pick a video for a song.
 *
 * Queries run in rank order and the first one that returns anything decides:
 * only its top hit is judged. Search failures propagate untouched.
 */
export const selectMatch = async (
  song: SetlistSong,
  candidates: readonly QueryCandidate[],
  search: SearchFn
): Promise<MatchResult> => {
  const ordered = [...candidates].sort((a, b) => a.rank - b.rank);

  for (const candidate of ordered) {
    const hits = await search(candidate);
    if (hits.length === 0) {
      logger.debug({ query: candidate.text, rank: candidate.rank }, 'no results for query');
      continue;
    }

    const top = hits[0];
    const confidence = classifyHit(song.title, top.title);
    const titleSimilarity = stringSimilarity(normalizeTitle(song.title), normalizeTitle(top.title));

    logger.debug(
      {
        song: `${song.performingArtist} - ${song.title}`,
        query: candidate.text,
        videoId: top.videoId,
        videoTitle: top.title,
        confidence,
        titleSimilarity: titleSimilarity.toFixed(3)
      },
      'selected top hit'
    );

    return Object.freeze({
      song,
      videoId: top.videoId,
      matchedQuery: candidate.text,
      matchedTitle: top.title,
      channelTitle: top.channelTitle,
      confidence,
      titleSimilarity,
      fromCache: false
    });
  }

  return Object.freeze({ song, confidence: 'none', fromCache: false });
};

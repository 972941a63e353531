import type { SetlistSong } from '../setlist/types.js';
import type { QueryCandidate, QuerySource } from './types.js';

const collapseWhitespace = (str: string): string => str.trim().replace(/\s+/g, ' ');

// Variant templates, tried in this order for every artist
const VARIANTS: Array<(title: string, artist: string) => string> = [
  (title, artist) => `${title} ${artist}`,
  (title, artist) => `${title} - ${artist}`,
  (title, artist) => `${title} ${artist} official`,
  (title, artist) => `${title} ${artist} official audio`
];

const joinParts = (parts: string[]): string => parts.filter(part => part.length > 0).join(' ');

const FALLBACK_SUFFIXES = ['', '', 'official', 'official audio'];

const buildVariant = (index: number, title: string, artist: string): string => {
  if (title && artist) {
    return VARIANTS[index](title, artist);
  }
  // Blank parts would leave dangling separators behind
  const base = joinParts([title, artist]);
  return base ? joinParts([base, FALLBACK_SUFFIXES[index]]) : '';
};

/**
 * Build the ranked search queries for a song.
 *
 * Queries for a cover's original artist all rank ahead of the performing
 * artist's. Duplicates (case-insensitive) keep their first rank.
 */
export const generateQueries = (song: SetlistSong): QueryCandidate[] => {
  const title = collapseWhitespace(song.title);
  const performing = collapseWhitespace(song.performingArtist);
  const original = song.originalArtist ? collapseWhitespace(song.originalArtist) : '';

  const artists: Array<{ artist: string; source: QuerySource }> = [];
  if (original) {
    artists.push({ artist: original, source: 'original' });
  }
  artists.push({ artist: performing, source: 'performing' });

  const seen = new Set<string>();
  const candidates: QueryCandidate[] = [];

  for (const { artist, source } of artists) {
    for (let index = 0; index < VARIANTS.length; index++) {
      const text = buildVariant(index, title, artist);
      const key = text.toLowerCase();
      if (!text || seen.has(key)) {
        continue;
      }
      seen.add(key);
      candidates.push({ text, rank: candidates.length, artist, source });
    }
  }

  return candidates;
};

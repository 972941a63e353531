import type { SetlistSong } from '../setlist/types.js';

export type QuerySource = 'original' | 'performing';

export interface QueryCandidate {
  readonly text: string;
  /** 0-based; lower ranks are searched first */
  readonly rank: number;
  readonly artist: string;
  readonly source: QuerySource;
}

export interface ExternalSearchHit {
  readonly videoId: string;
  readonly title: string;
  readonly channelTitle: string;
}

export type SearchFn = (candidate: QueryCandidate) => Promise<ExternalSearchHit[]>;

export type MatchConfidence = 'exact' | 'fuzzy' | 'none';

export interface MatchResult {
  readonly song: SetlistSong;
  readonly videoId?: string;
  readonly matchedQuery?: string;
  readonly matchedTitle?: string;
  readonly channelTitle?: string;
  readonly confidence: MatchConfidence;
  /** Dice similarity of normalized titles, informational only */
  readonly titleSimilarity?: number;
  readonly fromCache: boolean;
}

import type { MatchResult } from '../matching/types.js';

export const PRIVACY_STATUSES = ['private', 'unlisted', 'public'] as const;

export type PrivacyStatus = (typeof PRIVACY_STATUSES)[number];

export const isPrivacyStatus = (value: string): value is PrivacyStatus =>
  PRIVACY_STATUSES.some(status => status === value);

export interface PlaylistSpec {
  readonly title: string;
  readonly description: string;
  readonly privacy: PrivacyStatus;
  readonly orderedVideoIds: readonly string[];
}

export interface AssemblyResult {
  readonly spec: PlaylistSpec;
  /** One entry per setlist song, in setlist order */
  readonly matches: readonly MatchResult[];
  readonly playlistId?: string;
  readonly dryRun: boolean;
}

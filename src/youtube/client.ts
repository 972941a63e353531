import type { OAuth2Client } from 'google-auth-library';
import { google, type youtube_v3 } from 'googleapis';

import {
  AuthError,
  NetworkError,
  QuotaExceededError,
  UpstreamError,
  isUpstreamError
} from '../errors.js';
import { logger } from '../logger.js';
import type { ExternalSearchHit } from '../matching/types.js';
import type { PlaylistSpec } from '../playlist/types.js';
import { QUOTA_COSTS, type QuotaTracker } from './quota.js';

const QUOTA_REASONS = new Set(['quotaExceeded', 'dailyLimitExceeded', 'rateLimitExceeded', 'userRateLimitExceeded']);

// google-auth-library fails locally, without an HTTP response, when it has no usable token
const LOCAL_AUTH_FAILURE = /no (access|refresh) token|refresh handler|invalid_grant/i;

export interface YouTubeClientOptions {
  maxResults?: number;
  regionCode?: string;
  quota?: QuotaTracker;
}

interface HttpFailure {
  status?: number;
  reasons: string[];
  message: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Pull the HTTP status and API error reasons out of a gaxios failure
 */
const describeFailure = (error: unknown): HttpFailure => {
  const message = error instanceof Error ? error.message : String(error);
  if (!isRecord(error) || !isRecord(error.response)) {
    return { reasons: [], message };
  }

  const status = typeof error.response.status === 'number' ? error.response.status : undefined;
  const reasons: string[] = [];
  const data = error.response.data;
  if (isRecord(data) && isRecord(data.error) && Array.isArray(data.error.errors)) {
    for (const item of data.error.errors) {
      if (isRecord(item) && typeof item.reason === 'string') {
        reasons.push(item.reason);
      }
    }
  }
  // Token endpoint failures carry the OAuth error code as a plain string
  if (isRecord(data) && typeof data.error === 'string') {
    reasons.push(data.error);
  }

  return { status, reasons, message };
};

export const toYouTubeError = (error: unknown, operation: string): UpstreamError => {
  if (isUpstreamError(error)) {
    return error;
  }

  const { status, reasons, message } = describeFailure(error);
  const options = { status, cause: error };

  if (status === undefined && LOCAL_AUTH_FAILURE.test(message)) {
    return new AuthError('youtube', `YouTube credentials are missing or expired while ${operation}: ${message}`, options);
  }
  if (status === undefined) {
    return new NetworkError('youtube', `YouTube request failed while ${operation}: ${message}`, options);
  }
  if (status === 403 && reasons.some(reason => QUOTA_REASONS.has(reason))) {
    return new QuotaExceededError('youtube', `YouTube quota exceeded while ${operation}`, options);
  }
  if (reasons.includes('invalid_grant')) {
    return new AuthError('youtube', `Stored YouTube token was revoked or expired while ${operation}`, options);
  }
  if (status === 401 || status === 403) {
    return new AuthError('youtube', `YouTube rejected the credentials while ${operation}: ${message}`, options);
  }
  return new UpstreamError('youtube', `YouTube returned HTTP ${status} while ${operation}: ${message}`, options);
};

export function makeYouTube(auth: OAuth2Client, timeoutMs = 30000): youtube_v3.Youtube {
  return google.youtube({ version: 'v3', auth, timeout: timeoutMs });
}

export const playlistUrl = (playlistId: string): string =>
  `https://www.youtube.com/playlist?list=${playlistId}`;

export const videoUrl = (videoId: string): string =>
  `https://www.youtube.com/watch?v=${videoId}`;

/**
 * Thin wrapper over the YouTube Data API v3 resources the CLI needs
 */
export class YouTubeClient {
  private readonly maxResults: number;
  private readonly regionCode?: string;
  private readonly quota?: QuotaTracker;

  constructor(
    private readonly youtube: youtube_v3.Youtube,
    options: YouTubeClientOptions = {}
  ) {
    this.maxResults = options.maxResults ?? 5;
    this.regionCode = options.regionCode || undefined;
    this.quota = options.quota;
  }

  /**
   * Run an API call with its quota reserved up front. Units are given back
   * only when the request failed without an HTTP response.
   */
  private async metered<T>(units: number, operation: string, call: () => Promise<T>): Promise<T> {
    this.quota?.reserve(units, operation);
    try {
      return await call();
    } catch (error) {
      const mapped = toYouTubeError(error, operation);
      if (mapped instanceof NetworkError) {
        this.quota?.release(units);
      }
      throw mapped;
    }
  }

  async search(query: string): Promise<ExternalSearchHit[]> {
    return this.metered(QUOTA_COSTS.search, `searching for "${query}"`, async () => {
      const { data } = await this.youtube.search.list({
        part: ['snippet'],
        q: query,
        type: ['video'],
        order: 'relevance',
        maxResults: this.maxResults,
        regionCode: this.regionCode
      });

      const hits: ExternalSearchHit[] = [];
      for (const item of data.items ?? []) {
        const videoId = item.id?.videoId;
        if (!videoId) {
          continue;
        }
        hits.push({
          videoId,
          title: item.snippet?.title ?? '',
          channelTitle: item.snippet?.channelTitle ?? ''
        });
      }

      logger.debug({ query, results: hits.length }, 'youtube search completed');
      return hits;
    });
  }

  async createPlaylist(spec: PlaylistSpec): Promise<string> {
    const operation = `creating playlist "${spec.title}"`;
    return this.metered(QUOTA_COSTS.playlistInsert, operation, async () => {
      const { data } = await this.youtube.playlists.insert({
        part: ['snippet', 'status'],
        requestBody: {
          snippet: {
            title: spec.title,
            description: spec.description
          },
          status: {
            privacyStatus: spec.privacy
          }
        }
      });

      if (!data.id) {
        throw new UpstreamError('youtube', `YouTube did not return an id while ${operation}`);
      }

      logger.info({ playlistId: data.id, title: spec.title, privacy: spec.privacy }, 'created youtube playlist');
      return data.id;
    });
  }

  async addVideo(playlistId: string, videoId: string, position: number): Promise<void> {
    return this.metered(QUOTA_COSTS.playlistItemInsert, `adding video ${videoId} to playlist`, async () => {
      await this.youtube.playlistItems.insert({
        part: ['snippet'],
        requestBody: {
          snippet: {
            playlistId,
            position,
            resourceId: {
              kind: 'youtube#video',
              videoId
            }
          }
        }
      });
      logger.debug({ playlistId, videoId, position }, 'added video to playlist');
    });
  }
}

import got, { HTTPError } from 'got';

import {
  AuthError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  UpstreamError,
  isUpstreamError
} from '../errors.js';
import { logger } from '../logger.js';
import { parseSetlistResponse } from './parser.js';
import type { Setlist, SetlistFmSetlist } from './types.js';
import { parseSetlistUrl } from './url.js';

export const SETLISTFM_API_BASE = 'https://api.setlist.fm/rest/1.0';

const isSetlistPayload = (value: unknown): value is SetlistFmSetlist =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const errorForStatus = (statusCode: number, cause: unknown): UpstreamError => {
  if (statusCode === 404) {
    return new NotFoundError('setlistfm', 'Setlist not found. Check the URL and try again.', { cause });
  }
  if (statusCode === 401 || statusCode === 403) {
    return new AuthError('setlistfm', 'setlist.fm rejected the API key. Check SETLISTFM_API_KEY.', { status: statusCode, cause });
  }
  if (statusCode === 429) {
    return new RateLimitError('setlistfm', 'setlist.fm rate limit exceeded. Try again later.', { cause });
  }
  return new UpstreamError('setlistfm', `setlist.fm request failed with HTTP ${statusCode}`, { status: statusCode, cause });
};

export interface SetlistFmClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  retryLimit?: number;
}

export class SetlistFmClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retryLimit: number;

  constructor(options: SetlistFmClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? SETLISTFM_API_BASE).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.retryLimit = options.retryLimit ?? 2;
  }

  /**
   * Resolve a setlist.fm page URL into a parsed Setlist
   */
  async fetchSetlist(url: string): Promise<Setlist> {
    const setlistId = parseSetlistUrl(url);
    const data = await this.getSetlist(setlistId);
    return parseSetlistResponse(data, url);
  }

  /**
   * Raw setlist payload by id
   */
  async getSetlist(setlistId: string): Promise<SetlistFmSetlist> {
    if (!this.apiKey) {
      throw new AuthError(
        'setlistfm',
        'SETLISTFM_API_KEY is not set. Request a key at https://www.setlist.fm/settings/api'
      );
    }

    const endpoint = `${this.baseUrl}/setlist/${encodeURIComponent(setlistId)}`;

    try {
      const response = await got.get<unknown>(endpoint, {
        headers: {
          Accept: 'application/json',
          'Accept-Language': 'en',
          'x-api-key': this.apiKey,
          'User-Agent': 'setlist-to-playlist/1.0'
        },
        responseType: 'json',
        timeout: {
          request: this.timeoutMs
        },
        retry: {
          limit: this.retryLimit,
          methods: ['GET']
        }
      });

      if (!isSetlistPayload(response.body)) {
        throw new UpstreamError('setlistfm', 'setlist.fm returned an empty or malformed setlist', {
          status: response.statusCode
        });
      }

      logger.debug({ setlistId, statusCode: response.statusCode }, 'fetched setlist');
      return response.body;
    } catch (error) {
      if (isUpstreamError(error)) {
        throw error;
      }
      if (error instanceof HTTPError) {
        throw errorForStatus(error.response.statusCode, error);
      }
      const errorMsg = error instanceof Error ? error.message : String(error);
      logger.warn({ setlistId, error: errorMsg }, 'setlist.fm request failed');
      throw new NetworkError('setlistfm', `Failed to fetch setlist data: ${errorMsg}`, { cause: error });
    }
  }
}

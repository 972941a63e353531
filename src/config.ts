import { cleanEnv, num, str, url } from 'envalid';

export const APP_ENV = cleanEnv(process.env, {
  // setlist.fm
  SETLISTFM_API_KEY: str({ default: '', desc: 'setlist.fm API key (request one at https://www.setlist.fm/settings/api)' }),
  SETLISTFM_API_BASE: url({ default: 'https://api.setlist.fm/rest/1.0', desc: 'Base URL of the setlist.fm REST API' }),
  SETLISTFM_TIMEOUT: num({ default: 30000, desc: 'setlist.fm request timeout in milliseconds' }),
  SETLISTFM_RETRY_LIMIT: num({ default: 2, desc: 'Retries for setlist.fm requests that time out, fail to connect or answer 408, 429 or 5xx' }),
  // YouTube Data API
  YOUTUBE_REGION_CODE: str({ default: 'US', desc: 'Region code passed to YouTube search (empty to disable)' }),
  YOUTUBE_SEARCH_RESULTS: num({ default: 5, desc: 'Results requested per YouTube search' }),
  YOUTUBE_DAILY_QUOTA: num({ default: 10000, desc: 'Daily YouTube Data API quota in units' }),
  YOUTUBE_TIMEOUT: num({ default: 30000, desc: 'YouTube API request timeout in milliseconds' }),
  // Playlist defaults
  DEFAULT_PRIVACY: str({ choices: ['private', 'unlisted', 'public'], default: 'private', desc: 'Privacy of created playlists' }),
  // OAuth
  GOOGLE_CLIENT_SECRET_FILE: str({ default: 'client_secret.json', desc: 'OAuth client JSON downloaded from Google Cloud Console' }),
  YOUTUBE_TOKEN_FILE: str({ default: 'youtube_token.json', desc: 'Where the OAuth token is stored between runs' }),
  OAUTH_CALLBACK_PORT: num({ default: 0, desc: 'Loopback port for the OAuth consent redirect (0 = any free port)' }),
  // Local state
  VIDEO_CACHE_FILE: str({ default: 'video_cache.json', desc: 'Cache of previously matched videos' }),
  VIDEO_CACHE_TTL_DAYS: num({ default: 7, desc: 'Days a cached match stays valid' }),
  QUOTA_FILE: str({ default: 'quota_usage.json', desc: 'Daily quota accounting file' }),
  // Matching
  SEARCH_CONCURRENCY: num({ default: 1, desc: 'Songs searched in parallel (playlist order is always preserved)' }),
  // Logging
  LOG_LEVEL: str({ choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'], default: 'warn', desc: 'pino log level (logs go to stderr)' })
});

export type AppEnv = typeof APP_ENV;

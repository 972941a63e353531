#!/usr/bin/env node
/**
 * setlist-to-playlist: turn a setlist.fm setlist into a YouTube Music playlist
 */

import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { Command, Option } from 'commander';

import { VideoCache } from './cache/video-cache.js';
import { formatProgressLine } from './cli/display.js';
import { run, type RunOptions, type StatusLine } from './cli/run.js';
import { APP_ENV } from './config.js';
import { logger } from './logger.js';
import { PRIVACY_STATUSES } from './playlist/types.js';
import { SetlistFmClient } from './setlist/client.js';
import { FileTokenStore, authorizeYouTube } from './youtube/auth.js';
import { YouTubeClient, makeYouTube } from './youtube/client.js';
import { QuotaTracker } from './youtube/quota.js';

const examples = `
Examples:
  setlist-to-playlist https://www.setlist.fm/setlist/artist/2025/venue-12345678.html
  setlist-to-playlist --privacy unlisted --dry-run https://www.setlist.fm/setlist/...`;

const program = new Command()
  .name('setlist-to-playlist')
  .description('Convert a setlist.fm setlist to a YouTube Music playlist')
  .argument('[url]', 'setlist.fm URL for the setlist to convert')
  .addOption(
    new Option('--privacy <status>', 'playlist privacy setting')
      .choices(PRIVACY_STATUSES)
      .default(APP_ENV.DEFAULT_PRIVACY)
  )
  .option('--dry-run', 'preview matches without creating a playlist')
  .option('--show-tracks', 'display the track list before processing')
  .option('--clear-cache', 'clear the video cache before processing')
  .option('--quota-status', 'show current quota usage and cache status')
  .addHelpText('after', examples);

// Progress is drawn in place on stderr, only when it is a terminal
const terminalStatus: StatusLine = {
  render: update => {
    if (process.stderr.isTTY) {
      process.stderr.write(`\r\x1b[2K${formatProgressLine(update)}`);
    }
  },
  clear: () => {
    if (process.stderr.isTTY) {
      process.stderr.write('\r\x1b[2K');
    }
  }
};

const confirm = async (question: string): Promise<boolean> => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = (await rl.question(question)).trim().toLowerCase();
    return answer !== 'n' && answer !== 'no';
  } finally {
    rl.close();
  }
};

async function main(): Promise<void> {
  process.on('SIGINT', () => {
    terminalStatus.clear();
    console.log('\nCancelled by user.');
    process.exit(1);
  });

  program.parse();
  const [url] = program.processedArgs;
  const options = program.opts<RunOptions>();

  const quota = new QuotaTracker(APP_ENV.QUOTA_FILE, APP_ENV.YOUTUBE_DAILY_QUOTA);
  const setlistClient = new SetlistFmClient({
    apiKey: APP_ENV.SETLISTFM_API_KEY,
    baseUrl: APP_ENV.SETLISTFM_API_BASE,
    timeoutMs: APP_ENV.SETLISTFM_TIMEOUT,
    retryLimit: APP_ENV.SETLISTFM_RETRY_LIMIT
  });

  process.exitCode = await run(typeof url === 'string' ? url : undefined, options, {
    quota,
    cache: new VideoCache(APP_ENV.VIDEO_CACHE_FILE, APP_ENV.VIDEO_CACHE_TTL_DAYS),
    fetchSetlist: setlistUrl => setlistClient.fetchSetlist(setlistUrl),
    connectYouTube: async () => {
      const auth = await authorizeYouTube({
        clientSecretFile: APP_ENV.GOOGLE_CLIENT_SECRET_FILE,
        tokenStore: new FileTokenStore(APP_ENV.YOUTUBE_TOKEN_FILE),
        port: APP_ENV.OAUTH_CALLBACK_PORT,
        onAuthUrl: authUrl => console.log(`\nAuthorize access to YouTube in your browser:\n${authUrl}\n`)
      });
      return new YouTubeClient(makeYouTube(auth, APP_ENV.YOUTUBE_TIMEOUT), {
        maxResults: APP_ENV.YOUTUBE_SEARCH_RESULTS,
        regionCode: APP_ENV.YOUTUBE_REGION_CODE,
        quota
      });
    },
    confirm,
    concurrency: APP_ENV.SEARCH_CONCURRENCY,
    status: terminalStatus
  });
}

main().catch(error => {
  logger.error({ err: error }, 'CLI execution failed');
  process.exit(1);
});

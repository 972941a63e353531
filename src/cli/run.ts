import type { VideoCache } from '../cache/video-cache.js';
import { InputError } from '../errors.js';
import { logger } from '../logger.js';
import { assemblePlaylist } from '../playlist/assembler.js';
import { PRIVACY_STATUSES, isPrivacyStatus, type PrivacyStatus } from '../playlist/types.js';
import type { Setlist } from '../setlist/types.js';
import { formatUserError } from '../utils/error-formatter.js';
import { ProgressTracker, type ProgressUpdate } from '../utils/progress-tracker.js';
import type { YouTubeClient } from '../youtube/client.js';
import { estimateRunCost, type QuotaTracker } from '../youtube/quota.js';
import {
  formatMatchLine,
  formatQuotaStatus,
  formatSetlistInfo,
  formatSummary,
  formatTracksTable
} from './display.js';

export interface RunOptions {
  privacy: string;
  dryRun?: boolean;
  showTracks?: boolean;
  clearCache?: boolean;
  quotaStatus?: boolean;
}

export type YouTubeService = Pick<YouTubeClient, 'search' | 'createPlaylist' | 'addVideo'>;

export interface RunOutput {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface StatusLine {
  render(update: ProgressUpdate): void;
  clear(): void;
}

export interface RunContext {
  quota: QuotaTracker;
  cache: VideoCache;
  fetchSetlist(url: string): Promise<Setlist>;
  /** Called once the run reaches the matching stage */
  connectYouTube(): Promise<YouTubeService>;
  confirm(question: string): Promise<boolean>;
  concurrency?: number;
  output?: RunOutput;
  status?: StatusLine;
}

const silentStatus: StatusLine = {
  render: () => {},
  clear: () => {}
};

/**
 * One CLI invocation. Resolves to the process exit code.
 */
export async function run(url: string | undefined, options: RunOptions, context: RunContext): Promise<number> {
  const { quota, cache } = context;
  const output = context.output ?? console;
  const status = context.status ?? silentStatus;
  let stage = 'starting up';

  try {
    if (options.quotaStatus) {
      output.log(formatQuotaStatus(quota.usage(), cache.stats()));
      return 0;
    }

    if (!url) {
      throw new InputError('a setlist.fm URL is required');
    }
    if (!isPrivacyStatus(options.privacy)) {
      throw new InputError(`privacy must be one of ${PRIVACY_STATUSES.join(', ')}`);
    }
    const privacy: PrivacyStatus = options.privacy;
    const dryRun = options.dryRun ?? false;

    if (options.clearCache) {
      stage = 'clearing the video cache';
      cache.clear();
      output.log('Video cache cleared.');
    } else {
      cache.clearExpired();
    }

    stage = 'fetching the setlist';
    const setlist = await context.fetchSetlist(url);
    output.log(formatSetlistInfo(setlist));

    if (setlist.songs.length === 0) {
      output.error('No tracks found in this setlist!');
      return 1;
    }

    if (options.showTracks) {
      output.log('');
      output.log(formatTracksTable(setlist));
      if (!dryRun && !(await context.confirm('\nProceed with playlist creation? [Y/n]: '))) {
        output.log('Cancelled.');
        return 0;
      }
    }

    const cachedCount = setlist.songs.filter(song => cache.has(song.title, song.performingArtist)).length;
    const estimate = estimateRunCost(setlist.songs.length, cachedCount);
    if (quota.wouldExceed(estimate)) {
      const usage = quota.usage();
      output.warn(`Warning: estimated quota usage (${usage.used + estimate}) may exceed the daily limit!`);
      output.warn(`Current usage: ${usage.used}/${usage.limit} units, ${cachedCount} songs cached`);
    }

    if (dryRun) {
      output.log('\nDRY RUN MODE - No playlist will be created');
    }

    stage = 'authorizing with YouTube';
    const youtube = await context.connectYouTube();

    stage = 'matching songs on YouTube';
    output.log('');
    const progress = new ProgressTracker();
    progress.on('progress', (update: ProgressUpdate) => status.render(update));
    const [first] = [...setlist.songs].sort((a, b) => a.position - b.position);
    progress.start(setlist.songs.length, `Searching for: ${first.title}`);

    const result = await assemblePlaylist(
      setlist,
      {
        search: candidate => youtube.search(candidate.text),
        createPlaylist: spec => {
          stage = 'creating the playlist';
          return youtube.createPlaylist(spec);
        },
        addVideo: (playlistId, videoId, position) => youtube.addVideo(playlistId, videoId, position),
        cache
      },
      {
        privacy,
        dryRun,
        concurrency: context.concurrency,
        onMatch: (match, index, total, next) => {
          status.clear();
          output.log(formatMatchLine(match, dryRun));
          progress.update(index + 1, next ? `Searching for: ${next.title}` : 'Matching complete');
          if (index + 1 === total) {
            status.clear();
          }
        }
      }
    );
    progress.stop();

    output.log('');
    output.log(formatSummary(result, quota.usage()));
    return 0;
  } catch (error) {
    status.clear();
    logger.debug({ err: error, stage }, 'run failed');
    output.error(`Error: ${formatUserError(error, stage)}`);
    return 1;
  }
}

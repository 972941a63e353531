/**
 * Text rendering for the CLI. Everything here returns strings so the
 * output can be asserted without capturing stdout.
 */

import type { VideoCacheStats } from '../cache/video-cache.js';
import type { MatchResult } from '../matching/types.js';
import type { AssemblyResult } from '../playlist/types.js';
import { formatEventDate } from '../setlist/parser.js';
import type { Setlist } from '../setlist/types.js';
import { formatETA, type ProgressUpdate } from '../utils/progress-tracker.js';
import type { QuotaUsage } from '../youtube/quota.js';
import { playlistUrl, videoUrl } from '../youtube/client.js';

const padColumn = (value: string, width: number): string =>
  value.length > width ? `${value.slice(0, width - 1)}…` : value.padEnd(width);

export function formatSetlistInfo(setlist: Setlist): string {
  return [
    'Setlist Information',
    `  Artist: ${setlist.artistName}`,
    `  Venue:  ${setlist.venueName}, ${setlist.cityName}`,
    `  Date:   ${formatEventDate(setlist.eventDate)}`,
    `  Tracks: ${setlist.songs.length}`
  ].join('\n');
}

export function formatTracksTable(setlist: Setlist): string {
  const songWidth = Math.min(40, Math.max(4, ...setlist.songs.map(song => song.title.length)));
  const artistWidth = Math.min(30, Math.max(6, ...setlist.songs.map(song => (song.originalArtist ?? song.performingArtist).length)));

  const lines = [
    `${'#'.padStart(3)}  ${padColumn('Song', songWidth)}  ${padColumn('Artist', artistWidth)}  Notes`
  ];

  for (const song of setlist.songs) {
    const notes = song.originalArtist ? `Cover of ${song.originalArtist}` : '';
    const artist = song.originalArtist ?? song.performingArtist;
    lines.push(
      `${String(song.position).padStart(3)}  ${padColumn(song.title, songWidth)}  ${padColumn(artist, artistWidth)}  ${notes}`.trimEnd()
    );
  }

  return lines.join('\n');
}

export function formatMatchLine(result: MatchResult, dryRun: boolean): string {
  const position = String(result.song.position).padStart(2);

  if (result.confidence === 'none' || !result.videoId) {
    return `✗ [${position}] ${result.song.title} (no match found)`;
  }

  const tags: string[] = [];
  if (result.confidence === 'fuzzy') tags.push('fuzzy');
  if (result.fromCache) tags.push('cached');
  const suffix = tags.length > 0 ? ` (${tags.join(', ')})` : '';
  const target = dryRun ? ` -> ${videoUrl(result.videoId)}` : '';

  return `✓ [${position}] ${result.song.title}${target}${suffix}`;
}

export function formatProgressLine(update: ProgressUpdate): string {
  return `[${update.current}/${update.total}] ${update.percent}% ETA ${formatETA(update.eta)} ${update.message}`;
}

export function formatQuotaUsage(usage: QuotaUsage): string {
  return `Quota Usage: ${usage.used}/${usage.limit} units used (${usage.remaining} remaining today)`;
}

export function formatQuotaStatus(usage: QuotaUsage, cache: VideoCacheStats): string {
  return [
    formatQuotaUsage(usage),
    `Cache entries: ${cache.totalEntries} songs cached`,
    `Recent cache entries: ${cache.recentEntries} in last 24h`
  ].join('\n');
}

export function formatSummary(result: AssemblyResult, quota?: QuotaUsage): string {
  const matched = result.spec.orderedVideoIds.length;
  const total = result.matches.length;
  const unmatched = result.matches.filter(match => match.confidence === 'none');
  const lines: string[] = [];

  if (result.dryRun) {
    lines.push('Dry run completed!', `Found matches for ${matched} out of ${total} tracks`);
  } else if (result.playlistId) {
    lines.push(
      'Playlist created successfully!',
      playlistUrl(result.playlistId),
      `Added ${matched} out of ${total} tracks`
    );
  } else {
    lines.push('No playlist created: none of the tracks matched a video', `Matched 0 out of ${total} tracks`);
  }

  if (quota) {
    lines.push('', formatQuotaUsage(quota));
  }

  if (unmatched.length > 0) {
    lines.push('', 'Tracks not found:');
    for (const match of unmatched) {
      lines.push(`  • ${match.song.title}`);
    }
  }

  return lines.join('\n');
}

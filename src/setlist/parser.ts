import { format, isValid, parse } from 'date-fns';

import { logger } from '../logger.js';
import type { Setlist, SetlistFmSetlist, SetlistSong } from './types.js';

export const SETLISTFM_DATE_FORMAT = 'dd-MM-yyyy';

export const UNKNOWN_DATE = 'Unknown Date';

export const formatEventDate = (date: Date | undefined): string =>
  date ? format(date, SETLISTFM_DATE_FORMAT) : UNKNOWN_DATE;

const formatCity = (data: SetlistFmSetlist): string => {
  const city = data.venue?.city;
  const region = city?.stateCode || city?.state || city?.country?.name || '';
  return [city?.name || 'Unknown City', region].filter(Boolean).join(', ');
};

/**
 * Map a setlist.fm API payload to a Setlist.
 *
 * Tape entries (intro music, walk-on tracks) and nameless entries are not
 * songs and are dropped here, so positions count performed songs only.
 */
export const parseSetlistResponse = (data: SetlistFmSetlist, sourceUrl: string): Setlist => {
  const artistName = data.artist?.name?.trim() || 'Unknown Artist';
  const venueName = data.venue?.name?.trim() || 'Unknown Venue';

  const rawDate = data.eventDate ?? '';
  const parsedDate = parse(rawDate, SETLISTFM_DATE_FORMAT, new Date());
  const eventDate = isValid(parsedDate) ? parsedDate : undefined;
  if (!eventDate) {
    logger.warn({ setlistId: data.id, eventDate: rawDate }, 'setlist has no usable event date');
  }

  const songs: SetlistSong[] = [];
  let skipped = 0;

  for (const set of data.sets?.set ?? []) {
    for (const entry of set.song ?? []) {
      const title = entry.name?.trim();
      if (entry.tape || !title) {
        skipped++;
        continue;
      }

      const originalArtist = entry.cover?.name?.trim();
      songs.push(Object.freeze({
        title,
        performingArtist: artistName,
        ...(originalArtist ? { originalArtist } : {}),
        position: songs.length + 1
      }));
    }
  }

  logger.debug(
    { setlistId: data.id, artistName, songs: songs.length, skipped },
    'parsed setlist'
  );

  return Object.freeze({
    sourceUrl,
    setlistId: data.id ?? '',
    artistName,
    venueName,
    cityName: formatCity(data),
    ...(eventDate ? { eventDate } : {}),
    songs: Object.freeze(songs)
  });
};

import { InputError } from '../errors.js';

const SETLIST_ID_PATTERN = /^[0-9a-f]{6,16}$/i;

/**
 * Extract the setlist id from a setlist.fm page URL, e.g.
 * https://www.setlist.fm/setlist/some-band/2025/some-venue-city-country-53af56b5.html
 */
export const parseSetlistUrl = (rawUrl: string): string => {
  const url = rawUrl.trim().split(/[?#]/)[0].replace(/\/+$/, '');

  if (!url.includes('setlist.fm/setlist/')) {
    throw new InputError("URL must be from setlist.fm and contain '/setlist/'");
  }

  const filename = url.split('/').pop() ?? '';
  if (!filename.endsWith('.html')) {
    throw new InputError('URL does not look like a setlist page (it should end in .html)');
  }

  const stem = filename.slice(0, -'.html'.length);
  const setlistId = stem.split('-').pop() ?? '';

  if (!SETLIST_ID_PATTERN.test(setlistId)) {
    throw new InputError(`Could not extract a setlist id from URL (got "${setlistId}")`);
  }

  return setlistId;
};

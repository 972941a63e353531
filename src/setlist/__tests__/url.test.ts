import { describe, it, expect } from 'vitest';

import { InputError } from '../../errors.js';
import { parseSetlistUrl } from '../url.js';

const PAGE = 'https://www.setlist.fm/setlist/test-band/2024/test-hall-springfield-usa-1bd6b5a8.html';

describe('parseSetlistUrl', () => {
  it('extracts the trailing hex id', () => {
    expect(parseSetlistUrl(PAGE)).toBe('1bd6b5a8');
  });

  it('ignores query strings, fragments, trailing slashes and whitespace', () => {
    expect(parseSetlistUrl(`  ${PAGE}?utm_source=share#songs  `)).toBe('1bd6b5a8');
    expect(parseSetlistUrl(`${PAGE}/`)).toBe('1bd6b5a8');
  });

  it('accepts URLs without a scheme or www', () => {
    expect(parseSetlistUrl('setlist.fm/setlist/test-band/2024/test-hall-53af56b5.html')).toBe('53af56b5');
  });

  it('rejects URLs from other sites', () => {
    expect(() => parseSetlistUrl('https://example.com/setlist/test-band-1bd6b5a8.html')).toThrow(InputError);
  });

  it('rejects setlist.fm pages that are not a setlist', () => {
    expect(() => parseSetlistUrl('https://www.setlist.fm/setlist/test-band/2024/')).toThrow(
      'URL does not look like a setlist page (it should end in .html)'
    );
  });

  it('rejects an id that is not hexadecimal', () => {
    expect(() => parseSetlistUrl('https://www.setlist.fm/setlist/test-band/2024/test-hall-xyz.html')).toThrow(
      'Could not extract a setlist id from URL (got "xyz")'
    );
  });
});

import { extractSlugFromUrl } from '../../src/utils/slug.js';
import { parseStringSet, serializeStringSet } from '../../src/utils/stringSet.js';
import { toDate, toNullableDate, toDbTimestamp } from '../../src/utils/timestamps.js';
import { getErrorMessage, toError } from '../../src/utils/errorHandling.js';
import { DatabaseError } from '../../src/errors/index.js';

describe('extractSlugFromUrl', () => {
  it('should take the last path segment', () => {
    expect(extractSlugFromUrl('https://example.test/episode/naruto-episode-1')).toBe('naruto-episode-1');
  });

  it('should ignore trailing slashes', () => {
    expect(extractSlugFromUrl('https://example.test/anime/naruto//')).toBe('naruto');
  });

  it('should return a bare slug unchanged', () => {
    expect(extractSlugFromUrl('naruto')).toBe('naruto');
  });
});

describe('string sets', () => {
  it('should store each value once in first-seen order', () => {
    expect(serializeStringSet(['Action', 'Drama', 'Action'])).toBe('["Action","Drama"]');
    expect(serializeStringSet(undefined)).toBe('[]');
  });

  it('should read back arrays and drop anything else', () => {
    expect(parseStringSet('["Action","Drama"]')).toEqual(['Action', 'Drama']);
    expect(parseStringSet('["Action",3,null]')).toEqual(['Action']);
    expect(parseStringSet('{"a":1}')).toEqual([]);
    expect(parseStringSet(null)).toEqual([]);
  });
});

describe('timestamps', () => {
  it('should write ISO-8601 UTC text', () => {
    expect(toDbTimestamp(new Date(Date.UTC(2024, 5, 1, 12, 0, 0)))).toBe('2024-06-01T12:00:00.000Z');
  });

  it('should read both text and Date values', () => {
    const date = new Date('2024-06-01T12:00:00.000Z');
    expect(toDate('2024-06-01T12:00:00.000Z').getTime()).toBe(date.getTime());
    expect(toDate(date)).toBe(date);
    expect(toNullableDate(null)).toBeNull();
  });

  it('should reject text that is not a timestamp', () => {
    expect(() => toDate('yesterday-ish')).toThrow(DatabaseError);
  });
});

describe('error handling helpers', () => {
  it('should extract messages from anything thrown', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage({ message: 'driver said no' })).toBe('driver said no');
    expect(getErrorMessage('plain string')).toBe('plain string');
    expect(getErrorMessage(42)).toBe('An unknown error occurred');
  });

  it('should wrap non-errors in an Error', () => {
    const original = new Error('kept');
    expect(toError(original)).toBe(original);
    expect(toError('text').message).toBe('text');
  });
});

/**
 * Last path segment of a catalogue URL, ignoring trailing slashes.
 *
 * extractSlugFromUrl('https://example.test/anime/naruto/') === 'naruto'
 */
export function extractSlugFromUrl(url: string): string {
  const trimmed = url.replace(/\/+$/, '');
  const lastSlash = trimmed.lastIndexOf('/');
  return lastSlash === -1 ? trimmed : trimmed.slice(lastSlash + 1);
}

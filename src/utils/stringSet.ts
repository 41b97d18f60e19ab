/**
 * Genre and cast sets live in TEXT columns as JSON arrays.
 */

export function serializeStringSet(values: readonly string[] | undefined | null): string {
  return JSON.stringify([...new Set(values ?? [])]);
}

export function parseStringSet(text: string | null): string[] {
  if (!text) {
    return [];
  }
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter((item): item is string => typeof item === 'string');
}

import { toPostgresPlaceholders } from '../../src/database/connections/PostgresConnection.js';

describe('toPostgresPlaceholders', () => {
  it('should number placeholders in order', () => {
    expect(toPostgresPlaceholders('SELECT * FROM episodes WHERE anime_slug = ? AND url = ?')).toBe(
      'SELECT * FROM episodes WHERE anime_slug = $1 AND url = $2'
    );
  });

  it('should leave question marks inside quotes alone', () => {
    expect(toPostgresPlaceholders("SELECT '?' AS literal, \"odd?name\" FROM t WHERE a = ?")).toBe(
      "SELECT '?' AS literal, \"odd?name\" FROM t WHERE a = $1"
    );
  });

  it('should return SQL without placeholders unchanged', () => {
    expect(toPostgresPlaceholders('DELETE FROM cache_metadata')).toBe('DELETE FROM cache_metadata');
  });
});

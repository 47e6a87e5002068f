/**
 * Parse a JSON column that may come back as a string or already parsed.
 *
 * SQLite and some MySQL drivers return JSON columns as text.
 */
export function parseJson(value: unknown): unknown {
  if (typeof value === 'string') {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  }
  return value;
}

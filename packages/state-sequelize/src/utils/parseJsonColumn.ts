/**
 * Read a JSON column that may come back as text.
 *
 * MySQL/MariaDB with certain driver versions, and SQLite, return JSON columns
 * as strings instead of parsed values. Text that is not valid JSON is
 * returned unchanged so that the row validation reports it.
 */
export function parseJsonColumn(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

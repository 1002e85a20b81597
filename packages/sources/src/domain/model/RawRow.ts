/** One parsed row, keyed by column name (or by column index when there is no header). */
export type RawRow = Readonly<Record<string, unknown>>;

/** A row with its position as a person looking at the file would count it. */
export interface NumberedRow {
  readonly row: RawRow;
  readonly rowNumber: number;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** A row whose every value is empty, blank or missing. */
export function isEmptyRow(row: RawRow): boolean {
  return Object.values(row).every(
    (value) => value === undefined || value === null || (typeof value === 'string' && value.trim() === ''),
  );
}

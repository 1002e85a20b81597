import type { NumberedRow } from '../model/RawRow.js';

/** Parses the whole content of a source into rows, numbered by their place in the input. */
export interface RowParser {
  parse(data: string | Buffer): Iterable<NumberedRow>;
}

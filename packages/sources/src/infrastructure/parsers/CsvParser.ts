import Papa from 'papaparse';
import type { RowParser } from '../../domain/ports/RowParser.js';
import type { NumberedRow } from '../../domain/model/RawRow.js';
import { isEmptyRow } from '../../domain/model/RawRow.js';
import { toText } from './text.js';

export interface CsvParserOptions {
  /** Column delimiter. Default: detected from the first lines. */
  readonly delimiter?: string;
  /** Whether the first row holds column names. Default: `true`. Without one, columns are keyed `'0'`, `'1'`, ... */
  readonly hasHeader?: boolean;
}

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'];

/**
 * CSV parser using PapaParse. Blank lines and rows with only empty cells are
 * skipped but still counted, so row numbers follow the spreadsheet: the
 * header is row 1.
 */
export class CsvParser implements RowParser {
  private readonly delimiter: string | undefined;
  private readonly hasHeader: boolean;

  constructor(options?: CsvParserOptions) {
    this.delimiter = options?.delimiter;
    this.hasHeader = options?.hasHeader ?? true;
  }

  *parse(data: string | Buffer): Iterable<NumberedRow> {
    const content = toText(data);
    const delimiter = this.delimiter ?? this.detectDelimiter(content);

    if (this.hasHeader) {
      const result = Papa.parse<Record<string, unknown>>(content, {
        header: true,
        delimiter,
        skipEmptyLines: false,
        dynamicTyping: false,
        transformHeader: (header) => header.trim(),
      });
      for (const [index, row] of result.data.entries()) {
        if (isEmptyRow(row)) continue;
        yield { row, rowNumber: index + 2 };
      }
      return;
    }

    const result = Papa.parse<unknown[]>(content, {
      header: false,
      delimiter,
      skipEmptyLines: false,
      dynamicTyping: false,
    });
    for (const [index, cells] of result.data.entries()) {
      const row: Record<string, unknown> = {};
      cells.forEach((cell, column) => {
        row[String(column)] = cell;
      });
      if (isEmptyRow(row)) continue;
      yield { row, rowNumber: index + 1 };
    }
  }

  /** Pick the candidate delimiter that splits the first line into the most columns. */
  detectDelimiter(sample: string | Buffer): string {
    const firstLines = toText(sample).split('\n').slice(0, 5).join('\n');

    let best = ',';
    let maxColumns = 0;
    for (const delimiter of CANDIDATE_DELIMITERS) {
      const result = Papa.parse<string[]>(firstLines, { delimiter, header: false });
      const firstRow = result.data[0];
      if (firstRow && firstRow.length > maxColumns) {
        maxColumns = firstRow.length;
        best = delimiter;
      }
    }
    return best;
  }
}

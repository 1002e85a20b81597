import type { CsvParserOptions } from '../parsers/CsvParser.js';
import { CsvParser } from '../parsers/CsvParser.js';
import type { ParsedItemSourceOptions, SourceInput } from './ParsedItemSource.js';
import { ParsedItemSource } from './ParsedItemSource.js';

export interface CsvItemSourceOptions extends ParsedItemSourceOptions, CsvParserOptions {}

/**
 * Work items from CSV, one per row.
 *
 * @example
 * ```typescript
 * const source = new CsvItemSource({ path: 'companies.csv' }, {
 *   mapping: { identityField: 'name', payloadFields: ['name', 'website'] },
 * });
 * await runner.from(source).run(job);
 * ```
 */
export class CsvItemSource extends ParsedItemSource {
  constructor(input: SourceInput, options: CsvItemSourceOptions) {
    const { delimiter, hasHeader, ...rest } = options;
    super(
      input,
      new CsvParser({
        ...(delimiter !== undefined ? { delimiter } : {}),
        ...(hasHeader !== undefined ? { hasHeader } : {}),
      }),
      rest,
    );
  }
}

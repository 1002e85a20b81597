import { readFile } from 'node:fs/promises';
import type { JobSource, Logger, WorkItem } from '@batchmeter/core';
import { createConsoleLogger } from '@batchmeter/core';
import type { RowParser } from '../../domain/ports/RowParser.js';
import type { ItemMapping } from '../../domain/model/ItemMapping.js';
import { toWorkItem } from '../../domain/model/ItemMapping.js';

/** Where the content comes from: inline data, or a file read when the batch loads. */
export type SourceInput = { readonly data: string | Buffer } | { readonly path: string };

export interface ParsedItemSourceOptions {
  readonly mapping: ItemMapping;
  readonly logger?: Logger;
}

/** Job source that parses its whole input up front and maps every row to a work item. */
export class ParsedItemSource implements JobSource {
  private readonly mapping: ItemMapping;
  private readonly logger: Logger;

  constructor(
    private readonly input: SourceInput,
    private readonly parser: RowParser,
    options: ParsedItemSourceOptions,
  ) {
    this.mapping = options.mapping;
    this.logger = options.logger ?? createConsoleLogger();
  }

  async load(): Promise<readonly WorkItem[]> {
    const content = 'path' in this.input ? await readFile(this.input.path) : this.input.data;

    const items: WorkItem[] = [];
    let rows = 0;
    for (const { row, rowNumber } of this.parser.parse(content)) {
      rows++;
      const item = toWorkItem(row, this.mapping, rowNumber);
      if (item === null) {
        this.logger.warn('Row dropped: empty identity', { rowNumber, field: this.mapping.identityField });
        continue;
      }
      items.push(item);
    }

    this.logger.debug('Items loaded', { source: this.describe(), items: items.length, rows });
    return items;
  }

  describe(): string {
    return 'path' in this.input ? this.input.path : 'inline';
  }
}

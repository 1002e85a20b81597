import type { RowParser } from '../../domain/ports/RowParser.js';
import type { NumberedRow } from '../../domain/model/RawRow.js';
import { isPlainObject } from '../../domain/model/RawRow.js';
import { toText } from './text.js';

export interface JsonParserOptions {
  /** 'array' for a JSON array of objects, 'ndjson' for one object per line. Default: 'auto'. */
  readonly format?: 'array' | 'ndjson' | 'auto';
}

/**
 * JSON parser for arrays and NDJSON. Nested values are kept as they are.
 * Array elements are numbered from 1, NDJSON rows by their line.
 */
export class JsonParser implements RowParser {
  private readonly format: 'array' | 'ndjson' | 'auto';

  constructor(options?: JsonParserOptions) {
    this.format = options?.format ?? 'auto';
  }

  *parse(data: string | Buffer): Iterable<NumberedRow> {
    const text = toText(data);
    const trimmed = text.trim();
    if (trimmed === '') return;

    const format = this.format === 'auto' ? detectFormat(trimmed) : this.format;
    if (format === 'array') {
      yield* parseArray(trimmed);
    } else {
      yield* parseNdjson(text);
    }
  }
}

function detectFormat(content: string): 'array' | 'ndjson' {
  return content.startsWith('[') ? 'array' : 'ndjson';
}

function* parseArray(content: string): Iterable<NumberedRow> {
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new Error('JsonParser: expected a JSON array of objects');
  }

  for (const [index, item] of parsed.entries()) {
    if (!isPlainObject(item)) {
      throw new Error('JsonParser: each item in the array must be a plain object');
    }
    yield { row: item, rowNumber: index + 1 };
  }
}

function* parseNdjson(content: string): Iterable<NumberedRow> {
  const lines = content.split('\n');

  for (const [index, line] of lines.entries()) {
    const trimmedLine = line.trim();
    if (trimmedLine === '') continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmedLine);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`JsonParser: invalid JSON on line ${String(index + 1)}: ${reason}`);
    }
    if (!isPlainObject(parsed)) {
      throw new Error(`JsonParser: line ${String(index + 1)} must be a plain object`);
    }
    yield { row: parsed, rowNumber: index + 1 };
  }
}

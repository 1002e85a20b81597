import type { JsonParserOptions } from '../parsers/JsonParser.js';
import { JsonParser } from '../parsers/JsonParser.js';
import type { ParsedItemSourceOptions, SourceInput } from './ParsedItemSource.js';
import { ParsedItemSource } from './ParsedItemSource.js';

export interface JsonItemSourceOptions extends ParsedItemSourceOptions, JsonParserOptions {}

/** Work items from a JSON array or NDJSON, one per object. */
export class JsonItemSource extends ParsedItemSource {
  constructor(input: SourceInput, options: JsonItemSourceOptions) {
    const { format, ...rest } = options;
    super(input, new JsonParser(format !== undefined ? { format } : {}), rest);
  }
}

// Sources
export { CsvItemSource } from './infrastructure/sources/CsvItemSource.js';
export type { CsvItemSourceOptions } from './infrastructure/sources/CsvItemSource.js';
export { JsonItemSource } from './infrastructure/sources/JsonItemSource.js';
export type { JsonItemSourceOptions } from './infrastructure/sources/JsonItemSource.js';
export { ParsedItemSource } from './infrastructure/sources/ParsedItemSource.js';
export type { ParsedItemSourceOptions, SourceInput } from './infrastructure/sources/ParsedItemSource.js';

// Parsers
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export type { CsvParserOptions } from './infrastructure/parsers/CsvParser.js';
export { JsonParser } from './infrastructure/parsers/JsonParser.js';
export type { JsonParserOptions } from './infrastructure/parsers/JsonParser.js';

// Mapping
export type { ItemMapping } from './domain/model/ItemMapping.js';
export { toWorkItem, readIdentity } from './domain/model/ItemMapping.js';
export type { NumberedRow, RawRow } from './domain/model/RawRow.js';
export { isEmptyRow } from './domain/model/RawRow.js';
export type { RowParser } from './domain/ports/RowParser.js';

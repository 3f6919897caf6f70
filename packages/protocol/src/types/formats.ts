// Data format identifiers

/**
 * Formats with a built-in serializer
 */
export const DATA_FORMATS = {
  JSON: 'json',
  CSV: 'csv',
  NDJSON: 'ndjson',
  YAML: 'yaml',
} as const;

export type BuiltInFormat = (typeof DATA_FORMATS)[keyof typeof DATA_FORMATS];

/**
 * A format identifier. Built-in names autocomplete; custom serializers may
 * register any other name.
 */
export type DataFormat = BuiltInFormat | (string & {});

/**
 * File extensions claimed by each built-in format
 */
export const FORMAT_EXTENSIONS: Record<BuiltInFormat, readonly string[]> = {
  json: ['.json'],
  csv: ['.csv'],
  ndjson: ['.ndjson', '.jsonl'],
  yaml: ['.yaml', '.yml'],
};

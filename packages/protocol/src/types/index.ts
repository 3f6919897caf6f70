// Protocol types

export {
  DATA_FORMATS,
  FORMAT_EXTENSIONS,
  type BuiltInFormat,
  type DataFormat,
} from './formats.js';

export type {
  RecordKey,
  RecordSchema,
  RecordOf,
  KeyField,
  KeyOf,
  TableLayout,
  SourcePosition,
} from './tables.js';

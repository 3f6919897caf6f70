// @tablekit/protocol
// Shared, I/O-free building blocks for tablekit.
//
// Key concepts:
// - Format identifiers and the file extensions they claim
// - Text codecs (CSV, NDJSON) that only split and join text
// - Logical paths that look the same on every platform
// - zod schemas for localization tables and context configuration

export * from './types/index.js';

// Codecs
export { CodecError } from './codecs/errors.js';
export {
  parseCsv,
  escapeCsvField,
  stringifyCsvRow,
  stringifyCsv,
  type CsvRow,
  type CsvOptions,
} from './codecs/csv.js';
export { parseNdjson, stringifyNdjson, type NdjsonEntry } from './codecs/ndjson.js';

// Paths
export {
  normalizePath,
  joinPath,
  fileName,
  extensionOf,
  baseName,
  extensionFromPattern,
  matchesPattern,
} from './paths/paths.js';

// Schemas
export {
  LocalizationKeySchema,
  LanguageTextSchema,
  type LocalizationKey,
  type LanguageText,
} from './schemas/localization.js';

// Configuration
export {
  DataContextConfigSchema,
  LanguageLoadingSchema,
  parseConfig,
  DEFAULT_CONTEXT_NAME,
  DEFAULT_GENERATED_NAMESPACE,
  DEFAULT_LOCALIZATION_KEY_PATH,
  DEFAULT_LOCALIZATION_DATA_PATH,
  DEFAULT_LOCALIZATION_PATTERN,
  DEFAULT_LANGUAGE,
  DEFAULT_CSV_FIELD_DELIMITER,
  DEFAULT_CSV_ARRAY_DELIMITER,
  type DataContextConfig,
  type DataContextConfigInput,
  type ConfigParseResult,
  type LanguageLoading,
} from './config/config.js';

// Data context configuration
//
// Every context reads the same settings. All fields have documented defaults,
// so an empty object is a valid configuration.

import { z } from 'zod';

export const DEFAULT_CONTEXT_NAME = 'GameDataContext';
export const DEFAULT_GENERATED_NAMESPACE = 'Generated';
export const DEFAULT_LOCALIZATION_KEY_PATH = 'Localizations/LocalizationKeys.csv';
export const DEFAULT_LOCALIZATION_DATA_PATH = 'Localizations/';
export const DEFAULT_LOCALIZATION_PATTERN = '*.csv';
export const DEFAULT_LANGUAGE = 'en';
export const DEFAULT_CSV_FIELD_DELIMITER = ',';
export const DEFAULT_CSV_ARRAY_DELIMITER = '|';

/**
 * How language tables other than the default are loaded.
 * - eager: every language file found in the data folder is loaded up front
 * - lazy: a language is loaded the first time it is selected
 */
export const LanguageLoadingSchema = z.enum(['eager', 'lazy']);

export type LanguageLoading = z.infer<typeof LanguageLoadingSchema>;

export const DataContextConfigSchema = z
  .object({
    contextName: z.string().min(1).default(DEFAULT_CONTEXT_NAME),
    generatedNamespace: z.string().min(1).default(DEFAULT_GENERATED_NAMESPACE),
    enableLocalization: z.boolean().default(false),
    localizationKeyPath: z.string().min(1).default(DEFAULT_LOCALIZATION_KEY_PATH),
    localizationDataPath: z.string().min(1).default(DEFAULT_LOCALIZATION_DATA_PATH),
    localizationPattern: z.string().min(1).default(DEFAULT_LOCALIZATION_PATTERN),
    defaultLanguage: z.string().min(1).default(DEFAULT_LANGUAGE),
    languageLoading: LanguageLoadingSchema.default('eager'),
    enableDebugLogging: z.boolean().default(false),
    csvFieldDelimiter: z.string().length(1).default(DEFAULT_CSV_FIELD_DELIMITER),
    csvArrayDelimiter: z.string().length(1).default(DEFAULT_CSV_ARRAY_DELIMITER),
  })
  .strict()
  .refine((config) => config.csvFieldDelimiter !== config.csvArrayDelimiter, {
    message: 'CSV array delimiter must differ from the field delimiter',
    path: ['csvArrayDelimiter'],
  })
  .refine((config) => config.csvFieldDelimiter !== '"' && config.csvArrayDelimiter !== '"', {
    message: 'CSV delimiters cannot be a double quote',
    path: ['csvFieldDelimiter'],
  });

/**
 * Fully resolved configuration
 */
export type DataContextConfig = z.output<typeof DataContextConfigSchema>;

/**
 * Configuration as supplied by callers; omitted fields take their defaults
 */
export type DataContextConfigInput = z.input<typeof DataContextConfigSchema>;

export type ConfigParseResult =
  | { success: true; config: DataContextConfig }
  | { success: false; issues: string[] };

/**
 * Validate configuration input and apply defaults.
 * Issues are reported as "field: message" strings.
 */
export function parseConfig(input: DataContextConfigInput = {}): ConfigParseResult {
  const result = DataContextConfigSchema.safeParse(input);
  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    issues: result.error.issues.map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    }),
  };
}

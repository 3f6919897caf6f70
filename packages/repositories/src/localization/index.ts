export {
  LocalizationContext,
  localizationOptionsFromConfig,
  type LocalizationOptions,
  type FormatValues,
} from './localization-context.js';

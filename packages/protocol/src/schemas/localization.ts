// Localization record schemas

import { z } from 'zod';

/**
 * One row of the localization key table.
 * The key table is the source of truth for which keys exist.
 */
export const LocalizationKeySchema = z.object({
  id: z.string().min(1),
  description: z.string().default(''),
  category: z.string().default(''),
  /**
   * Fixed keys may not be renamed; their text can still change
   */
  isFixedKey: z.boolean().default(false),
});

export type LocalizationKey = z.infer<typeof LocalizationKeySchema>;

/**
 * One row of a per-language text table
 */
export const LanguageTextSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  /**
   * Translator note
   */
  context: z.string().default(''),
});

export type LanguageText = z.infer<typeof LanguageTextSchema>;

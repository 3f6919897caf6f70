// Localization overlay
//
// A key table defines which keys exist. Each language has its own text
// table, discovered by scanning the data folder. Resolution never throws:
// a missing translation falls back to the default language, then to the
// key itself, and each fallback is logged once.

import {
  LanguageTextSchema,
  LocalizationKeySchema,
  baseName,
  extensionFromPattern,
  joinPath,
  normalizePath,
  type DataContextConfig,
  type LanguageLoading,
  type LocalizationKey,
} from '@tablekit/protocol';
import type { RepositoryOperationOptions } from '../interfaces/repository.js';
import type { StorageProvider } from '../interfaces/storage-provider.js';
import type { SerializerFactory } from '../serializers/factory.js';
import type { DataLogger } from '../logging.js';
import { TableRepository } from '../tables/table-repository.js';
import { ContextNotLoadedError, throwIfCancelled } from '../errors.js';

type KeyTable = TableRepository<typeof LocalizationKeySchema, 'id'>;
type LanguageTable = TableRepository<typeof LanguageTextSchema, 'id'>;

export type LocalizationOptions = {
  keyPath: string;
  dataPath: string;
  pattern: string;
  defaultLanguage: string;
  loading: LanguageLoading;
};

/**
 * Placeholder values for `format`
 */
export type FormatValues = Record<string, string | number>;

export function localizationOptionsFromConfig(config: DataContextConfig): LocalizationOptions {
  return {
    keyPath: config.localizationKeyPath,
    dataPath: config.localizationDataPath,
    pattern: config.localizationPattern,
    defaultLanguage: config.defaultLanguage,
    loading: config.languageLoading,
  };
}

export class LocalizationContext {
  readonly defaultLanguage: string;
  readonly options: LocalizationOptions;

  private keyTable: KeyTable;
  private languages = new Map<string, LanguageTable>();
  private discovered = new Map<string, string>();
  private active: string;
  private readonly reported = new Set<string>();

  constructor(
    private readonly provider: StorageProvider,
    private readonly serializers: SerializerFactory,
    options: LocalizationOptions,
    private readonly logger: DataLogger
  ) {
    this.options = options;
    this.defaultLanguage = options.defaultLanguage;
    this.active = options.defaultLanguage;
    this.keyTable = this.createKeyTable();
  }

  get currentLanguage(): string {
    return this.active;
  }

  get isLoaded(): boolean {
    return this.keyTable.isLoaded;
  }

  /**
   * Language codes with a file in the data folder or text set in memory, sorted
   */
  get availableLanguages(): string[] {
    const codes = new Set([...this.discovered.keys(), ...this.languages.keys()]);
    return Array.from(codes).sort();
  }

  /**
   * Load the key table, then list the language files and load them (all
   * of them when eager, only the default language when lazy). Nothing is
   * replaced until every file has parsed, so a failed load leaves the
   * previous keys and languages in place.
   */
  async load(options: RepositoryOperationOptions = {}): Promise<void> {
    const { signal } = options;
    const keyTable = this.createKeyTable();
    await keyTable.load(this.provider, this.serializers, { signal });

    const paths = await this.provider.listFiles(this.options.dataPath, this.options.pattern);
    throwIfCancelled(signal, this.options.dataPath);

    const keyPath = normalizePath(this.options.keyPath);
    const discovered = new Map<string, string>();
    for (const path of paths) {
      if (normalizePath(path) !== keyPath) {
        discovered.set(baseName(path), path);
      }
    }

    const wanted = Array.from(discovered).filter(
      ([language]) => this.options.loading === 'eager' || language === this.defaultLanguage
    );
    const tables = await Promise.all(
      wanted.map(async ([language, path]) => {
        const table = this.createLanguageTable(language, path);
        await table.load(this.provider, this.serializers, { signal });
        return [language, table] as const;
      })
    );
    throwIfCancelled(signal, this.options.dataPath);

    this.keyTable = keyTable;
    this.discovered = discovered;
    this.languages = new Map(tables);
    this.reported.clear();

    if (!discovered.has(this.defaultLanguage)) {
      this.logger.warn('No localization file for default language', {
        language: this.defaultLanguage,
        dataPath: this.options.dataPath,
      });
    }
    this.logger.debug('Localization loaded', {
      keys: keyTable.count,
      languages: Array.from(this.languages.keys()),
    });
  }

  /**
   * Make a language active, loading its file on first use.
   * A language with no file stays selectable; lookups fall back to the
   * default language.
   */
  async useLanguage(language: string, options: RepositoryOperationOptions = {}): Promise<void> {
    if (!this.languages.has(language)) {
      const path = this.discovered.get(language);
      if (path === undefined) {
        this.logger.warn('No localization file for language', { language });
      } else {
        const table = this.createLanguageTable(language, path);
        await table.load(this.provider, this.serializers, options);
        this.languages.set(language, table);
      }
    }
    this.active = language;
  }

  /**
   * Text for a key in a language (default: the current one).
   * Falls back to the default language, then to the key itself.
   */
  resolve(key: string, language: string = this.active): string {
    if (!this.keyTable.has(key)) {
      this.reportOnce(`unknown\u0000${key}`, 'Unknown localization key', { key });
      return key;
    }

    const text = this.textIn(language, key);
    if (text !== undefined) {
      return text;
    }

    const fallback = language === this.defaultLanguage ? undefined : this.textIn(this.defaultLanguage, key);
    if (!this.languages.has(language) && this.discovered.has(language)) {
      // Lazy languages are read by useLanguage, never by a lookup
      this.reportOnce(`unloaded\u0000${language}`, 'Language not loaded', { language });
    } else {
      this.reportOnce(`${language}\u0000${key}`, 'Missing translation', {
        key,
        language,
        fallback: fallback === undefined ? 'key' : this.defaultLanguage,
      });
    }
    return fallback ?? key;
  }

  /**
   * Resolve a key and fill `{name}` placeholders. Placeholders without a
   * value are left as they are.
   */
  format(key: string, values: FormatValues, language?: string): string {
    return this.resolve(key, language).replace(/\{(\w+)\}/g, (placeholder, name: string) =>
      Object.hasOwn(values, name) ? String(values[name]) : placeholder
    );
  }

  hasKey(key: string): boolean {
    return this.keyTable.has(key);
  }

  keys(): string[] {
    return Array.from(this.keyTable.keys());
  }

  getKeyData(key: string): LocalizationKey | undefined {
    return this.keyTable.tryGet(key);
  }

  /**
   * Set the text of a key in a language (default: the current one),
   * keeping any existing context note. Creates the language table when
   * the language has no file yet.
   *
   * @throws ContextNotLoadedError for a language whose file has not been loaded
   */
  setText(key: string, text: string, language: string = this.active): void {
    let table = this.languages.get(language);
    if (!table && this.discovered.has(language)) {
      throw new ContextNotLoadedError(`Localization.${language}`, 'unloaded');
    }
    if (!table) {
      const path =
        this.discovered.get(language) ??
        joinPath(this.options.dataPath, `${language}${extensionFromPattern(this.options.pattern)}`);
      table = this.createLanguageTable(language, path);
      this.languages.set(language, table);
    }

    const existing = table.tryGet(key);
    if (existing) {
      table.update({ ...existing, text });
    } else {
      table.add({ id: key, text });
    }
    this.reported.delete(`${language}\u0000${key}`);
  }

  /**
   * Write the key table and every language table held in memory
   */
  async save(options: RepositoryOperationOptions = {}): Promise<void> {
    await this.keyTable.save(this.provider, this.serializers, options);
    for (const table of this.languages.values()) {
      await table.save(this.provider, this.serializers, options);
    }
  }

  private textIn(language: string, key: string): string | undefined {
    const text = this.languages.get(language)?.tryGet(key)?.text;
    return text ? text : undefined;
  }

  private createKeyTable(): KeyTable {
    return new TableRepository({
      name: 'LocalizationKey',
      path: this.options.keyPath,
      schema: LocalizationKeySchema,
      key: 'id',
    });
  }

  private createLanguageTable(language: string, path: string): LanguageTable {
    return new TableRepository({
      name: `Localization.${language}`,
      path,
      schema: LanguageTextSchema,
      key: 'id',
    });
  }

  private reportOnce(id: string, message: string, data: Record<string, unknown>): void {
    if (this.reported.has(id)) return;
    this.reported.add(id);
    this.logger.warn(message, data);
  }
}

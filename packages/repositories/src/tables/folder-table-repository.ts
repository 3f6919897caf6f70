// Keyed table spread over a folder, one record per file

import {
  extensionFromPattern,
  joinPath,
  type KeyField,
  type KeyOf,
  type RecordOf,
  type RecordSchema,
} from '@tablekit/protocol';
import type { RepositoryOperationOptions } from '../interfaces/repository.js';
import { DEFAULT_MULTI_FILE_PATTERN, type StorageProvider } from '../interfaces/storage-provider.js';
import type { SerializerFactory } from '../serializers/factory.js';
import {
  DuplicateKeyError,
  MalformedDataError,
  UnsupportedFormatError,
  throwIfCancelled,
} from '../errors.js';
import { KeyedTable, type KeyedTableOptions } from './keyed-table.js';

export type FolderTableOptions<S extends RecordSchema, K extends KeyField<S>> = Omit<
  KeyedTableOptions<S, K>,
  'path'
> & {
  /**
   * Logical path of the folder holding the record files
   */
  folder: string;

  /**
   * File name pattern with `*` and `?` wildcards (default "*.json")
   */
  pattern?: string;
};

/**
 * Repository whose records each live in their own file inside a folder.
 *
 * Every file matching the pattern holds one record. A missing folder loads
 * as an empty table. Saving writes each record back to the file it came
 * from; new records get a file named after their key and files of removed
 * records are deleted.
 */
export class FolderTableRepository<S extends RecordSchema, K extends KeyField<S>> extends KeyedTable<S, K> {
  readonly pattern: string;

  private files = new Map<KeyOf<S, K>, string>();
  private stale = new Set<string>();

  constructor(options: FolderTableOptions<S, K>) {
    super({
      name: options.name,
      path: options.folder,
      format: options.format,
      schema: options.schema,
      key: options.key,
    });
    this.pattern = options.pattern ?? DEFAULT_MULTI_FILE_PATTERN;
  }

  get folder(): string {
    return this.path;
  }

  /**
   * Logical path a record is stored at
   */
  fileOf(key: KeyOf<S, K>): string {
    return this.files.get(key) ?? joinPath(this.path, `${String(key)}${extensionFromPattern(this.pattern)}`);
  }

  async load(
    provider: StorageProvider,
    serializers: SerializerFactory,
    options: RepositoryOperationOptions = {}
  ): Promise<void> {
    const { signal } = options;
    throwIfCancelled(signal, this.path);

    const texts = await provider.loadMultipleText(this.path, this.pattern);
    throwIfCancelled(signal, this.path);

    const next = new Map<KeyOf<S, K>, RecordOf<S>>();
    const files = new Map<KeyOf<S, K>, string>();
    for (const [filePath, text] of texts) {
      const serializer = serializers.forPath(filePath, this.format);
      if (!serializer.parseSingle) {
        throw new UnsupportedFormatError(serializer.format, `cannot hold a single ${this.name} record`);
      }

      const record: RecordOf<S> = serializer.parseSingle(text, this.layout.schema, filePath);
      const key = record[this.layout.key];
      if (typeof key !== 'string' && typeof key !== 'number') {
        throw new MalformedDataError(filePath, `${this.name} record has no usable key`, { field: this.layout.key });
      }
      if (files.has(key)) {
        throw new DuplicateKeyError(filePath, key, { field: this.layout.key });
      }

      next.set(key, record);
      files.set(key, filePath);
    }
    throwIfCancelled(signal, this.path);

    this.swap(next);
    this.files = files;
    this.stale.clear();
  }

  async save(
    provider: StorageProvider,
    serializers: SerializerFactory,
    options: RepositoryOperationOptions = {}
  ): Promise<void> {
    const { signal } = options;
    throwIfCancelled(signal, this.path);

    const writes: Array<{ key: KeyOf<S, K>; path: string; text: string }> = [];
    for (const [key, record] of this.items) {
      const path = this.fileOf(key);
      const serializer = serializers.forPath(path, this.format);
      if (!serializer.renderSingle) {
        throw new UnsupportedFormatError(serializer.format, `cannot hold a single ${this.name} record`);
      }
      writes.push({ key, path, text: serializer.renderSingle(record) });
    }
    throwIfCancelled(signal, this.path);

    const written = new Set(writes.map((write) => write.path));
    await Promise.all(writes.map((write) => provider.saveText(write.path, write.text)));
    await Promise.all(
      Array.from(this.stale)
        .filter((path) => !written.has(path))
        .map((path) => provider.deleteText(path))
    );

    this.files = new Map(writes.map((write) => [write.key, write.path] as const));
    this.stale.clear();
  }

  /**
   * Remove a record; its file is deleted on the next save
   */
  override remove(key: KeyOf<S, K>): boolean {
    const path = this.files.get(key);
    const removed = super.remove(key);
    if (removed && path !== undefined) {
      this.files.delete(key);
      this.stale.add(path);
    }
    return removed;
  }
}

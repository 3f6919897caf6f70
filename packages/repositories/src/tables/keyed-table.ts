// Keyed, in-memory record store shared by file- and folder-backed tables

import type {
  DataFormat,
  KeyField,
  KeyOf,
  RecordOf,
  RecordSchema,
  TableLayout,
} from '@tablekit/protocol';
import type { Repository, RepositoryOperationOptions } from '../interfaces/repository.js';
import type { StorageProvider } from '../interfaces/storage-provider.js';
import type { SerializerFactory } from '../serializers/factory.js';
import { describeIssues, validateRecord } from '../serializers/records.js';
import { DuplicateKeyError, MalformedDataError, RecordNotFoundError } from '../errors.js';

export type KeyedTableOptions<S extends RecordSchema, K extends KeyField<S>> = {
  name: string;
  path: string;
  format?: DataFormat;
  schema: S;
  key: K;
};

/**
 * Records held by key in insertion order. Subclasses decide where the
 * records are stored; edits only touch memory until the next save.
 */
export abstract class KeyedTable<S extends RecordSchema, K extends KeyField<S>>
  implements Repository, Iterable<RecordOf<S>>
{
  readonly name: string;
  readonly path: string;
  readonly format: DataFormat | undefined;
  readonly layout: TableLayout<S, K>;

  protected items = new Map<KeyOf<S, K>, RecordOf<S>>();
  private loaded = false;

  constructor(options: KeyedTableOptions<S, K>) {
    this.name = options.name;
    this.path = options.path;
    this.format = options.format;
    this.layout = { name: options.name, schema: options.schema, key: options.key };
  }

  abstract load(
    provider: StorageProvider,
    serializers: SerializerFactory,
    options?: RepositoryOperationOptions
  ): Promise<void>;

  abstract save(
    provider: StorageProvider,
    serializers: SerializerFactory,
    options?: RepositoryOperationOptions
  ): Promise<void>;

  get isLoaded(): boolean {
    return this.loaded;
  }

  get count(): number {
    return this.items.size;
  }

  /**
   * Current records by key
   */
  get loadedItems(): ReadonlyMap<KeyOf<S, K>, RecordOf<S>> {
    return this.items;
  }

  /**
   * @throws RecordNotFoundError if no record has this key
   */
  get(key: KeyOf<S, K>): RecordOf<S> {
    const record = this.items.get(key);
    if (record === undefined) {
      throw new RecordNotFoundError(this.name, String(key));
    }
    return record;
  }

  tryGet(key: KeyOf<S, K>): RecordOf<S> | undefined {
    return this.items.get(key);
  }

  has(key: KeyOf<S, K>): boolean {
    return this.items.has(key);
  }

  keys(): IterableIterator<KeyOf<S, K>> {
    return this.items.keys();
  }

  values(): IterableIterator<RecordOf<S>> {
    return this.items.values();
  }

  entries(): IterableIterator<[KeyOf<S, K>, RecordOf<S>]> {
    return this.items.entries();
  }

  [Symbol.iterator](): IterableIterator<RecordOf<S>> {
    return this.items.values();
  }

  find(predicate: (record: RecordOf<S>) => boolean): RecordOf<S>[] {
    return Array.from(this.items.values()).filter(predicate);
  }

  /**
   * Append a new record.
   *
   * @throws DuplicateKeyError if the key is taken
   */
  add(input: unknown): RecordOf<S> {
    const record = this.validate(input);
    const key = record[this.layout.key];
    if (this.items.has(key)) {
      throw new DuplicateKeyError(this.path, String(key));
    }
    this.items.set(key, record);
    return record;
  }

  /**
   * Replace an existing record in place, keeping its position.
   *
   * @throws RecordNotFoundError if the key is absent
   */
  update(input: unknown): RecordOf<S> {
    const record = this.validate(input);
    const key = record[this.layout.key];
    if (!this.items.has(key)) {
      throw new RecordNotFoundError(this.name, String(key));
    }
    this.items.set(key, record);
    return record;
  }

  /**
   * @returns true if a record was removed
   */
  remove(key: KeyOf<S, K>): boolean {
    return this.items.delete(key);
  }

  protected validate(input: unknown): RecordOf<S> {
    const result = validateRecord(this.layout.schema, input);
    if (!result.success) {
      const { field, reason } = describeIssues(result.error);
      throw new MalformedDataError(this.path, `invalid ${this.name} record (${reason})`, { field });
    }
    return result.data;
  }

  protected swap(next: Map<KeyOf<S, K>, RecordOf<S>>): void {
    this.items = next;
    this.loaded = true;
  }
}

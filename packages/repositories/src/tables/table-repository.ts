// Keyed, in-memory table backed by one file

import type { KeyField, RecordSchema } from '@tablekit/protocol';
import type { RepositoryOperationOptions } from '../interfaces/repository.js';
import type { StorageProvider } from '../interfaces/storage-provider.js';
import { defaultSerializerFactory, type SerializerFactory } from '../serializers/factory.js';
import { TableAnnotations } from '../serializers/annotations.js';
import { throwIfCancelled } from '../errors.js';
import { KeyedTable, type KeyedTableOptions } from './keyed-table.js';

/**
 * Declaration of a table: what it holds and where it lives
 */
export type TableOptions<S extends RecordSchema, K extends KeyField<S>> = KeyedTableOptions<S, K>;

/**
 * Repository of records keyed by one field, stored together in one file.
 *
 * Loads build a complete new table and swap it in only when every step
 * succeeded, so a failed load leaves the previous contents untouched.
 * Iteration follows source order. Annotation columns read with the
 * records are written back on save.
 */
export class TableRepository<S extends RecordSchema, K extends KeyField<S>> extends KeyedTable<S, K> {
  private notes = new TableAnnotations();

  /**
   * Annotation columns and cells from the last load
   */
  get annotations(): TableAnnotations {
    return this.notes;
  }

  async load(
    provider: StorageProvider,
    serializers: SerializerFactory,
    options: RepositoryOperationOptions = {}
  ): Promise<void> {
    const { signal } = options;
    throwIfCancelled(signal, this.path);

    const text = await provider.loadText(this.path);
    throwIfCancelled(signal, this.path);

    const serializer = serializers.forPath(this.path, this.format);
    const notes = new TableAnnotations();
    const next = serializer.parseTable(text, this.layout, this.path, notes);
    throwIfCancelled(signal, this.path);

    this.swap(next);
    this.notes = notes;
  }

  /**
   * Replace contents from text already in hand
   */
  loadFromText(text: string, serializers: SerializerFactory = defaultSerializerFactory, source = this.path): void {
    const serializer = serializers.forPath(source, this.format);
    const notes = new TableAnnotations();
    this.swap(serializer.parseTable(text, this.layout, source, notes));
    this.notes = notes;
  }

  async save(
    provider: StorageProvider,
    serializers: SerializerFactory,
    options: RepositoryOperationOptions = {}
  ): Promise<void> {
    const { signal } = options;
    throwIfCancelled(signal, this.path);

    const serializer = serializers.forPath(this.path, this.format);
    const text = serializer.renderTable(this.items.values(), this.layout, this.notes);
    throwIfCancelled(signal, this.path);

    await provider.saveText(this.path, text);
  }
}

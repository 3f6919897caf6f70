import type { DataFormat } from '@tablekit/protocol';
import type { StorageProvider } from './storage-provider.js';
import type { SerializerFactory } from '../serializers/factory.js';

/**
 * Options for a single repository load or save
 */
export type RepositoryOperationOptions = {
  /**
   * Cancels the operation at its next checkpoint
   */
  signal?: AbortSignal;
};

/**
 * What a data context needs from every repository it owns.
 *
 * A repository knows its own path and format; the provider and the
 * serializer factory are handed in by the caller so the same repository
 * type works against any backend.
 */
export interface Repository {
  /**
   * Entity name (e.g. "Character")
   */
  readonly name: string;

  /**
   * Logical path of the backing file, or folder for folder-backed tables
   */
  readonly path: string;

  /**
   * Explicit format, or undefined to detect it from the path's extension
   */
  readonly format: DataFormat | undefined;

  /**
   * True once a load has succeeded
   */
  readonly isLoaded: boolean;

  /**
   * Read, parse and swap in new contents. On failure the previous
   * contents are left as they were.
   */
  load(
    provider: StorageProvider,
    serializers: SerializerFactory,
    options?: RepositoryOperationOptions
  ): Promise<void>;

  /**
   * Render current contents and write them to the repository's path
   */
  save(
    provider: StorageProvider,
    serializers: SerializerFactory,
    options?: RepositoryOperationOptions
  ): Promise<void>;
}

/**
 * A field whose values are keys of another declared table
 */
export type RepositoryReference = {
  readonly field: string;
  readonly target: RepositoryDefinition;
};

/**
 * A declared repository: enough to build a fresh, empty instance.
 * Each context instance creates its own repositories from definitions.
 */
export interface RepositoryDefinition<R extends Repository = Repository> {
  readonly name: string;
  readonly path: string;
  readonly format: DataFormat | undefined;

  /**
   * Reference fields of the records, checked when a context is declared
   */
  readonly references?: readonly RepositoryReference[];

  createRepository(): R;
}

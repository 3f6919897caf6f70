// Repository declarations

import type { z } from 'zod';
import type { KeyField, RecordSchema } from '@tablekit/protocol';
import type { Repository, RepositoryDefinition } from '../interfaces/repository.js';
import { ConfigurationError } from '../errors.js';
import type { KeyedTable } from './keyed-table.js';
import { TableRepository, type TableOptions } from './table-repository.js';
import { FolderTableRepository, type FolderTableOptions } from './folder-table-repository.js';
import { SingleRepository, type SingleOptions } from './single-repository.js';
import { referencesOf } from './refs.js';
import { DEFAULT_MULTI_FILE_PATTERN } from '../interfaces/storage-provider.js';

/**
 * A declared table of keyed records, stored in one file or in a folder
 */
export type KeyedTableDefinition<
  S extends RecordSchema,
  K extends KeyField<S>,
  R extends KeyedTable<S, K> = KeyedTable<S, K>,
> = RepositoryDefinition<R> & {
  readonly schema: S;
  readonly key: K;

  /**
   * The given repository when this definition created it
   */
  instanceFrom(repository: Repository): R | undefined;
};

export type TableDefinition<S extends RecordSchema, K extends KeyField<S>> = KeyedTableDefinition<
  S,
  K,
  TableRepository<S, K>
>;

export type FolderTableDefinition<S extends RecordSchema, K extends KeyField<S>> = KeyedTableDefinition<
  S,
  K,
  FolderTableRepository<S, K>
> & {
  readonly pattern: string;
};

export type SingleDefinition<S extends z.ZodTypeAny> = RepositoryDefinition<SingleRepository<S>> & {
  readonly schema: S;
};

function requireText(kind: string, field: string, value: string): void {
  if (!value.trim()) {
    throw new ConfigurationError(`Invalid ${kind} declaration`, [`${field}: must not be empty`]);
  }
}

function requireKey(name: string, schema: RecordSchema, key: string): void {
  if (!Object.hasOwn(schema.shape, key)) {
    throw new ConfigurationError(`Invalid table declaration for ${name}`, [
      `key: "${key}" is not a field of the schema`,
    ]);
  }
}

/**
 * Remember the repositories a definition creates so they can be found again
 */
function tracked<R extends Repository>(create: () => R) {
  const instances = new WeakMap<Repository, R>();
  return {
    createRepository(): R {
      const repository = create();
      instances.set(repository, repository);
      return repository;
    },
    instanceFrom(repository: Repository): R | undefined {
      return instances.get(repository);
    },
  };
}

/**
 * Declare a keyed table stored in one file.
 *
 * @example
 * const Character = defineTable({
 *   name: 'Character',
 *   path: 'Characters.csv',
 *   schema: z.object({ id: z.string(), level: z.number() }),
 *   key: 'id',
 * });
 */
export function defineTable<S extends RecordSchema, K extends KeyField<S>>(
  options: TableOptions<S, K>
): TableDefinition<S, K> {
  requireText('table', 'name', options.name);
  requireText('table', 'path', options.path);
  requireKey(options.name, options.schema, options.key);

  return {
    name: options.name,
    path: options.path,
    format: options.format,
    schema: options.schema,
    key: options.key,
    references: referencesOf(options.schema),
    ...tracked(() => new TableRepository(options)),
  };
}

/**
 * Declare a keyed table stored one record per file in a folder.
 *
 * @example
 * const Quest = defineFolderTable({
 *   name: 'Quest',
 *   folder: 'Quests',
 *   pattern: '*.yaml',
 *   schema: z.object({ id: z.string(), title: z.string() }),
 *   key: 'id',
 * });
 */
export function defineFolderTable<S extends RecordSchema, K extends KeyField<S>>(
  options: FolderTableOptions<S, K>
): FolderTableDefinition<S, K> {
  requireText('folder table', 'name', options.name);
  requireText('folder table', 'folder', options.folder);
  requireKey(options.name, options.schema, options.key);

  return {
    name: options.name,
    path: options.folder,
    format: options.format,
    pattern: options.pattern ?? DEFAULT_MULTI_FILE_PATTERN,
    schema: options.schema,
    key: options.key,
    references: referencesOf(options.schema),
    ...tracked(() => new FolderTableRepository(options)),
  };
}

/**
 * Declare a single-object resource
 */
export function defineSingle<S extends z.ZodTypeAny>(options: SingleOptions<S>): SingleDefinition<S> {
  requireText('single', 'name', options.name);
  requireText('single', 'path', options.path);

  return {
    name: options.name,
    path: options.path,
    format: options.format,
    schema: options.schema,
    createRepository: () => new SingleRepository(options),
  };
}

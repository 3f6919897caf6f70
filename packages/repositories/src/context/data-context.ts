// Data context - a fixed set of repositories loaded and saved together
//
// Each context instance owns its provider and its repositories. Only the
// serializer factory may be shared between instances.

import {
  DEFAULT_CSV_ARRAY_DELIMITER,
  DEFAULT_CSV_FIELD_DELIMITER,
  parseConfig,
  type DataContextConfig,
  type DataContextConfigInput,
  type KeyField,
  type KeyOf,
  type RecordOf,
  type RecordSchema,
} from '@tablekit/protocol';
import type {
  Repository,
  RepositoryDefinition,
  RepositoryOperationOptions,
} from '../interfaces/repository.js';
import type { StorageProvider } from '../interfaces/storage-provider.js';
import {
  createSerializerFactory,
  defaultSerializerFactory,
  type SerializerFactory,
} from '../serializers/factory.js';
import { createFileSystemProvider } from '../providers/fs.js';
import type { KeyedTableDefinition } from '../tables/define.js';
import {
  LocalizationContext,
  localizationOptionsFromConfig,
} from '../localization/localization-context.js';
import { createConsoleLogger, type DataLogger } from '../logging.js';
import {
  ConfigurationError,
  ContextNotLoadedError,
  OperationCancelledError,
  RepositoryOperationError,
  toError,
  type RepositoryOperation,
} from '../errors.js';

/**
 * Repository declarations of a context, by property name
 */
export type RepositoryMap = Record<string, RepositoryDefinition>;

/**
 * Repository instances of a context, typed from its declarations
 */
export type RepositoriesOf<D extends RepositoryMap> = {
  readonly [N in keyof D]: ReturnType<D[N]['createRepository']>;
};

export type ContextState = 'unloaded' | 'loading' | 'loaded' | 'failed';

export type DataContextOptions = {
  /**
   * Storage backend. The context takes ownership and closes it.
   */
  provider?: StorageProvider;

  /**
   * Root folder for a file-system provider, used when no provider is given
   */
  basePath?: string;

  /**
   * Serializers to use. Defaults to the shared factory, or a new one when
   * the configuration changes the CSV delimiters.
   */
  serializers?: SerializerFactory;

  /**
   * Overrides on top of the definition's defaults
   */
  config?: DataContextConfigInput;

  logger?: DataLogger;
};

/**
 * One unit of work in a load or save batch
 */
type BatchTask = {
  name: string;
  path: string;
  run(signal: AbortSignal): Promise<void>;
};

function instantiate<D extends RepositoryMap>(
  definitions: D
): { repos: RepositoriesOf<D>; byProperty: Map<string, Repository> };
function instantiate(definitions: RepositoryMap): {
  repos: Record<string, Repository>;
  byProperty: Map<string, Repository>;
} {
  const repos: Record<string, Repository> = {};
  const byProperty = new Map<string, Repository>();
  for (const [property, definition] of Object.entries(definitions)) {
    const repository = definition.createRepository();
    repos[property] = repository;
    byProperty.set(property, repository);
  }
  return { repos, byProperty };
}

function resolveProvider(options: DataContextOptions): StorageProvider {
  if (options.provider && options.basePath !== undefined) {
    throw new ConfigurationError('Pass either a provider or a basePath, not both');
  }
  if (options.provider) {
    return options.provider;
  }
  if (options.basePath !== undefined) {
    return createFileSystemProvider(options.basePath);
  }
  throw new ConfigurationError('A data context needs a provider or a basePath');
}

function resolveSerializers(config: DataContextConfig, serializers?: SerializerFactory): SerializerFactory {
  if (serializers) {
    return serializers;
  }
  if (
    config.csvFieldDelimiter === DEFAULT_CSV_FIELD_DELIMITER &&
    config.csvArrayDelimiter === DEFAULT_CSV_ARRAY_DELIMITER
  ) {
    return defaultSerializerFactory;
  }
  return createSerializerFactory({
    csv: { delimiter: config.csvFieldDelimiter, arrayDelimiter: config.csvArrayDelimiter },
  });
}

export class DataContext<D extends RepositoryMap> {
  readonly name: string;
  readonly config: DataContextConfig;
  readonly repos: RepositoriesOf<D>;
  readonly provider: StorageProvider;
  readonly serializers: SerializerFactory;

  private readonly repositories: Map<string, Repository>;
  private readonly localizationContext: LocalizationContext | undefined;
  private readonly logger: DataLogger;
  private currentState: ContextState = 'unloaded';
  private closed = false;

  /**
   * @throws ConfigurationError on invalid configuration or a missing provider
   */
  constructor(definitions: D, config: DataContextConfig, options: DataContextOptions = {}) {
    this.config = config;
    this.name = config.contextName;
    this.provider = resolveProvider(options);
    this.serializers = resolveSerializers(config, options.serializers);
    this.logger =
      options.logger ??
      createConsoleLogger({
        debug: config.enableDebugLogging,
        scope: `${config.generatedNamespace}.${config.contextName}`,
      });

    const { repos, byProperty } = instantiate(definitions);
    this.repos = repos;
    this.repositories = byProperty;

    this.localizationContext = config.enableLocalization
      ? new LocalizationContext(this.provider, this.serializers, localizationOptionsFromConfig(config), this.logger)
      : undefined;
  }

  get state(): ContextState {
    return this.currentState;
  }

  get isLoaded(): boolean {
    return this.currentState === 'loaded';
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @throws ConfigurationError if localization is not enabled
   */
  get localization(): LocalizationContext {
    if (!this.localizationContext) {
      throw new ConfigurationError(`Localization is not enabled for ${this.name}`);
    }
    return this.localizationContext;
  }

  /**
   * @throws ContextNotLoadedError unless the last loadAll succeeded
   */
  requireLoaded(): void {
    if (this.currentState !== 'loaded') {
      throw new ContextNotLoadedError(this.name, this.currentState);
    }
  }

  /**
   * Load every repository, and localization when enabled, concurrently.
   * The first failure cancels the rest and is rethrown with the failing
   * repository's identity; the context is then in the "failed" state.
   */
  async loadAll(options: RepositoryOperationOptions = {}): Promise<void> {
    this.currentState = 'loading';
    try {
      await this.runBatch('load', options.signal);
      this.currentState = 'loaded';
    } catch (error) {
      this.currentState = 'failed';
      throw error;
    }
  }

  /**
   * Write every repository, and localization when enabled.
   *
   * @throws ContextNotLoadedError unless the context is loaded
   */
  async saveAll(options: RepositoryOperationOptions = {}): Promise<void> {
    this.requireLoaded();
    await this.runBatch('save', options.signal);
  }

  /**
   * Reload one repository. Errors propagate unchanged and the context's
   * state is not affected.
   */
  async reload(name: keyof D & string, options: RepositoryOperationOptions = {}): Promise<void> {
    const repository = this.repositories.get(name);
    if (!repository) {
      throw new ConfigurationError(`${this.name} has no repository ${name}`);
    }
    await repository.load(this.provider, this.serializers, options);
    this.logger.debug('Repository reloaded', { repository: repository.name, path: repository.path });
  }

  /**
   * Follow a reference field: the record of `table` whose key is `value`.
   * An empty value, or a key with no record, gives undefined.
   *
   * @throws ConfigurationError if `table` is not part of this context
   */
  resolveRef<S extends RecordSchema, K extends KeyField<S>>(
    table: KeyedTableDefinition<S, K>,
    value: KeyOf<S, K> | '' | null | undefined
  ): RecordOf<S> | undefined {
    const repository = this.tableFor(table);
    if (value === undefined || value === null || value === '') {
      return undefined;
    }
    return repository.tryGet(value);
  }

  /**
   * Release the provider. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.provider.close();
    this.logger.debug('Context closed', { context: this.name });
  }

  private tableFor<S extends RecordSchema, K extends KeyField<S>>(table: KeyedTableDefinition<S, K>) {
    for (const repository of this.repositories.values()) {
      const instance = table.instanceFrom(repository);
      if (instance) {
        return instance;
      }
    }
    throw new ConfigurationError(`${this.name} has no repository for ${table.name}`);
  }

  private batchTasks(operation: RepositoryOperation): BatchTask[] {
    const tasks: BatchTask[] = Array.from(this.repositories.values(), (repository) => ({
      name: repository.name,
      path: repository.path,
      run: (signal) =>
        operation === 'load'
          ? repository.load(this.provider, this.serializers, { signal })
          : repository.save(this.provider, this.serializers, { signal }),
    }));

    const localization = this.localizationContext;
    if (localization) {
      tasks.push({
        name: 'Localization',
        path: this.config.localizationKeyPath,
        run: (signal) => (operation === 'load' ? localization.load({ signal }) : localization.save({ signal })),
      });
    }

    return tasks;
  }

  private async runBatch(operation: RepositoryOperation, external: AbortSignal | undefined): Promise<void> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    if (external?.aborted) {
      controller.abort();
    } else {
      external?.addEventListener('abort', forwardAbort, { once: true });
    }

    const failures: RepositoryOperationError[] = [];
    const cancellations: RepositoryOperationError[] = [];

    const run = async (task: BatchTask): Promise<void> => {
      this.logger.debug(`${operation} started`, { repository: task.name, path: task.path });
      try {
        await task.run(controller.signal);
        this.logger.debug(`${operation} completed`, { repository: task.name, path: task.path });
      } catch (error) {
        const wrapped = new RepositoryOperationError({
          contextName: this.name,
          repository: task.name,
          path: task.path,
          operation,
          cause: toError(error),
        });

        if (error instanceof OperationCancelledError) {
          cancellations.push(wrapped);
          return;
        }

        failures.push(wrapped);
        this.logger.error(`${operation} failed`, {
          repository: task.name,
          path: task.path,
          error: wrapped.message,
        });
        controller.abort();
      }
    };

    try {
      await Promise.all(this.batchTasks(operation).map(run));
    } finally {
      external?.removeEventListener('abort', forwardAbort);
    }

    if (failures.length > 0) {
      throw failures[0];
    }
    if (cancellations.length > 0) {
      throw cancellations[0];
    }
  }
}

/**
 * A declared context shape. `create` builds independent instances.
 */
export type DataContextDefinition<D extends RepositoryMap> = {
  readonly name: string;
  readonly repositories: D;
  readonly defaults: DataContextConfigInput;
  create(options?: DataContextOptions): DataContext<D>;
};

/**
 * Declare a data context.
 *
 * @example
 * const GameData = defineDataContext('GameData', { Character, Item });
 * const game = GameData.create({ basePath: './data' });
 * await game.loadAll();
 * game.repos.Character.get('hero');
 *
 * @throws ConfigurationError on an empty or duplicate repository name, or
 * a reference field whose table is not part of the context
 */
export function defineDataContext<D extends RepositoryMap>(
  name: string,
  repositories: D,
  defaults: DataContextConfigInput = {}
): DataContextDefinition<D> {
  const issues: string[] = [];
  if (!name.trim()) {
    issues.push('name: must not be empty');
  }

  const seen = new Set<string>();
  for (const [property, definition] of Object.entries(repositories)) {
    if (!property.trim() || !definition.name.trim()) {
      issues.push(`repositories: names must not be empty`);
    } else if (seen.has(definition.name)) {
      issues.push(`repositories: duplicate name "${definition.name}"`);
    }
    seen.add(definition.name);
  }

  const declared = new Set<RepositoryDefinition>(Object.values(repositories));
  for (const definition of Object.values(repositories)) {
    for (const reference of definition.references ?? []) {
      if (!declared.has(reference.target)) {
        issues.push(
          `repositories: ${definition.name}.${reference.field} refers to ${reference.target.name}, which is not part of the context`
        );
      }
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid data context ${name}`, issues);
  }

  return {
    name,
    repositories,
    defaults,
    create(options: DataContextOptions = {}) {
      const parsed = parseConfig({ contextName: name, ...defaults, ...options.config });
      if (!parsed.success) {
        throw new ConfigurationError(`Invalid configuration for ${name}`, parsed.issues);
      }
      return new DataContext(repositories, parsed.config, options);
    },
  };
}

// Repository holding one object resource (settings, balance tables)

import type { z } from 'zod';
import type { DataFormat } from '@tablekit/protocol';
import type { Repository, RepositoryOperationOptions } from '../interfaces/repository.js';
import type { StorageProvider } from '../interfaces/storage-provider.js';
import type { SerializerFactory } from '../serializers/factory.js';
import { describeIssues } from '../serializers/records.js';
import {
  MalformedDataError,
  NotFoundError,
  UnsupportedFormatError,
  throwIfCancelled,
} from '../errors.js';

export type SingleOptions<S extends z.ZodTypeAny> = {
  name: string;
  path: string;
  format?: DataFormat;
  schema: S;
};

export class SingleRepository<S extends z.ZodTypeAny> implements Repository {
  readonly name: string;
  readonly path: string;
  readonly format: DataFormat | undefined;
  readonly schema: S;

  private current: { value: z.infer<S> } | undefined;
  private loaded = false;

  constructor(options: SingleOptions<S>) {
    this.name = options.name;
    this.path = options.path;
    this.format = options.format;
    this.schema = options.schema;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  /**
   * @throws NotFoundError if nothing has been loaded or set
   */
  get(): z.infer<S> {
    if (!this.current) {
      throw new NotFoundError(`${this.name} has no value (${this.path} not loaded)`);
    }
    return this.current.value;
  }

  tryGet(): z.infer<S> | undefined {
    return this.current?.value;
  }

  set(input: unknown): z.infer<S> {
    const validator: z.ZodTypeAny = this.schema;
    const result = validator.safeParse(input);
    if (!result.success) {
      const { field, reason } = describeIssues(result.error);
      throw new MalformedDataError(this.path, `invalid ${this.name} (${reason})`, { field });
    }
    this.current = { value: result.data };
    return result.data;
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
    if (!serializer.parseSingle) {
      throw new UnsupportedFormatError(serializer.format, `cannot hold a single ${this.name} object`);
    }
    const value: z.infer<S> = serializer.parseSingle(text, this.schema, this.path);
    throwIfCancelled(signal, this.path);

    this.current = { value };
    this.loaded = true;
  }

  async save(
    provider: StorageProvider,
    serializers: SerializerFactory,
    options: RepositoryOperationOptions = {}
  ): Promise<void> {
    const { signal } = options;
    throwIfCancelled(signal, this.path);

    const serializer = serializers.forPath(this.path, this.format);
    if (!serializer.renderSingle) {
      throw new UnsupportedFormatError(serializer.format, `cannot hold a single ${this.name} object`);
    }
    const text = serializer.renderSingle(this.get());
    throwIfCancelled(signal, this.path);

    await provider.saveText(this.path, text);
  }
}

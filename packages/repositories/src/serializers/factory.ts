// Serializer factory - maps formats and file extensions to serializers

import { extensionOf, type DataFormat } from '@tablekit/protocol';
import type { FormatSerializer } from '../interfaces/format-serializer.js';
import { ConfigurationError, UnsupportedFormatError } from '../errors.js';
import { CsvSerializer, type CsvSerializerOptions } from './csv.js';
import { JsonSerializer } from './json.js';
import { NdjsonSerializer } from './ndjson.js';
import { YamlSerializer } from './yaml.js';

/**
 * Immutable set of serializers, looked up by format name or by the
 * extension of a path. Build a new factory to change the set.
 */
export class SerializerFactory {
  private readonly byFormat = new Map<string, FormatSerializer>();
  private readonly byExtension = new Map<string, FormatSerializer>();

  /**
   * @throws ConfigurationError if two serializers claim the same format or extension
   */
  constructor(serializers: Iterable<FormatSerializer>) {
    for (const serializer of serializers) {
      if (this.byFormat.has(serializer.format)) {
        throw new ConfigurationError(`Serializer already registered for format: ${serializer.format}`);
      }
      this.byFormat.set(serializer.format, serializer);

      for (const extension of serializer.extensions) {
        const normalized = extension.toLowerCase();
        const owner = this.byExtension.get(normalized);
        if (owner) {
          throw new ConfigurationError(
            `Extension ${normalized} is claimed by both ${owner.format} and ${serializer.format}`
          );
        }
        this.byExtension.set(normalized, serializer);
      }
    }
  }

  /**
   * Get the serializer for a format.
   *
   * @throws UnsupportedFormatError if none is registered
   */
  get(format: DataFormat): FormatSerializer {
    const serializer = this.byFormat.get(format);
    if (!serializer) {
      throw new UnsupportedFormatError(format);
    }
    return serializer;
  }

  has(format: DataFormat): boolean {
    return this.byFormat.has(format);
  }

  /**
   * Pick the serializer for a path. An explicit format wins over the
   * path's extension.
   *
   * @throws UnsupportedFormatError if neither resolves to a serializer
   */
  forPath(path: string, format?: DataFormat): FormatSerializer {
    if (format !== undefined) {
      return this.get(format);
    }

    const extension = extensionOf(path);
    const serializer = this.byExtension.get(extension);
    if (!serializer) {
      throw new UnsupportedFormatError(extension || path, `no serializer for ${path}`);
    }
    return serializer;
  }

  /**
   * Registered format names, in registration order
   */
  get formats(): string[] {
    return Array.from(this.byFormat.keys());
  }

  /**
   * New factory with the given serializers added. A serializer for a
   * format that is already registered replaces the existing one.
   */
  with(...serializers: FormatSerializer[]): SerializerFactory {
    const replaced = new Set(serializers.map((serializer) => serializer.format));
    const kept = Array.from(this.byFormat.values()).filter((serializer) => !replaced.has(serializer.format));
    return new SerializerFactory([...kept, ...serializers]);
  }
}

export type SerializerFactoryOptions = {
  /**
   * Options for the built-in CSV serializer
   */
  csv?: CsvSerializerOptions;
};

/**
 * Build a factory holding the built-in serializers
 */
export function createSerializerFactory(options: SerializerFactoryOptions = {}): SerializerFactory {
  return new SerializerFactory([
    new JsonSerializer(),
    new CsvSerializer(options.csv),
    new NdjsonSerializer(),
    new YamlSerializer(),
  ]);
}

/**
 * Shared factory with default CSV delimiters
 */
export const defaultSerializerFactory: SerializerFactory = createSerializerFactory();

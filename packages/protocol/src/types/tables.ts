// Record and table typing

import type { z } from 'zod';

/**
 * Primary key value of a record
 */
export type RecordKey = string | number;

/**
 * Schema describing one record of a table: a zod object.
 */
export type RecordSchema = z.AnyZodObject;

/**
 * Record type produced by a schema
 */
export type RecordOf<S extends RecordSchema> = z.infer<S>;

/**
 * Fields of a record whose (required) value can serve as the primary key
 */
export type KeyField<S extends RecordSchema> = {
  [F in keyof RecordOf<S>]-?: RecordOf<S>[F] extends RecordKey ? F : never;
}[keyof RecordOf<S>] &
  keyof RecordOf<S> &
  string;

/**
 * Key type of a table keyed by field K
 */
export type KeyOf<S extends RecordSchema, K extends KeyField<S>> = RecordOf<S>[K];

/**
 * Everything a serializer needs to know about a table's shape
 */
export type TableLayout<S extends RecordSchema, K extends KeyField<S>> = {
  /**
   * Entity name, used in diagnostics
   */
  readonly name: string;

  /**
   * Record schema; its keys give the column order when rendering
   */
  readonly schema: S;

  /**
   * Primary key field
   */
  readonly key: K;
};

/**
 * Position of a record in its source, for error reporting
 */
export type SourcePosition = {
  /**
   * 1-based line in the source text
   */
  line?: number;

  /**
   * 0-based index of the record in the source
   */
  record?: number;
};

// Record validation shared by every format

import { z } from 'zod';
import type {
  KeyField,
  KeyOf,
  RecordOf,
  RecordSchema,
  SourcePosition,
  TableLayout,
} from '@tablekit/protocol';
import { DuplicateKeyError, MalformedDataError } from '../errors.js';

/**
 * A decoded but not yet validated record and where it came from
 */
export type RawRecord = {
  value: unknown;
  position: SourcePosition;
};

/**
 * Run a record schema against a decoded value
 */
export function validateRecord<S extends RecordSchema>(
  schema: S,
  value: unknown
): z.SafeParseReturnType<unknown, RecordOf<S>> {
  const validator: z.ZodTypeAny = schema;
  return validator.safeParse(value);
}

/**
 * Summarize a zod error: the first failing field, and every issue message
 */
export function describeIssues(error: z.ZodError): { field?: string; reason: string } {
  const first = error.issues[0];
  const field = first && first.path.length > 0 ? first.path.join('.') : undefined;
  const reason = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return { field, reason };
}

/**
 * Validate decoded records and key them, preserving source order.
 *
 * @throws MalformedDataError when a record fails its schema or has no usable key
 * @throws DuplicateKeyError when a key repeats
 */
export function buildTable<S extends RecordSchema, K extends KeyField<S>>(
  rows: Iterable<RawRecord>,
  layout: TableLayout<S, K>,
  source: string
): Map<KeyOf<S, K>, RecordOf<S>> {
  const table = new Map<KeyOf<S, K>, RecordOf<S>>();

  for (const row of rows) {
    const result = validateRecord(layout.schema, row.value);
    if (!result.success) {
      const { field, reason } = describeIssues(result.error);
      throw new MalformedDataError(source, `invalid ${layout.name} record (${reason})`, {
        ...row.position,
        field,
      });
    }

    const record = result.data;
    const key = record[layout.key];
    if (typeof key !== 'string' && typeof key !== 'number') {
      throw new MalformedDataError(source, `${layout.name} record has no usable key`, {
        ...row.position,
        field: layout.key,
      });
    }

    if (table.has(key)) {
      throw new DuplicateKeyError(source, key, row.position);
    }
    table.set(key, record);
  }

  return table;
}

/**
 * Read one field of a record by name
 */
export function readField(record: object, field: string): unknown {
  return Reflect.get(record, field);
}

/**
 * Strip optional/nullable/default/effects wrappers to find a field's base type
 */
export function unwrapSchema(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return unwrapSchema(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return unwrapSchema(schema.removeDefault());
  }
  if (schema instanceof z.ZodEffects) {
    return unwrapSchema(schema.innerType());
  }
  return schema;
}

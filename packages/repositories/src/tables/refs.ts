// Reference fields: record fields holding the key of a record in another table

import { z } from 'zod';
import type { RecordSchema } from '@tablekit/protocol';
import type { RepositoryDefinition, RepositoryReference } from '../interfaces/repository.js';
import { unwrapSchema } from '../serializers/records.js';

const targets = new WeakMap<z.ZodTypeAny, RepositoryDefinition>();

/**
 * String field holding the key of a record in `table`.
 * An empty string means no reference.
 *
 * The mark survives `.optional()`, `.nullable()`, `.default()` and
 * `z.array(...)`; refinements made on the returned schema drop it.
 *
 * @example
 * const Weapon = defineTable({ name: 'Weapon', path: 'Weapons.csv', schema: WeaponSchema, key: 'id' });
 * const CharacterSchema = z.object({ id: z.string(), weaponId: ref(Weapon) });
 */
export function ref(table: RepositoryDefinition): z.ZodString {
  const schema = z.string();
  targets.set(schema, table);
  return schema;
}

/**
 * Integer field holding the key of a record in `table`
 */
export function intRef(table: RepositoryDefinition): z.ZodNumber {
  const schema = z.number().int();
  targets.set(schema, table);
  return schema;
}

/**
 * Table a field schema refers to, if it was made by `ref` or `intRef`
 */
export function refTarget(schema: z.ZodTypeAny): RepositoryDefinition | undefined {
  const base = unwrapSchema(schema);
  if (base instanceof z.ZodArray) {
    return refTarget(base.element);
  }
  return targets.get(base);
}

/**
 * Reference fields of a record schema, in declaration order
 */
export function referencesOf(schema: RecordSchema): RepositoryReference[] {
  const shape: z.ZodRawShape = schema.shape;
  return Object.entries(shape).flatMap(([field, fieldSchema]) => {
    const target = refTarget(fieldSchema);
    return target ? [{ field, target }] : [];
  });
}

// JSON serializer: tables are arrays of flat objects, single resources are one object.

import type { z } from 'zod';
import {
  DATA_FORMATS,
  FORMAT_EXTENSIONS,
  type KeyField,
  type KeyOf,
  type RecordOf,
  type RecordSchema,
  type TableLayout,
} from '@tablekit/protocol';
import type { FormatSerializer } from '../interfaces/format-serializer.js';
import { MalformedDataError, toError } from '../errors.js';
import { buildTable, describeIssues } from './records.js';

/**
 * Parse JSON text, reporting the failing line when the engine gives a position
 */
export function parseJsonText(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const cause = toError(error);
    const position = /position (\d+)/.exec(cause.message);
    const line = position ? lineAt(text, Number(position[1])) : undefined;
    throw new MalformedDataError(source, cause.message, { line }, { cause });
  }
}

function lineAt(text: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === '\n') line++;
  }
  return line;
}

export class JsonSerializer implements FormatSerializer {
  readonly format = DATA_FORMATS.JSON;
  readonly extensions = FORMAT_EXTENSIONS.json;

  parseTable<S extends RecordSchema, K extends KeyField<S>>(
    text: string,
    layout: TableLayout<S, K>,
    source: string
  ): Map<KeyOf<S, K>, RecordOf<S>> {
    if (!text.trim()) {
      return new Map();
    }

    const data = parseJsonText(text, source);
    if (!Array.isArray(data)) {
      throw new MalformedDataError(source, `expected an array of ${layout.name} records`);
    }

    return buildTable(
      data.map((value, index) => ({ value, position: { record: index } })),
      layout,
      source
    );
  }

  renderTable<S extends RecordSchema, K extends KeyField<S>>(
    records: Iterable<RecordOf<S>>,
    _layout: TableLayout<S, K>
  ): string {
    return JSON.stringify(Array.from(records), null, 2) + '\n';
  }

  parseSingle<S extends z.ZodTypeAny>(text: string, schema: S, source: string): z.infer<S> {
    const data = parseJsonText(text, source);
    const validator: z.ZodTypeAny = schema;
    const result = validator.safeParse(data);
    if (!result.success) {
      const { field, reason } = describeIssues(result.error);
      throw new MalformedDataError(source, reason, { field });
    }
    return result.data;
  }

  renderSingle(value: unknown): string {
    return JSON.stringify(value, null, 2) + '\n';
  }
}

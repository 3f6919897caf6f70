// YAML serializer: tables are sequences of mappings, single resources are one mapping.

import { CORE_SCHEMA, YAMLException, dump, load } from 'js-yaml';
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
import { MalformedDataError } from '../errors.js';
import { buildTable, describeIssues } from './records.js';

/**
 * Parse YAML text, reporting the line of a syntax error.
 * Scalars resolve as in JSON, so dates and the like stay strings.
 */
function parseYamlText(text: string, source: string): unknown {
  try {
    return load(text, { filename: source, schema: CORE_SCHEMA });
  } catch (error) {
    if (error instanceof YAMLException) {
      throw new MalformedDataError(source, error.reason, { line: error.mark.line + 1 }, { cause: error });
    }
    throw error;
  }
}

function renderYaml(value: unknown): string {
  return dump(value, { schema: CORE_SCHEMA, noRefs: true });
}

export class YamlSerializer implements FormatSerializer {
  readonly format = DATA_FORMATS.YAML;
  readonly extensions = FORMAT_EXTENSIONS.yaml;

  parseTable<S extends RecordSchema, K extends KeyField<S>>(
    text: string,
    layout: TableLayout<S, K>,
    source: string
  ): Map<KeyOf<S, K>, RecordOf<S>> {
    const data = parseYamlText(text, source);
    if (data === null || data === undefined) {
      return new Map();
    }
    if (!Array.isArray(data)) {
      throw new MalformedDataError(source, `expected a sequence of ${layout.name} records`);
    }

    return buildTable(
      data.map((value: unknown, index) => ({ value, position: { record: index } })),
      layout,
      source
    );
  }

  renderTable<S extends RecordSchema, K extends KeyField<S>>(
    records: Iterable<RecordOf<S>>,
    _layout: TableLayout<S, K>
  ): string {
    return renderYaml(Array.from(records));
  }

  parseSingle<S extends z.ZodTypeAny>(text: string, schema: S, source: string): z.infer<S> {
    const validator: z.ZodTypeAny = schema;
    const result = validator.safeParse(parseYamlText(text, source));
    if (!result.success) {
      const { field, reason } = describeIssues(result.error);
      throw new MalformedDataError(source, reason, { field });
    }
    return result.data;
  }

  renderSingle(value: unknown): string {
    return renderYaml(value);
  }
}

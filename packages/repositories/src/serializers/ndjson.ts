// NDJSON serializer: one record per line.

import {
  CodecError,
  DATA_FORMATS,
  FORMAT_EXTENSIONS,
  parseNdjson,
  stringifyNdjson,
  type KeyField,
  type KeyOf,
  type NdjsonEntry,
  type RecordOf,
  type RecordSchema,
  type TableLayout,
} from '@tablekit/protocol';
import type { FormatSerializer } from '../interfaces/format-serializer.js';
import { MalformedDataError } from '../errors.js';
import { buildTable } from './records.js';

export class NdjsonSerializer implements FormatSerializer {
  readonly format = DATA_FORMATS.NDJSON;
  readonly extensions = FORMAT_EXTENSIONS.ndjson;

  parseTable<S extends RecordSchema, K extends KeyField<S>>(
    text: string,
    layout: TableLayout<S, K>,
    source: string
  ): Map<KeyOf<S, K>, RecordOf<S>> {
    let entries: NdjsonEntry[];
    try {
      entries = parseNdjson(text);
    } catch (error) {
      if (error instanceof CodecError) {
        throw new MalformedDataError(source, error.reason, { line: error.line }, { cause: error });
      }
      throw error;
    }

    return buildTable(
      entries.map((entry, index) => ({ value: entry.value, position: { line: entry.line, record: index } })),
      layout,
      source
    );
  }

  renderTable<S extends RecordSchema, K extends KeyField<S>>(
    records: Iterable<RecordOf<S>>,
    _layout: TableLayout<S, K>
  ): string {
    return stringifyNdjson(Array.from(records));
  }
}

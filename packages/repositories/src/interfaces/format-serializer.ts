import type { z } from 'zod';
import type { DataFormat, KeyField, KeyOf, RecordOf, RecordSchema, TableLayout } from '@tablekit/protocol';
import type { TableAnnotations } from '../serializers/annotations.js';

/**
 * A FormatSerializer converts between raw text and records for one format.
 *
 * `parseTable` yields records in source order keyed by the layout's key
 * field; `renderTable` is its inverse, so parsing rendered text gives back
 * an equivalent table.
 *
 * Formats that carry annotation columns fill the `annotations` passed to
 * `parseTable` and write them back from the one passed to `renderTable`.
 * Other formats ignore the argument.
 */
export interface FormatSerializer {
  /**
   * Format identifier (e.g. "json", "csv")
   */
  readonly format: DataFormat;

  /**
   * Extensions claimed by this serializer, lower-case with the dot
   */
  readonly extensions: readonly string[];

  /**
   * Parse table text.
   * @param source Logical path of the text, used in error messages
   * @throws MalformedDataError on structural or schema failures
   * @throws DuplicateKeyError when two records share a key
   */
  parseTable<S extends RecordSchema, K extends KeyField<S>>(
    text: string,
    layout: TableLayout<S, K>,
    source: string,
    annotations?: TableAnnotations
  ): Map<KeyOf<S, K>, RecordOf<S>>;

  /**
   * Render records, in order, as table text
   */
  renderTable<S extends RecordSchema, K extends KeyField<S>>(
    records: Iterable<RecordOf<S>>,
    layout: TableLayout<S, K>,
    annotations?: TableAnnotations
  ): string;

  /**
   * Parse a single object resource. Absent for formats that only hold tables.
   */
  parseSingle?<S extends z.ZodTypeAny>(text: string, schema: S, source: string): z.infer<S>;

  /**
   * Render a single object resource
   */
  renderSingle?(value: unknown): string;
}

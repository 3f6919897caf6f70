// CSV serializer: a header row naming columns, then one record per row.
// Cells are coerced to the type the record schema declares for their column.

import { z } from 'zod';
import {
  CodecError,
  DATA_FORMATS,
  DEFAULT_CSV_ARRAY_DELIMITER,
  DEFAULT_CSV_FIELD_DELIMITER,
  FORMAT_EXTENSIONS,
  parseCsv,
  stringifyCsv,
  type CsvRow,
  type KeyField,
  type KeyOf,
  type RecordOf,
  type RecordSchema,
  type TableLayout,
} from '@tablekit/protocol';
import type { FormatSerializer } from '../interfaces/format-serializer.js';
import { ConfigurationError, MalformedDataError } from '../errors.js';
import { buildTable, readField, unwrapSchema, type RawRecord } from './records.js';
import { isAnnotationColumn, type AnnotationColumn, type TableAnnotations } from './annotations.js';

export type CsvSerializerOptions = {
  /**
   * Field delimiter (default ",")
   */
  delimiter?: string;

  /**
   * Separator between the items of an array cell (default "|")
   */
  arrayDelimiter?: string;
};

function acceptsMissing(schema: z.ZodTypeAny): boolean {
  return schema.isOptional() || schema instanceof z.ZodDefault;
}

function coerceScalar(cell: string, base: z.ZodTypeAny): unknown {
  if (base instanceof z.ZodNumber) {
    const value = Number(cell.trim());
    // Leave unparseable text in place so validation reports it
    return cell.trim() !== '' && !Number.isNaN(value) ? value : cell;
  }
  if (base instanceof z.ZodBoolean) {
    const lowered = cell.trim().toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
    return cell;
  }
  if (base instanceof z.ZodObject || base instanceof z.ZodRecord) {
    try {
      return JSON.parse(cell);
    } catch {
      return cell;
    }
  }
  return cell;
}

/**
 * Split an array cell on its delimiter. A backslash escapes the delimiter
 * or another backslash; any other backslash is kept as written.
 */
export function splitArrayCell(cell: string, arrayDelimiter: string): string[] {
  const items: string[] = [];
  let current = '';
  let i = 0;
  while (i < cell.length) {
    if (cell[i] === '\\') {
      const rest = cell.slice(i + 1);
      const escaped = rest.startsWith(arrayDelimiter) ? arrayDelimiter : rest.startsWith('\\') ? '\\' : undefined;
      if (escaped !== undefined) {
        current += escaped;
        i += 1 + escaped.length;
        continue;
      }
    }
    if (cell.startsWith(arrayDelimiter, i)) {
      items.push(current);
      current = '';
      i += arrayDelimiter.length;
      continue;
    }
    current += cell[i];
    i++;
  }
  items.push(current);
  return items;
}

function escapeArrayItem(item: string, arrayDelimiter: string): string {
  return item.replace(/\\/g, '\\\\').split(arrayDelimiter).join(`\\${arrayDelimiter}`);
}

/**
 * Convert one CSV cell to the value its column schema expects.
 * An empty cell is an empty array, an omitted value or null, in that
 * order, when the column accepts one. Values that cannot be converted
 * are passed through unchanged for the schema to reject.
 */
export function coerceCell(cell: string, schema: z.ZodTypeAny, arrayDelimiter: string): unknown {
  const base = unwrapSchema(schema);

  if (base instanceof z.ZodArray) {
    if (cell === '') return [];
    const element = unwrapSchema(base.element);
    return splitArrayCell(cell, arrayDelimiter).map((item) => coerceScalar(item, element));
  }

  if (cell === '') {
    if (acceptsMissing(schema)) return undefined;
    if (schema.isNullable()) return null;
  }

  return coerceScalar(cell, base);
}

/**
 * Render one field value as a CSV cell
 */
export function formatCell(value: unknown, arrayDelimiter: string): string {
  if (value === undefined || value === null) return '';
  if (Array.isArray(value)) {
    return value.map((item) => escapeArrayItem(formatCell(item, arrayDelimiter), arrayDelimiter)).join(arrayDelimiter);
  }
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export class CsvSerializer implements FormatSerializer {
  readonly format = DATA_FORMATS.CSV;
  readonly extensions = FORMAT_EXTENSIONS.csv;
  readonly delimiter: string;
  readonly arrayDelimiter: string;

  constructor(options: CsvSerializerOptions = {}) {
    this.delimiter = options.delimiter ?? DEFAULT_CSV_FIELD_DELIMITER;
    this.arrayDelimiter = options.arrayDelimiter ?? DEFAULT_CSV_ARRAY_DELIMITER;

    if (this.delimiter === this.arrayDelimiter) {
      throw new ConfigurationError('Invalid CSV serializer options', [
        'CSV array delimiter must differ from the field delimiter',
      ]);
    }
  }

  /**
   * Parse CSV text. Columns whose header starts with "~" are kept out of
   * the records; when `annotations` is given their cells are stored there.
   */
  parseTable<S extends RecordSchema, K extends KeyField<S>>(
    text: string,
    layout: TableLayout<S, K>,
    source: string,
    annotations?: TableAnnotations
  ): Map<KeyOf<S, K>, RecordOf<S>> {
    const [header, ...body] = this.decode(text, source);
    if (!header) {
      annotations?.reset([]);
      return new Map();
    }

    const columns = header.cells.map((cell) => cell.trim());
    const notes: AnnotationColumn[] = [];
    const seen = new Set<string>();
    columns.forEach((column, index) => {
      if (isAnnotationColumn(column)) {
        notes.push({ name: column, index });
        return;
      }
      if (seen.has(column)) {
        throw new MalformedDataError(source, `duplicate column "${column}"`, { line: header.line });
      }
      seen.add(column);
    });
    if (!seen.has(layout.key)) {
      throw new MalformedDataError(source, `missing key column "${layout.key}"`, { line: header.line });
    }

    const shape: z.ZodRawShape = layout.schema.shape;
    const fields = columns.map((column): z.ZodTypeAny | undefined => shape[column]);

    const records = body.map((row, index): RawRecord => {
      if (row.cells.length !== columns.length) {
        throw new MalformedDataError(
          source,
          `expected ${columns.length} columns but found ${row.cells.length}`,
          { line: row.line, record: index }
        );
      }

      const value: Record<string, unknown> = {};
      row.cells.forEach((cell, i) => {
        if (isAnnotationColumn(columns[i])) return;
        const field = fields[i];
        value[columns[i]] = field ? coerceCell(cell, field, this.arrayDelimiter) : cell;
      });
      return { value, position: { line: row.line, record: index } };
    });

    const table = buildTable(records, layout, source);

    if (annotations) {
      annotations.reset(notes);
      // buildTable keeps source order, so keys line up with body rows
      Array.from(table.keys()).forEach((key, index) => {
        annotations.setRow(
          key,
          notes.map((note) => body[index].cells[note.index])
        );
      });
    }

    return table;
  }

  /**
   * Render records with the schema's columns in declaration order.
   * Annotation columns are put back at their source positions.
   */
  renderTable<S extends RecordSchema, K extends KeyField<S>>(
    records: Iterable<RecordOf<S>>,
    layout: TableLayout<S, K>,
    annotations?: TableAnnotations
  ): string {
    const columns = Object.keys(layout.schema.shape);
    const notes = annotations?.columns ?? [];

    const withNotes = (cells: string[], noteCells: readonly string[]): string[] => {
      const row = [...cells];
      notes.forEach((note, i) => {
        row.splice(Math.min(note.index, row.length), 0, noteCells[i] ?? '');
      });
      return row;
    };

    const rows: string[][] = [
      withNotes(
        columns,
        notes.map((note) => note.name)
      ),
    ];
    for (const record of records) {
      const cells = columns.map((column) => formatCell(readField(record, column), this.arrayDelimiter));
      const key = record[layout.key];
      rows.push(withNotes(cells, annotations ? annotations.row(key) : []));
    }
    return stringifyCsv(rows, this.delimiter);
  }

  private decode(text: string, source: string): CsvRow[] {
    try {
      return parseCsv(text, { delimiter: this.delimiter });
    } catch (error) {
      if (error instanceof CodecError) {
        throw new MalformedDataError(source, error.reason, { line: error.line }, { cause: error });
      }
      throw error;
    }
  }
}

// CSV text codec
// RFC 4180 style: quoted fields may hold delimiters, doubled quotes and line breaks.

import { CodecError } from './errors.js';

/**
 * One parsed CSV row. `line` is where the row starts in the source.
 */
export type CsvRow = {
  line: number;
  cells: string[];
};

export type CsvOptions = {
  /**
   * Field delimiter.
   * @default ','
   */
  delimiter?: string;
};

const BOM = 0xfeff;

/**
 * Split CSV text into rows of raw cells.
 *
 * Blank lines are skipped, CRLF and LF are both accepted and a leading
 * byte order mark is dropped. Cells are returned untrimmed.
 */
export function parseCsv(content: string, options: CsvOptions = {}): CsvRow[] {
  const delimiter = options.delimiter ?? ',';
  const text = content.charCodeAt(0) === BOM ? content.slice(1) : content;

  const rows: CsvRow[] = [];
  let cells: string[] = [];
  let field = '';
  let quoted = false;
  let inQuotes = false;
  let quoteLine = 0;
  let line = 1;
  let rowLine = 1;

  const endField = () => {
    cells.push(field);
    field = '';
    quoted = false;
  };

  const endRow = () => {
    const blank = cells.length === 0 && field === '' && !quoted;
    endField();
    if (!blank) {
      rows.push({ line: rowLine, cells });
    }
    cells = [];
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line++;
        field += char;
      }
      continue;
    }

    if (char === delimiter) {
      endField();
      continue;
    }

    if (char === '\r' || char === '\n') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      endRow();
      line++;
      rowLine = line;
      continue;
    }

    if (quoted) {
      throw new CodecError(`Unexpected character ${JSON.stringify(char)} after closing quote`, line);
    }

    if (char === '"') {
      if (field.length > 0) {
        throw new CodecError('Unexpected quote inside unquoted field', line);
      }
      inQuotes = true;
      quoted = true;
      quoteLine = line;
      continue;
    }

    field += char;
  }

  if (inQuotes) {
    throw new CodecError('Unterminated quoted field', quoteLine);
  }

  if (cells.length > 0 || field !== '' || quoted) {
    endRow();
  }

  return rows;
}

/**
 * Quote a cell when it holds the delimiter, a quote or a line break
 */
export function escapeCsvField(value: string, delimiter = ','): string {
  const needsQuoting =
    value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r');

  if (!needsQuoting) {
    return value;
  }

  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Render one row. A lone empty cell is written as `""` so it is not read back as a blank line.
 */
export function stringifyCsvRow(cells: readonly string[], delimiter = ','): string {
  if (cells.length === 1 && cells[0] === '') {
    return '""';
  }
  return cells.map((cell) => escapeCsvField(cell, delimiter)).join(delimiter);
}

/**
 * Render rows as CSV text with LF line endings and a trailing newline
 */
export function stringifyCsv(rows: ReadonlyArray<readonly string[]>, delimiter = ','): string {
  if (rows.length === 0) {
    return '';
  }
  return rows.map((row) => stringifyCsvRow(row, delimiter)).join('\n') + '\n';
}

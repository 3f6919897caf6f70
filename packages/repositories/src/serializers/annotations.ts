// Annotation columns: designer notes kept beside a table's records.
// A column whose header starts with "~" is never validated against the
// record schema; its cells are carried per record and written back in place.

export const ANNOTATION_PREFIX = '~';

export type AnnotationColumn = {
  /**
   * Header text, including the prefix. Several columns may share a name.
   */
  name: string;

  /**
   * Position of the column in the source header
   */
  index: number;
};

export function isAnnotationColumn(name: string): boolean {
  return name.startsWith(ANNOTATION_PREFIX);
}

/**
 * Annotation cells of one table, by record key
 */
export class TableAnnotations {
  private columnList: AnnotationColumn[] = [];
  private readonly rows = new Map<unknown, string[]>();

  /**
   * Annotation columns in header order
   */
  get columns(): readonly AnnotationColumn[] {
    return this.columnList;
  }

  get isEmpty(): boolean {
    return this.columnList.length === 0;
  }

  /**
   * Start over with a new set of columns and no cells
   */
  reset(columns: AnnotationColumn[]): void {
    this.columnList = [...columns].sort((a, b) => a.index - b.index);
    this.rows.clear();
  }

  setRow(key: unknown, values: string[]): void {
    this.rows.set(key, values);
  }

  /**
   * Cells for a record; a record without annotations gets empty cells
   */
  row(key: unknown): string[] {
    return this.rows.get(key) ?? this.columnList.map(() => '');
  }
}

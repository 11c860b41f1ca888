/**
 * In-memory tabular data
 *
 * The minimal table shape the environment needs: an ordered column list and
 * rows keyed by column name.
 */

export type CellValue = string | number | boolean | null;

export type Row = Record<string, CellValue>;

export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

/**
 * Loads a table from a path. Throws `NotFoundError` when nothing readable
 * exists at the path and `ParseError` on malformed content.
 */
export type TableLoader = (path: string) => Table;

export function createTable(columns: readonly string[], rows: readonly Row[] = []): Table {
  return { columns: [...columns], rows: rows.map((row) => ({ ...row })) };
}

/**
 * Structural check used where a dataset input may be a table, a path or a function
 */
export function isTable(value: unknown): value is Table {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const columns: unknown = Reflect.get(value, 'columns');
  const rows: unknown = Reflect.get(value, 'rows');
  return (
    Array.isArray(columns) &&
    columns.every((column) => typeof column === 'string') &&
    Array.isArray(rows)
  );
}

/**
 * Same column count and same set of column names; order is ignored
 */
export function haveSameColumnSet(left: Table, right: Table): boolean {
  const rightColumns = new Set(right.columns);
  return (
    left.columns.length === right.columns.length &&
    new Set(left.columns).size === rightColumns.size &&
    left.columns.every((column) => rightColumns.has(column))
  );
}

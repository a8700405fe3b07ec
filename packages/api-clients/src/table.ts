/**
 * Tabular results
 * ===============
 * Uniform rows keyed by column name. Every operation returns a new table, and
 * every row of a table carries exactly the table's columns.
 */

import { DateTime } from 'luxon';

export type Cell = string | number | boolean | DateTime | null;

export type Row = Record<string, Cell>;

export interface Table {
  columns: string[];
  rows: Row[];
  /** Column acting as the row index, when there is one */
  index?: string;
}

export const PLACEHOLDER = '-';

export function emptyTable(columns: readonly string[] = []): Table {
  return { columns: [...columns], rows: [] };
}

export function isEmptyTable(table: Table): boolean {
  return table.rows.length === 0;
}

/**
 * Normalize a JSON value into a cell. Arrays and objects are kept as their JSON text.
 */
export function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (DateTime.isDateTime(value)) return value;
  return JSON.stringify(value);
}

/**
 * Build a table from records. Columns are the union of keys in order of first
 * appearance; a key missing from a record becomes null.
 */
export function fromRecords(records: ReadonlyArray<Record<string, unknown>>): Table {
  const columns: string[] = [];
  const seen = new Set<string>();

  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const rows = records.map((record) => {
    const row: Row = {};
    for (const column of columns) {
      row[column] = toCell(record[column]);
    }
    return row;
  });

  return { columns, rows };
}

/**
 * Two-column Metric/Value table, one row per entry
 */
export function metricValueTable(entries: ReadonlyArray<readonly [string, Cell]>): Table {
  return {
    columns: ['Metric', 'Value'],
    rows: entries.map(([metric, value]) => ({ Metric: metric, Value: value })),
  };
}

export function fillMissing(table: Table, placeholder: Cell = PLACEHOLDER): Table {
  return {
    ...table,
    columns: [...table.columns],
    rows: table.rows.map((row) => {
      const filled: Row = {};
      for (const column of table.columns) {
        const value = row[column];
        filled[column] = value === null || value === undefined ? placeholder : value;
      }
      return filled;
    }),
  };
}

/**
 * Drop the named columns; names the table does not have are ignored
 */
export function dropColumns(table: Table, names: readonly string[]): Table {
  const dropped = new Set(names);
  const columns = table.columns.filter((column) => !dropped.has(column));
  return {
    ...table,
    columns,
    rows: table.rows.map((row) => pick(row, columns)),
    index: table.index !== undefined && dropped.has(table.index) ? undefined : table.index,
  };
}

/**
 * Drop columns whose every value is null. A table without rows is returned as is.
 */
export function dropEmptyColumns(table: Table): Table {
  if (isEmptyTable(table)) return table;
  const empty = table.columns.filter((column) => table.rows.every((row) => row[column] === null));
  return dropColumns(table, empty);
}

/**
 * Rename columns through a function or a lookup; unmapped names are kept
 */
export function renameColumns(
  table: Table,
  rename: ((column: string) => string) | Readonly<Record<string, string>>
): Table {
  const mapName =
    typeof rename === 'function' ? rename : (column: string) => rename[column] ?? column;
  const names = table.columns.map((column) => [column, mapName(column)] as const);

  return {
    ...table,
    columns: names.map(([, renamed]) => renamed),
    rows: table.rows.map((row) => {
      const renamedRow: Row = {};
      for (const [column, renamed] of names) {
        renamedRow[renamed] = row[column] ?? null;
      }
      return renamedRow;
    }),
    index: table.index !== undefined ? mapName(table.index) : undefined,
  };
}

/**
 * Replace every value of one column. A column the table does not have is left alone.
 */
export function mapColumn(table: Table, column: string, fn: (value: Cell, row: Row) => Cell): Table {
  if (!table.columns.includes(column)) return table;
  return {
    ...table,
    columns: [...table.columns],
    rows: table.rows.map((row) => ({ ...row, [column]: fn(row[column] ?? null, row) })),
  };
}

/**
 * Insert a derived column at `position` (0 = first)
 */
export function insertColumn(
  table: Table,
  position: number,
  name: string,
  fn: (row: Row) => Cell
): Table {
  const columns = table.columns.filter((column) => column !== name);
  columns.splice(position, 0, name);
  return {
    ...table,
    columns,
    rows: table.rows.map((row) => pick({ ...row, [name]: fn(row) }, columns)),
  };
}

/**
 * Stack two tables row-wise. Columns are the union; cells a side lacks become null.
 */
export function concatTables(top: Table, bottom: Table): Table {
  const columns = [...top.columns];
  for (const column of bottom.columns) {
    if (!columns.includes(column)) columns.push(column);
  }
  return {
    columns,
    rows: [...top.rows, ...bottom.rows].map((row) => pick(row, columns)),
  };
}

export function setIndex(table: Table, column: string): Table {
  if (!table.columns.includes(column)) return table;
  return { ...table, index: column };
}

/**
 * Parse a cell into a UTC DateTime. Unparseable values become null.
 */
export function toDateTime(value: Cell): Cell {
  if (value === null || DateTime.isDateTime(value)) return value;
  if (typeof value === 'number') return DateTime.fromMillis(value, { zone: 'utc' });
  if (typeof value !== 'string') return null;
  const parsed = DateTime.fromISO(value, { zone: 'utc' });
  return parsed.isValid ? parsed : null;
}

function pick(row: Row, columns: readonly string[]): Row {
  const picked: Row = {};
  for (const column of columns) {
    picked[column] = row[column] ?? null;
  }
  return picked;
}

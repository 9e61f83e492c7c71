import { TableShapeError } from "../errors";

/**
 * In-memory table handed to the statistics engine.
 * Columns are classified once, when the table is built.
 */

export interface NumericColumn {
  kind: "numeric";
  name: string;
  /** Declared storage type, e.g. "integer" or "double precision" */
  storageType: string;
  values: Array<number | null>;
}

export interface CategoricalColumn {
  kind: "categorical";
  name: string;
  storageType: string;
  values: Array<string | null>;
}

export type Column = NumericColumn | CategoricalColumn;

export type ColumnKind = Column["kind"];

export interface Table {
  readonly columns: readonly Column[];
  readonly rowCount: number;
}

/** Non-finite values (NaN, Infinity, -Infinity) are stored as missing */
export function numericColumn(
  name: string,
  values: Array<number | null>,
  storageType = "double precision"
): NumericColumn {
  return {
    kind: "numeric",
    name,
    storageType,
    values: values.map((v) => (v !== null && Number.isFinite(v) ? v : null)),
  };
}

export function categoricalColumn(
  name: string,
  values: Array<string | null>,
  storageType = "text"
): CategoricalColumn {
  return { kind: "categorical", name, storageType, values };
}

/**
 * Build a table, checking that column names are unique and all columns
 * have the same length. A table without columns has zero rows unless
 * `rowCount` says otherwise.
 */
export function createTable(columns: Column[], rowCount?: number): Table {
  const names = new Set<string>();
  for (const column of columns) {
    if (names.has(column.name)) {
      throw new TableShapeError(`Duplicate column name: ${column.name}`);
    }
    names.add(column.name);
  }

  const expected = rowCount ?? (columns.length > 0 ? columns[0].values.length : 0);
  for (const column of columns) {
    if (column.values.length !== expected) {
      throw new TableShapeError(
        `Column ${column.name} has ${column.values.length} values, expected ${expected}`
      );
    }
  }

  return { columns: [...columns], rowCount: expected };
}

/** Storage types (PostgreSQL and CSV-inferred) treated as numeric */
const NUMERIC_STORAGE_TYPES = new Set([
  "smallint",
  "integer",
  "bigint",
  "real",
  "double precision",
  "numeric",
  "float",
]);

export function isNumericStorageType(storageType: string): boolean {
  return NUMERIC_STORAGE_TYPES.has(storageType.toLowerCase());
}

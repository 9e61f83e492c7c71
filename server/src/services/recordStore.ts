import { RecordNotFoundError } from "../errors";
import {
  RecordCreate,
  RecordPage,
  RecordUpdate,
  StoredRecord,
  totalPages,
} from "../models/record";
import {
  Column,
  Table,
  categoricalColumn,
  createTable,
  isNumericStorageType,
  numericColumn,
} from "../models/table";
import { QueryExecutor, ResultField, queryOne } from "./dbConnection";

/**
 * Persistent store of uploaded records
 */
export interface RecordStore {
  ensureSchema(): Promise<void>;
  insertMany(inputs: RecordCreate[]): Promise<number>;
  list(page: number, perPage: number): Promise<RecordPage>;
  create(input: RecordCreate): Promise<StoredRecord>;
  update(id: number, patch: RecordUpdate): Promise<StoredRecord>;
  delete(id: number): Promise<void>;
  /** Snapshot of the whole table, columns typed from their storage types */
  loadTable(): Promise<Table>;
}

/** PostgreSQL type OIDs and their SQL names */
const PG_TYPE_NAMES: Record<number, string> = {
  16: "boolean",
  20: "bigint",
  21: "smallint",
  23: "integer",
  25: "text",
  700: "real",
  701: "double precision",
  1043: "character varying",
  1082: "date",
  1114: "timestamp",
  1184: "timestamptz",
  1700: "numeric",
};

export function pgTypeName(oid: number): string {
  return PG_TYPE_NAMES[oid] ?? `oid ${oid}`;
}

/** Result fields of `SELECT * FROM records` */
export const RECORD_FIELDS: ResultField[] = [
  { name: "id", dataTypeID: 23 },
  { name: "name", dataTypeID: 25 },
  { name: "age", dataTypeID: 23 },
  { name: "salary", dataTypeID: 701 },
  { name: "department", dataTypeID: 25 },
  { name: "experience", dataTypeID: 23 },
  { name: "created_at", dataTypeID: 1114 },
  { name: "updated_at", dataTypeID: 1114 },
];

function toNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  // bigint and numeric arrive as strings; numericColumn drops NaN and infinities
  return typeof value === "number" ? value : Number(value);
}

function toLabel(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Build a table from a query result, classifying each column by its type OID
 */
export function tableFromResult(
  fields: ResultField[],
  rows: Array<Record<string, unknown>>
): Table {
  const columns: Column[] = fields.map((field) => {
    const storageType = pgTypeName(field.dataTypeID);
    return isNumericStorageType(storageType)
      ? numericColumn(
          field.name,
          rows.map((row) => toNumber(row[field.name])),
          storageType
        )
      : categoricalColumn(
          field.name,
          rows.map((row) => toLabel(row[field.name])),
          storageType
        );
  });
  return createTable(columns, rows.length);
}

const EDITABLE_FIELDS = ["name", "age", "salary", "department", "experience"] as const;

const INSERT_BATCH_SIZE = 500;

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS records (
    id SERIAL PRIMARY KEY,
    name TEXT,
    age INTEGER,
    salary DOUBLE PRECISION,
    department TEXT,
    experience INTEGER,
    created_at TIMESTAMP NOT NULL DEFAULT now(),
    updated_at TIMESTAMP NOT NULL DEFAULT now()
  )
`;

function recordValues(input: RecordCreate): unknown[] {
  return EDITABLE_FIELDS.map((field) => input[field]);
}

export class PgRecordStore implements RecordStore {
  constructor(private readonly db: QueryExecutor) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(CREATE_TABLE_SQL);
    await this.db.query("CREATE INDEX IF NOT EXISTS ix_records_name ON records (name)");
  }

  async insertMany(inputs: RecordCreate[]): Promise<number> {
    if (inputs.length === 0) return 0;
    const columnList = EDITABLE_FIELDS.join(", ");
    const width = EDITABLE_FIELDS.length;

    return this.db.transaction(async (tx) => {
      let inserted = 0;
      for (let start = 0; start < inputs.length; start += INSERT_BATCH_SIZE) {
        const batch = inputs.slice(start, start + INSERT_BATCH_SIZE);
        const placeholders = batch.map(
          (_, row) =>
            `(${EDITABLE_FIELDS.map((__, col) => `$${row * width + col + 1}`).join(", ")})`
        );
        const result = await tx.query(
          `INSERT INTO records (${columnList}) VALUES ${placeholders.join(", ")}`,
          batch.flatMap(recordValues)
        );
        inserted += result.rowCount;
      }
      return inserted;
    });
  }

  async list(page: number, perPage: number): Promise<RecordPage> {
    const countRow = await queryOne<{ count: number }>(
      this.db,
      "SELECT COUNT(*)::int AS count FROM records"
    );
    const total = countRow ? countRow.count : 0;
    const { rows } = await this.db.query<StoredRecord>(
      "SELECT * FROM records ORDER BY id LIMIT $1 OFFSET $2",
      [perPage, (page - 1) * perPage]
    );
    return {
      records: rows,
      total,
      page,
      total_pages: totalPages(total, perPage),
    };
  }

  async create(input: RecordCreate): Promise<StoredRecord> {
    const row = await queryOne<StoredRecord>(
      this.db,
      `INSERT INTO records (${EDITABLE_FIELDS.join(", ")})
       VALUES ($1, $2, $3, $4, $5)
       RETURNING *`,
      recordValues(input)
    );
    if (!row) {
      throw new Error("INSERT returned no row");
    }
    return row;
  }

  async update(id: number, patch: RecordUpdate): Promise<StoredRecord> {
    const assignments: string[] = [];
    const params: unknown[] = [];
    for (const field of EDITABLE_FIELDS) {
      const value = patch[field];
      if (value === undefined) continue;
      params.push(value);
      assignments.push(`${field} = $${params.length}`);
    }
    assignments.push("updated_at = now()");
    params.push(id);

    const row = await queryOne<StoredRecord>(
      this.db,
      `UPDATE records SET ${assignments.join(", ")} WHERE id = $${params.length} RETURNING *`,
      params
    );
    if (!row) {
      throw new RecordNotFoundError(id);
    }
    return row;
  }

  async delete(id: number): Promise<void> {
    const result = await this.db.query("DELETE FROM records WHERE id = $1", [id]);
    if (result.rowCount === 0) {
      throw new RecordNotFoundError(id);
    }
  }

  async loadTable(): Promise<Table> {
    const { fields, rows } = await this.db.query("SELECT * FROM records ORDER BY id");
    return tableFromResult(fields, rows);
  }
}

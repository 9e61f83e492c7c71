import Papa from "papaparse";
import { UploadError } from "../errors";
import {
  Column,
  Table,
  categoricalColumn,
  createTable,
  numericColumn,
} from "../models/table";
import {
  RecordCreate,
  RecordCreateSchema,
  UPLOAD_COLUMNS,
} from "../models/record";

/** Cell texts read as missing values */
const NA_VALUES = new Set(["", "NA", "N/A", "n/a", "NaN", "nan", "null", "NULL", "None"]);

const NUMBER_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

type Cell = string | null;

function toCell(raw: string | undefined): Cell {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  return NA_VALUES.has(trimmed) ? null : trimmed;
}

function isFiniteNumber(cell: string): boolean {
  return NUMBER_RE.test(cell) && Number.isFinite(Number(cell));
}

/**
 * Type a column from its cells: numeric when every present cell is a finite
 * number, categorical otherwise. An all-missing column is categorical.
 */
function buildColumn(name: string, cells: Cell[]): Column {
  const present = cells.filter((c): c is string => c !== null);
  if (present.length === 0 || !present.every(isFiniteNumber)) {
    return categoricalColumn(name, cells, "text");
  }
  const values = cells.map((c) => (c === null ? null : Number(c)));
  const allIntegers = values.every((v) => v === null || Number.isInteger(v));
  return numericColumn(name, values, allIntegers ? "integer" : "float");
}

/**
 * Parse an uploaded CSV file (with a header row) into a table
 */
export function parseCsv(content: string | Buffer): Table {
  const decoded = typeof content === "string" ? content : content.toString("utf-8");
  const text = decoded.replace(/^\uFEFF/, "");

  const result = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  // a single-column file has no delimiter to detect; papaparse falls back to ","
  const errors = result.errors.filter((e) => e.code !== "UndetectableDelimiter");
  if (errors.length > 0) {
    const first = errors[0];
    const where = first.row !== undefined ? ` (row ${first.row + 1})` : "";
    throw new UploadError(`${first.message}${where}`);
  }

  const fields = result.meta.fields ?? [];
  if (fields.length === 0) {
    throw new UploadError("file has no header row");
  }

  const columns = fields.map((field) =>
    buildColumn(
      field,
      result.data.map((row) => toCell(row[field]))
    )
  );
  return createTable(columns, result.data.length);
}

function cellAt(column: Column, row: number): string | number | null {
  return column.values[row];
}

/**
 * Turn an uploaded table into validated record inputs.
 * Row numbers in errors count the header as row 1.
 */
export function tableToRecordInputs(table: Table): RecordCreate[] {
  const byName = new Map(table.columns.map((c) => [c.name, c]));
  const mapping = Object.entries(UPLOAD_COLUMNS).map(([header, field]) => {
    const column = byName.get(header);
    if (!column) {
      throw new UploadError(`missing required column "${header}"`);
    }
    return { column, field };
  });

  const inputs: RecordCreate[] = [];
  for (let row = 0; row < table.rowCount; row++) {
    const raw: Record<string, string | number | null> = {};
    for (const { column, field } of mapping) {
      const cell = cellAt(column, row);
      raw[field] =
        (field === "name" || field === "department") && typeof cell === "number"
          ? String(cell)
          : cell;
    }

    const parsed = RecordCreateSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new UploadError(`row ${row + 2}, ${issue.path.join(".")}: ${issue.message}`);
    }
    inputs.push(parsed.data);
  }
  return inputs;
}

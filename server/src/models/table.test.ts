import { describe, expect, test } from "vitest";

import { TableShapeError } from "../errors";
import {
  categoricalColumn,
  createTable,
  isNumericStorageType,
  numericColumn,
} from "./table";

describe("createTable", () => {
  test("takes the row count from the columns", () => {
    const table = createTable([
      numericColumn("a", [1, 2, null]),
      categoricalColumn("b", ["x", null, "y"]),
    ]);
    expect(table.rowCount).toBe(3);
    expect(table.columns.map((c) => c.kind)).toEqual(["numeric", "categorical"]);
  });

  test("a table without columns has no rows", () => {
    expect(createTable([]).rowCount).toBe(0);
  });

  test("rejects columns of different lengths", () => {
    expect(() =>
      createTable([numericColumn("a", [1, 2]), categoricalColumn("b", ["x"])])
    ).toThrow(new TableShapeError("Column b has 1 values, expected 2"));
  });

  test("rejects columns that disagree with an explicit row count", () => {
    expect(() => createTable([numericColumn("a", [1])], 2)).toThrow(TableShapeError);
  });

  test("rejects duplicate column names", () => {
    expect(() =>
      createTable([numericColumn("a", [1]), categoricalColumn("a", ["x"])])
    ).toThrow("Duplicate column name: a");
  });
});

describe("numericColumn", () => {
  test("stores NaN and infinities as missing", () => {
    expect(numericColumn("x", [1, NaN, Infinity, -Infinity, null]).values).toEqual([
      1,
      null,
      null,
      null,
      null,
    ]);
  });
});

describe("isNumericStorageType", () => {
  test("integer and floating point types are numeric", () => {
    for (const type of ["smallint", "integer", "bigint", "real", "DOUBLE PRECISION", "numeric", "float"]) {
      expect(isNumericStorageType(type)).toBe(true);
    }
  });

  test("text, dates and booleans are not", () => {
    for (const type of ["text", "character varying", "timestamp", "boolean"]) {
      expect(isNumericStorageType(type)).toBe(false);
    }
  });
});

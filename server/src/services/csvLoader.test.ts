import { describe, expect, test } from "vitest";

import { UploadError } from "../errors";
import { parseCsv, tableToRecordInputs } from "./csvLoader";

const STAFF_CSV = [
  "Name,Age,Salary,Department,Experience",
  "Alice,30,50000.5,Engineering,5",
  "Bob,25,42000,Sales,2",
  "Cara,,61000,Engineering,NA",
  "",
].join("\n");

describe("parseCsv", () => {
  test("types columns from their cells", () => {
    const table = parseCsv(STAFF_CSV);

    expect(table.rowCount).toBe(3);
    expect(table.columns.map((c) => [c.name, c.kind, c.storageType])).toEqual([
      ["Name", "categorical", "text"],
      ["Age", "numeric", "integer"],
      ["Salary", "numeric", "float"],
      ["Department", "categorical", "text"],
      ["Experience", "numeric", "integer"],
    ]);
    expect(table.columns[1].values).toEqual([30, 25, null]);
    expect(table.columns[2].values).toEqual([50000.5, 42000, 61000]);
    expect(table.columns[4].values).toEqual([5, 2, null]);
  });

  test("a column with any non-number stays categorical", () => {
    const table = parseCsv("Code,Qty\n1,3\nx,4\n");

    expect(table.columns[0]).toEqual({
      kind: "categorical",
      name: "Code",
      storageType: "text",
      values: ["1", "x"],
    });
  });

  test("numbers too large to represent keep a column categorical", () => {
    const table = parseCsv("Amount\n1\n1e400\n");

    expect(table.columns[0]).toEqual({
      kind: "categorical",
      name: "Amount",
      storageType: "text",
      values: ["1", "1e400"],
    });
  });

  test("reads buffers and strips a byte order mark", () => {
    const table = parseCsv(Buffer.from("\uFEFFName,Age\nAlice,30\n", "utf-8"));

    expect(table.columns.map((c) => c.name)).toEqual(["Name", "Age"]);
  });

  test("trims header names", () => {
    const table = parseCsv(" Name , Age \nAlice,30\n");

    expect(table.columns.map((c) => c.name)).toEqual(["Name", "Age"]);
  });

  test("a header-only file has no rows", () => {
    const table = parseCsv("Name,Age\n");

    expect(table.rowCount).toBe(0);
    expect(table.columns.map((c) => c.kind)).toEqual(["categorical", "categorical"]);
  });

  test("rejects rows with too many fields", () => {
    expect(() => parseCsv("a,b\n1,2,3\n")).toThrow(UploadError);
    expect(() => parseCsv("a,b\n1,2,3\n")).toThrow(/Too many fields/);
  });

  test("rejects an empty file", () => {
    expect(() => parseCsv("")).toThrow("Error processing file: file has no header row");
  });
});

describe("tableToRecordInputs", () => {
  test("maps the upload columns onto record fields", () => {
    const table = parseCsv(
      "Name,Age,Salary,Department,Experience\nAlice,30,50000.5,Engineering,5\nBob,25,42000,Sales,2\n"
    );

    expect(tableToRecordInputs(table)).toEqual([
      { name: "Alice", age: 30, salary: 50000.5, department: "Engineering", experience: 5 },
      { name: "Bob", age: 25, salary: 42000, department: "Sales", experience: 2 },
    ]);
  });

  test("ignores extra columns and keeps numeric names as text", () => {
    const table = parseCsv(
      "Experience,Department,Salary,Age,Name,Notes\n1,Ops,100,40,123,hi\n"
    );

    expect(tableToRecordInputs(table)).toEqual([
      { name: "123", age: 40, salary: 100, department: "Ops", experience: 1 },
    ]);
  });

  test("names the first missing column", () => {
    const table = parseCsv("Name,Age\nAlice,30\n");

    expect(() => tableToRecordInputs(table)).toThrow(
      'Error processing file: missing required column "Salary"'
    );
  });

  test("names the row and field of an invalid value", () => {
    const table = parseCsv(
      "Name,Age,Salary,Department,Experience\nAlice,thirty,100,Ops,1\nBob,25,100,Ops,1\n"
    );

    expect(() => tableToRecordInputs(table)).toThrow(
      "Error processing file: row 2, age: Expected number, received string"
    );
  });

  test("rejects ages beyond the INTEGER range", () => {
    const table = parseCsv(
      "Name,Age,Salary,Department,Experience\nAlice,3000000000,100,Ops,1\n"
    );

    expect(() => tableToRecordInputs(table)).toThrow(
      "Error processing file: row 2, age: Number must be less than or equal to 2147483647"
    );
  });

  test("rejects missing required values", () => {
    expect(() => tableToRecordInputs(parseCsv(STAFF_CSV))).toThrow(
      "Error processing file: row 4, age: Expected number, received null"
    );
  });
});

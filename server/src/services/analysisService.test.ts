import { beforeEach, describe, expect, test } from "vitest";

import { ComputationError, DataUnavailableError } from "../errors";
import { InMemoryRecordStore } from "../testing/inMemoryRecordStore";
import { createLogger } from "../utils/logger";
import { analyzeRecords } from "./analysisService";

const log = createLogger("silent");

describe("analyzeRecords", () => {
  let store: InMemoryRecordStore;

  beforeEach(() => {
    store = new InMemoryRecordStore();
  });

  test("fails with DataUnavailableError while the store is empty", async () => {
    await expect(analyzeRecords(store, log)).rejects.toBeInstanceOf(DataUnavailableError);
  });

  test("wraps store failures in ComputationError", async () => {
    const cause = new Error("connection refused");
    store.loadError = cause;

    const error = await analyzeRecords(store, log).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ComputationError);
    expect(error).toMatchObject({ message: "Database query failed", statusCode: 500, cause });
  });

  test("summarizes the stored records", async () => {
    await store.insertMany([
      { name: "Alice", age: 30, salary: 100, department: "Eng", experience: 2 },
      { name: "Bob", age: 50, salary: 300, department: "Ops", experience: 6 },
    ]);

    const report = await analyzeRecords(store, log);

    expect(report.basic_info.total_rows).toBe(2);
    expect(report.numeric_stats.salary.mean).toBe(200);
    expect(report.numeric_stats.experience.median).toBe(4);
    expect(report.categorical_stats.name.labels).toEqual(["Alice", "Bob"]);
  });
});

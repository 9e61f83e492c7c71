import type { FastifyBaseLogger } from "fastify";
import { ComputationError, DataUnavailableError } from "../errors";
import type { Table } from "../models/table";
import type { SummaryReport } from "../types/summary";
import type { RecordStore } from "./recordStore";
import { computeSummary } from "./statistics";

/**
 * Summarize everything currently in the record store.
 * Fails with DataUnavailableError when nothing has been uploaded yet.
 */
export async function analyzeRecords(
  store: RecordStore,
  log: FastifyBaseLogger
): Promise<SummaryReport> {
  let table: Table;
  try {
    table = await store.loadTable();
  } catch (error) {
    log.error({ err: error }, "Error querying the database");
    throw new ComputationError("Database query failed", { cause: error });
  }

  if (table.rowCount === 0) {
    throw new DataUnavailableError();
  }

  const report = computeSummary(table);
  log.info({ basic_info: report.basic_info }, "Analysis completed");
  return report;
}

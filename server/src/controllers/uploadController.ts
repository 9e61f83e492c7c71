import { FastifyRequest } from "fastify";
import { UploadError } from "../errors";
import { parseCsv, tableToRecordInputs } from "../services/csvLoader";
import type { RecordStore } from "../services/recordStore";

/**
 * Upload Controller
 * Loads a CSV file into the record store
 */

interface CsvUploadResponse {
  message: string;
  rows_processed: number;
  columns: string[];
}

export function createUploadController(store: RecordStore) {
  return {
    /**
     * Handle a single CSV upload (multipart field "file")
     */
    async uploadCsv(request: FastifyRequest): Promise<CsvUploadResponse> {
      const file = await request.file();
      if (!file) {
        throw new UploadError("No file provided");
      }

      const content = await file.toBuffer();
      const table = parseCsv(content);
      const inputs = tableToRecordInputs(table);
      const inserted = await store.insertMany(inputs);

      request.log.info(
        { filename: file.filename, rows: inserted },
        `File uploaded successfully with ${inserted} rows`
      );
      return {
        message: "File uploaded successfully!",
        rows_processed: inserted,
        columns: table.columns.map((c) => c.name),
      };
    },
  };
}

import { FastifyRequest } from "fastify";
import { analyzeRecords } from "../services/analysisService";
import type { RecordStore } from "../services/recordStore";
import type { SummaryReport } from "../types/summary";

export function createAnalysisController(store: RecordStore) {
  return {
    async getAnalysis(request: FastifyRequest): Promise<SummaryReport> {
      return analyzeRecords(store, request.log);
    },
  };
}

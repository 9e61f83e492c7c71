import type { FastifyInstance } from "fastify";
import { createRecordController } from "../controllers/recordController";
import type { RecordStore } from "../services/recordStore";

/**
 * Register record CRUD routes
 */
export function registerRecordRoutes(app: FastifyInstance, store: RecordStore): void {
  const records = createRecordController(store);

  app.get("/records", records.listRecords);
  app.post("/records", records.createRecord);
  app.put<{ Params: { id: string } }>("/records/:id", records.updateRecord);
  app.delete<{ Params: { id: string } }>("/records/:id", records.deleteRecord);
}

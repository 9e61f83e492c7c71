import { FastifyRequest, FastifyReply } from "fastify";
import {
  RecordCreateSchema,
  RecordIdParamsSchema,
  RecordListQuerySchema,
  RecordPage,
  RecordUpdateSchema,
  StoredRecord,
} from "../models/record";
import type { RecordStore } from "../services/recordStore";

/**
 * Record Controller
 * CRUD on individual records. Validation errors are thrown as ZodError and
 * answered with 400 by the gateway error handler.
 */

type IdRequest = FastifyRequest<{ Params: { id: string } }>;

export function createRecordController(store: RecordStore) {
  return {
    /**
     * Page through stored records (?page=1&per_page=10)
     */
    async listRecords(request: FastifyRequest): Promise<RecordPage> {
      const { page, per_page } = RecordListQuerySchema.parse(request.query);
      return store.list(page, per_page);
    },

    async createRecord(
      request: FastifyRequest,
      reply: FastifyReply
    ): Promise<StoredRecord> {
      const input = RecordCreateSchema.parse(request.body);
      const record = await store.create(input);
      reply.status(201);
      return record;
    },

    /**
     * Update only the fields present in the body
     */
    async updateRecord(request: IdRequest): Promise<StoredRecord> {
      const { id } = RecordIdParamsSchema.parse(request.params);
      const patch = RecordUpdateSchema.parse(request.body ?? {});
      return store.update(id, patch);
    },

    async deleteRecord(request: IdRequest): Promise<{ message: string }> {
      const { id } = RecordIdParamsSchema.parse(request.params);
      await store.delete(id);
      return { message: "Record deleted successfully" };
    },
  };
}

export type RecordController = ReturnType<typeof createRecordController>;

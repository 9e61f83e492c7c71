import { RecordNotFoundError } from "../errors";
import {
  RecordCreate,
  RecordPage,
  RecordUpdate,
  StoredRecord,
  totalPages,
} from "../models/record";
import type { Table } from "../models/table";
import { RECORD_FIELDS, RecordStore, tableFromResult } from "../services/recordStore";

/**
 * Record store kept in memory, for tests of the HTTP layer
 */
export class InMemoryRecordStore implements RecordStore {
  records: StoredRecord[] = [];
  private nextId = 1;
  /** When set, loadTable rejects with this error */
  loadError: Error | null = null;

  constructor(private readonly now: () => Date = () => new Date("2024-01-01T00:00:00.000Z")) {}

  async ensureSchema(): Promise<void> {}

  async insertMany(inputs: RecordCreate[]): Promise<number> {
    for (const input of inputs) {
      await this.create(input);
    }
    return inputs.length;
  }

  async list(page: number, perPage: number): Promise<RecordPage> {
    const start = (page - 1) * perPage;
    return {
      records: this.records.slice(start, start + perPage),
      total: this.records.length,
      page,
      total_pages: totalPages(this.records.length, perPage),
    };
  }

  async create(input: RecordCreate): Promise<StoredRecord> {
    const stamp = this.now();
    const record: StoredRecord = {
      id: this.nextId++,
      ...input,
      created_at: stamp,
      updated_at: stamp,
    };
    this.records.push(record);
    return record;
  }

  async update(id: number, patch: RecordUpdate): Promise<StoredRecord> {
    const index = this.records.findIndex((r) => r.id === id);
    if (index === -1) throw new RecordNotFoundError(id);
    const current = this.records[index];
    const updated: StoredRecord = {
      ...current,
      name: patch.name ?? current.name,
      age: patch.age ?? current.age,
      salary: patch.salary ?? current.salary,
      department: patch.department ?? current.department,
      experience: patch.experience ?? current.experience,
      updated_at: this.now(),
    };
    this.records[index] = updated;
    return updated;
  }

  async delete(id: number): Promise<void> {
    const index = this.records.findIndex((r) => r.id === id);
    if (index === -1) throw new RecordNotFoundError(id);
    this.records.splice(index, 1);
  }

  async loadTable(): Promise<Table> {
    if (this.loadError) throw this.loadError;
    return tableFromResult(RECORD_FIELDS, this.records);
  }
}

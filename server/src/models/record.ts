import z from "zod";

/**
 * Employee record stored in the `records` table
 */
export type StoredRecord = {
  id: number;
  name: string;
  age: number;
  salary: number;
  department: string;
  experience: number;
  created_at: Date;
  updated_at: Date;
};

/** Largest value of a PostgreSQL INTEGER column */
export const INT4_MAX = 2147483647;

export const RecordCreateSchema = z.object({
  name: z.string().min(1),
  age: z.number().int().nonnegative().max(INT4_MAX),
  salary: z.number().finite().nonnegative(),
  department: z.string().min(1),
  experience: z.number().int().nonnegative().max(INT4_MAX),
});

export const RecordUpdateSchema = RecordCreateSchema.partial();

export type RecordCreate = z.infer<typeof RecordCreateSchema>;
export type RecordUpdate = z.infer<typeof RecordUpdateSchema>;

export const RecordIdParamsSchema = z.object({
  id: z.coerce.number().int().positive().max(INT4_MAX),
});

export const RecordListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(100).default(10),
});

export type RecordListQuery = z.infer<typeof RecordListQuerySchema>;

export interface RecordPage {
  records: StoredRecord[];
  total: number;
  page: number;
  total_pages: number;
}

/** Columns a CSV upload must provide, mapped to record fields */
export const UPLOAD_COLUMNS = {
  Name: "name",
  Age: "age",
  Salary: "salary",
  Department: "department",
  Experience: "experience",
} as const satisfies Record<string, keyof RecordCreate>;

export function totalPages(total: number, perPage: number): number {
  return Math.ceil(total / perPage);
}

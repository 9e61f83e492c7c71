import axios, { AxiosInstance, AxiosResponse, isAxiosError } from "axios";
import type { RecordCreate, RecordUpdate, StoredRecord } from "../models/record";
import type { SummaryReport } from "../types/summary";

/**
 * HTTP client for dashboards consuming the analysis API
 */

/** Records as they travel over JSON */
export type RecordJson = Omit<StoredRecord, "created_at" | "updated_at"> & {
  created_at: string;
  updated_at: string;
};

export interface RecordPageJson {
  records: RecordJson[];
  total: number;
  page: number;
  total_pages: number;
}

export interface UploadResult {
  message: string;
  rows_processed: number;
  columns: string[];
}

export class ApiRequestError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "ApiRequestError";
    this.status = status;
  }
}

function serverMessage(body: unknown): string | undefined {
  if (typeof body === "object" && body !== null && "error" in body) {
    const { error } = body;
    if (typeof error === "string") return error;
  }
  return undefined;
}

function toApiError(error: unknown): unknown {
  if (!isAxiosError(error)) return error;
  const status = error.response?.status;
  return new ApiRequestError(serverMessage(error.response?.data) ?? error.message, status);
}

export class AnalysisClient {
  private readonly http: AxiosInstance;

  constructor(baseURL = "http://localhost:8000", http?: AxiosInstance) {
    this.http = http ?? axios.create({ baseURL, timeout: 30000 });
  }

  private async send<T>(request: Promise<AxiosResponse<T>>): Promise<T> {
    try {
      const response = await request;
      return response.data;
    } catch (error) {
      throw toApiError(error);
    }
  }

  /**
   * false when the API cannot be reached or answers with an error
   */
  async checkHealth(): Promise<boolean> {
    try {
      await this.http.get("/");
      return true;
    } catch (error) {
      if (isAxiosError(error)) return false;
      throw error;
    }
  }

  uploadCsv(filename: string, content: string | Buffer): Promise<UploadResult> {
    const form = new FormData();
    form.append("file", new Blob([content], { type: "text/csv" }), filename);
    return this.send(this.http.post<UploadResult>("/upload-csv", form));
  }

  getRecords(page = 1, perPage = 10): Promise<RecordPageJson> {
    return this.send(
      this.http.get<RecordPageJson>("/records", { params: { page, per_page: perPage } })
    );
  }

  createRecord(input: RecordCreate): Promise<RecordJson> {
    return this.send(this.http.post<RecordJson>("/records", input));
  }

  updateRecord(id: number, patch: RecordUpdate): Promise<RecordJson> {
    return this.send(this.http.put<RecordJson>(`/records/${id}`, patch));
  }

  async deleteRecord(id: number): Promise<void> {
    await this.send(this.http.delete<{ message: string }>(`/records/${id}`));
  }

  /**
   * Summary report of the stored records, or null when nothing was uploaded yet
   */
  async analyze(): Promise<SummaryReport | null> {
    try {
      return await this.send(this.http.get<SummaryReport>("/analyze"));
    } catch (error) {
      if (error instanceof ApiRequestError && error.status === 404) return null;
      throw error;
    }
  }
}

/**
 * Application errors
 * Each error carries the HTTP status the gateway answers with.
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/**
 * No rows have been uploaded yet
 */
export class DataUnavailableError extends AppError {
  constructor(
    message = "No data available for analysis. Please upload a CSV file first."
  ) {
    super(message, 404);
  }
}

/**
 * The record store could not be read
 */
export class ComputationError extends AppError {
  constructor(message = "Database query failed", options?: { cause?: unknown }) {
    super(message, 500);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class RecordNotFoundError extends AppError {
  readonly recordId: number;

  constructor(id: number) {
    super("Record not found", 404);
    this.recordId = id;
  }
}

export class UploadError extends AppError {
  constructor(message: string) {
    super(`Error processing file: ${message}`, 400);
  }
}

export class TableShapeError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`, 500);
  }
}

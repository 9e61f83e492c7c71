import { Pool, QueryResult, QueryResultRow, types } from "pg";
import type { DatabaseConfig } from "../config";
import type { Logger } from "../utils/logger";

/**
 * Column metadata of a result set; `dataTypeID` is the PostgreSQL type OID
 */
export interface ResultField {
  name: string;
  dataTypeID: number;
}

export interface SqlResult<T> {
  rows: T[];
  fields: ResultField[];
  rowCount: number;
}

/**
 * What the record store needs from a database connection
 */
export interface QueryExecutor {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<SqlResult<T>>;

  /** Run `work` inside BEGIN/COMMIT, rolling back if it throws */
  transaction<T>(work: (tx: QueryExecutor) => Promise<T>): Promise<T>;
}

/** A connection checked out of the pool */
export interface PooledConnection {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<SqlResult<T>>;

  /** Passing an error makes the pool discard the connection */
  release(error?: Error): void;
}

export interface ConnectionPool {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<SqlResult<T>>;

  connect(): Promise<PooledConnection>;
}

const TIMESTAMP_OID = 1114;

/**
 * Parse a `timestamp without time zone` as UTC
 */
export function parseUtcTimestamp(value: string): Date {
  return new Date(`${value.replace(" ", "T")}Z`);
}

/**
 * Create the PostgreSQL connection pool
 */
export function createDbPool(config: DatabaseConfig, logger: Logger): Pool {
  types.setTypeParser(TIMESTAMP_OID, parseUtcTimestamp);

  const pool = new Pool({
    ...config,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on("error", (err) => {
    logger.error({ err }, "Unexpected error on idle client");
  });

  return pool;
}

function toSqlResult<T extends QueryResultRow>(result: QueryResult<T>): SqlResult<T> {
  return {
    rows: result.rows,
    fields: result.fields.map((f) => ({ name: f.name, dataTypeID: f.dataTypeID })),
    rowCount: result.rowCount ?? result.rows.length,
  };
}

export function poolConnections(pool: Pool): ConnectionPool {
  return {
    query: async <T extends QueryResultRow>(text: string, params?: unknown[]) =>
      toSqlResult(await pool.query<T>(text, params)),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: async <T extends QueryResultRow>(text: string, params?: unknown[]) =>
          toSqlResult(await client.query<T>(text, params)),
        release: (error?: Error) => client.release(error),
      };
    },
  };
}

class ConnectionExecutor implements QueryExecutor {
  constructor(private readonly connection: PooledConnection) {}

  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<SqlResult<T>> {
    return this.connection.query<T>(text, params);
  }

  transaction<T>(work: (tx: QueryExecutor) => Promise<T>): Promise<T> {
    // already inside a transaction
    return work(this);
  }
}

export class PgExecutor implements QueryExecutor {
  constructor(
    private readonly pool: ConnectionPool,
    private readonly logger: Logger
  ) {}

  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<SqlResult<T>> {
    return this.pool.query<T>(text, params);
  }

  async transaction<T>(work: (tx: QueryExecutor) => Promise<T>): Promise<T> {
    const connection = await this.pool.connect();
    try {
      await connection.query("BEGIN");
      const result = await work(new ConnectionExecutor(connection));
      await connection.query("COMMIT");
      connection.release();
      return result;
    } catch (error) {
      connection.release(await this.rollback(connection));
      throw error;
    }
  }

  /** Returns the rollback failure, if any; the connection is unusable after one */
  private async rollback(connection: PooledConnection): Promise<Error | undefined> {
    try {
      await connection.query("ROLLBACK");
      return undefined;
    } catch (error) {
      this.logger.error({ err: error }, "Rollback failed");
      return error instanceof Error ? error : new Error(String(error));
    }
  }
}

/**
 * Run a query and return its first row
 */
export async function queryOne<T extends QueryResultRow = QueryResultRow>(
  db: QueryExecutor,
  text: string,
  params?: unknown[]
): Promise<T | null> {
  const { rows } = await db.query<T>(text, params);
  return rows.length > 0 ? rows[0] : null;
}

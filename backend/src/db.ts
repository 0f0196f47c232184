import { Pool, QueryResultRow } from "pg";

let pool: Pool | undefined;

function getPool(): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: process.env.DATABASE_URL,
      ssl: process.env.DATABASE_URL?.includes("render.com")
        ? { rejectUnauthorized: false }
        : undefined,
    });
  }
  return pool;
}

/** The slice of a pg client the stores use. */
export interface SqlClient {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
}

export type TransactionRunner = <T>(fn: (client: SqlClient) => Promise<T>) => Promise<T>;

/** Run a query and return all rows. */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<T[]> {
  const result = await getPool().query<T>(text, params);
  return result.rows;
}

/** Execute a callback inside a PostgreSQL transaction. */
export async function transaction<T>(
  fn: (client: SqlClient) => Promise<T>,
): Promise<T> {
  const client = await getPool().connect();
  const sql: SqlClient = {
    query: async <R extends QueryResultRow>(text: string, params?: unknown[]) =>
      (await client.query<R>(text, params)).rows,
  };
  try {
    await client.query("BEGIN");
    const result = await fn(sql);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = undefined;
  }
}

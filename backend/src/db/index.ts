// src/db/index.ts
import { Pool, QueryResultRow } from "pg";
import type { Config } from "../config";

export type Query = <T extends QueryResultRow>(text: string, params?: unknown[]) => Promise<{ rows: T[] }>;

export function createPool(pg: Config["pg"]): Pool {
  return new Pool({ connectionString: pg.connectionString, ssl: pg.ssl });
}

// simple helper
export function queryWith(pool: Pool): Query {
  return async <T extends QueryResultRow>(text: string, params?: unknown[]) => {
    const client = await pool.connect();
    try {
      return await client.query<T>(text, params);
    } finally {
      client.release();
    }
  };
}

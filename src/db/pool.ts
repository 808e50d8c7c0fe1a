import pg from 'pg';
import type { Pool, PoolClient, QueryResultRow } from 'pg';

export interface QueryRows<T> {
  rows: T[];
  rowCount: number;
}

export interface SqlExecutor {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryRows<T>>;
}

export interface Database extends SqlExecutor {
  transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  end(): Promise<void>;
}

const executorFor = (client: Pool | PoolClient): SqlExecutor => ({
  query: async <T extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []) => {
    const result = await client.query<T>(text, params);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  },
});

export const createPool = (connectionString: string): Pool => new pg.Pool({
  connectionString,
  max: 25,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5_000,
});

export const createDatabase = (pool: Pool): Database => {
  const base = executorFor(pool);
  return {
    query: base.query,
    transaction: async <T>(fn: (tx: SqlExecutor) => Promise<T>) => {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        const result = await fn(executorFor(client));
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK').catch(() => undefined);
        throw error;
      } finally {
        client.release();
      }
    },
    end: () => pool.end(),
  };
};

import pg from 'pg';

const { Pool } = pg;

let pool: pg.Pool | null = null;

export interface DatabaseConfig {
  connectionString?: string;
  max?: number;
}

/**
 * Get or create the shared connection pool
 */
export function getPool(config?: DatabaseConfig): pg.Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config?.connectionString ?? process.env.DATABASE_URL,
      max: config?.max,
    });

    pool.on('error', (err) => {
      console.error('[DB] Unexpected pool error:', err);
    });
  }

  return pool;
}

/**
 * Close the pool; call on shutdown
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  sql: string,
  params?: unknown[]
): Promise<{ rows: T[]; rowCount: number | null }> {
  const result = await getPool().query<T>(sql, params);
  return {
    rows: result.rows,
    rowCount: result.rowCount,
  };
}

import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

let pool: Pool | null = null;

export function initDatabase(connectionString: string): Pool {
  pool = new Pool({ connectionString });
  return pool;
}

function getPool(): Pool {
  if (!pool) {
    throw new Error('Database pool is not initialized; call initDatabase() first');
  }
  return pool;
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const start = Date.now();
  const res = await getPool().query<T>(text, params);
  const duration = Date.now() - start;
  console.log('Executed query', { text: text.substring(0, 100), duration, rows: res.rowCount });
  return res;
}

export async function getClient(): Promise<PoolClient> {
  const client = await getPool().connect();
  return client;
}

/**
 * Run `work` inside BEGIN/COMMIT on a dedicated client. Any error rolls the
 * transaction back and is rethrown.
 */
export async function withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getClient();

  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      console.error('Rollback failed:', rollbackError);
    });
    throw error;
  } finally {
    client.release();
  }
}

export async function testConnection(): Promise<boolean> {
  try {
    const res = await query<{ now: Date }>('SELECT NOW()');
    console.log('Database connected:', res.rows[0]?.now);
    return true;
  } catch (error) {
    console.error('Database connection failed:', error);
    return false;
  }
}

import pg from 'pg';

const { Pool } = pg;

let _pool: pg.Pool | null = null;

/**
 * Process-wide pool. `DATABASE_URL` is required; `DATABASE_POOL_MAX` caps
 * connections shared by request handlers and the background loops.
 */
export function getPool(): pg.Pool {
  if (!_pool) {
    const max = parseInt(process.env['DATABASE_POOL_MAX'] ?? '10', 10);
    _pool = new Pool({
      connectionString: process.env['DATABASE_URL'],
      max: Number.isNaN(max) ? 10 : max,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'transit-pulse-api',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] idle client error', err.message);
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (!_pool) return;
  const pool = _pool;
  _pool = null;
  await pool.end();
}

/** Fails fast on boot when the database is unreachable. */
export async function pingDatabase(): Promise<void> {
  await getPool().query('SELECT 1');
}

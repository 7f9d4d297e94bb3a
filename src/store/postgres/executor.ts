import pg from 'pg';
import { createChildLogger } from '../../shared/logger.js';

const log = createChildLogger('store:postgres');

const DATE_OID = 1082;

// DATE columns come back as the stored `YYYY-MM-DD` text instead of a local-midnight Date.
pg.types.setTypeParser(DATE_OID, (value: string) => value);

export interface PgResult<R> {
  rows: R[];
  rowCount: number | null;
}

/** The slice of `pg` the Postgres adapter uses. Tests substitute a scripted executor. */
export interface PgExecutor {
  query<R extends pg.QueryResultRow>(text: string, values?: unknown[]): Promise<PgResult<R>>;
  transaction<T>(fn: (tx: PgExecutor) => Promise<T>): Promise<T>;
  end(): Promise<void>;
}

function clientExecutor(client: pg.PoolClient): PgExecutor {
  return {
    query: (text, values) => client.query(text, values),
    transaction: (fn) => fn(clientExecutor(client)),
    end: async () => undefined,
  };
}

export function poolExecutor(pool: pg.Pool): PgExecutor {
  return {
    query: (text, values) => pool.query(text, values),

    async transaction(fn) {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        const result = await fn(clientExecutor(client));
        await client.query('COMMIT');
        return result;
      } catch (err) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
          log.error({ err: rollbackErr }, 'Rollback failed');
        });
        throw err;
      } finally {
        client.release();
      }
    },

    end: () => pool.end(),
  };
}

export function createPool(connectionString: string, statementTimeoutMs: number): pg.Pool {
  const pool = new pg.Pool({
    connectionString,
    max: 5,
    connectionTimeoutMillis: statementTimeoutMs,
    statement_timeout: statementTimeoutMs,
  });
  pool.on('error', (err) => {
    log.error({ err }, 'Idle PostgreSQL client error');
  });
  return pool;
}

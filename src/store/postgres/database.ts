import { createChildLogger } from '../../shared/logger.js';
import type { Backend } from '../types.js';
import { PgCanonicalStore } from './canonical-store.js';
import { createPool, poolExecutor, type PgExecutor } from './executor.js';
import { PgSyncQueue } from './sync-queue.js';

const log = createChildLogger('store:postgres');

export interface PostgresBackendOptions {
  connectionString: string;
  postgis: boolean;
  statementTimeoutMs: number;
}

export function postgresBackend(db: PgExecutor, postgis: boolean, clock?: () => Date): Backend {
  const store = new PgCanonicalStore(db, { postgis });
  return {
    kind: 'postgres',
    store,
    queue: new PgSyncQueue(db, clock),
    close: () => store.close(),
  };
}

export async function openPostgresBackend(options: PostgresBackendOptions): Promise<Backend> {
  const db = poolExecutor(createPool(options.connectionString, options.statementTimeoutMs));
  await db.query('SELECT 1');
  const backend = postgresBackend(db, options.postgis);
  await backend.store.migrate();
  log.info({ postgis: options.postgis }, 'PostgreSQL backend ready');
  return backend;
}

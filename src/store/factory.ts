import type { BackendKind, Env } from '../shared/config.js';
import { openPostgresBackend } from './postgres/database.js';
import { openSqliteBackend } from './sqlite/database.js';
import type { Backend } from './types.js';

type StoreEnv = Pick<
  Env,
  | 'STORE_BACKEND'
  | 'SQLITE_PATH'
  | 'DATABASE_URL'
  | 'PG_POSTGIS'
  | 'MIRROR_BACKEND'
  | 'MIRROR_SQLITE_PATH'
  | 'MIRROR_DATABASE_URL'
  | 'STORE_TIMEOUT_MS'
>;

function openBackend(kind: BackendKind, sqlitePath: string, databaseUrl: string, env: StoreEnv): Promise<Backend> {
  if (kind === 'sqlite') return openSqliteBackend(sqlitePath);
  return openPostgresBackend({
    connectionString: databaseUrl,
    postgis: env.PG_POSTGIS,
    statementTimeoutMs: env.STORE_TIMEOUT_MS,
  });
}

export function openPrimaryBackend(env: StoreEnv): Promise<Backend> {
  return openBackend(env.STORE_BACKEND, env.SQLITE_PATH, env.DATABASE_URL, env);
}

/** The migration-window mirror, or null when mirroring is off. */
export async function openMirrorBackend(env: StoreEnv): Promise<Backend | null> {
  if (env.MIRROR_BACKEND === 'none') return null;
  return openBackend(env.MIRROR_BACKEND, env.MIRROR_SQLITE_PATH, env.MIRROR_DATABASE_URL, env);
}

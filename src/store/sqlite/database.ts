import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { createChildLogger } from '../../shared/logger.js';
import type { Backend } from '../types.js';
import { SqliteCanonicalStore } from './canonical-store.js';
import { SqliteSyncQueue } from './sync-queue.js';

const log = createChildLogger('store:sqlite');

export function openSqliteDatabase(path: string): Database.Database {
  const inMemory = path === ':memory:';
  if (!inMemory) mkdirSync(dirname(path), { recursive: true });

  const db = new Database(path);
  if (!inMemory) db.pragma('journal_mode = WAL');
  db.pragma('synchronous = FULL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
  return db;
}

export async function openSqliteBackend(path: string, clock?: () => Date): Promise<Backend> {
  const db = openSqliteDatabase(path);
  const store = new SqliteCanonicalStore(db);
  await store.migrate();
  log.info({ path }, 'SQLite backend ready');

  return {
    kind: 'sqlite',
    store,
    queue: new SqliteSyncQueue(db, clock),
    close: () => store.close(),
  };
}

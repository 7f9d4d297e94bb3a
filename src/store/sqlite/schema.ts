// Geometry is stored as WKT text (EPSG:4326).
export const SQLITE_SCHEMA = `
CREATE TABLE IF NOT EXISTS sites (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  site_code TEXT NOT NULL UNIQUE,
  site_name TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'active',
  description TEXT,
  geom TEXT,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS finds (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  site_id INTEGER NOT NULL REFERENCES sites(id),
  find_number TEXT NOT NULL,
  material_type TEXT,
  object_type TEXT,
  description TEXT,
  condition TEXT,
  quantity INTEGER NOT NULL DEFAULT 1,
  depth REAL,
  find_date TEXT,
  finder_name TEXT,
  geom TEXT,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  UNIQUE (site_id, find_number)
);

CREATE INDEX IF NOT EXISTS idx_finds_number ON finds(find_number);

CREATE TABLE IF NOT EXISTS media (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  media_type TEXT NOT NULL,
  file_name TEXT NOT NULL,
  file_path TEXT NOT NULL,
  content_hash TEXT NOT NULL UNIQUE,
  mime_type TEXT,
  description TEXT,
  photographer TEXT,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS media_relations (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  media_id INTEGER NOT NULL REFERENCES media(id) ON DELETE CASCADE,
  related_type TEXT NOT NULL,
  related_id INTEGER NOT NULL,
  relation_type TEXT NOT NULL DEFAULT 'documentation',
  sort_order INTEGER NOT NULL DEFAULT 0,
  UNIQUE (media_id, related_type, related_id)
);

CREATE INDEX IF NOT EXISTS idx_media_relations ON media_relations(related_type, related_id);

CREATE TABLE IF NOT EXISTS pending_links (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  media_id INTEGER NOT NULL REFERENCES media(id) ON DELETE CASCADE,
  ref_kind TEXT NOT NULL,
  ref_site_code TEXT NOT NULL DEFAULT '',
  ref_key TEXT NOT NULL,
  relation_type TEXT NOT NULL DEFAULT 'documentation',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  UNIQUE (media_id, ref_kind, ref_site_code, ref_key)
);

CREATE INDEX IF NOT EXISTS idx_pending_links_ref ON pending_links(ref_kind, ref_key);

CREATE TABLE IF NOT EXISTS dive_logs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  site_id INTEGER NOT NULL REFERENCES sites(id),
  dive_number TEXT NOT NULL,
  dive_date TEXT NOT NULL,
  dive_start TEXT,
  dive_end TEXT,
  max_depth REAL,
  dive_objectives TEXT,
  work_completed TEXT,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  UNIQUE (site_id, dive_number)
);

CREATE TABLE IF NOT EXISTS dive_team_members (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  dive_log_id INTEGER NOT NULL REFERENCES dive_logs(id) ON DELETE CASCADE,
  member_name TEXT NOT NULL,
  UNIQUE (dive_log_id, member_name)
);

CREATE TABLE IF NOT EXISTS workers (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  worker_code TEXT NOT NULL UNIQUE,
  full_name TEXT NOT NULL,
  role TEXT,
  telegram_username TEXT,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS expenses (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  site_id INTEGER NOT NULL REFERENCES sites(id),
  expense_date TEXT NOT NULL,
  category TEXT NOT NULL,
  description TEXT,
  amount REAL NOT NULL,
  currency TEXT NOT NULL DEFAULT 'IDR',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS sync_queue (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  chat_id TEXT NOT NULL,
  message_id TEXT NOT NULL,
  user_id TEXT NOT NULL,
  username TEXT,
  message_kind TEXT NOT NULL,
  payload TEXT NOT NULL,
  state TEXT NOT NULL DEFAULT 'pending'
    CHECK (state IN ('pending', 'processing', 'applied', 'failed')),
  retry_count INTEGER NOT NULL DEFAULT 0,
  last_error TEXT,
  error_detail TEXT,
  received_at TEXT NOT NULL,
  available_at TEXT NOT NULL,
  claimed_at TEXT,
  heartbeat_at TEXT,
  processed_at TEXT,
  UNIQUE (chat_id, message_id)
);

CREATE INDEX IF NOT EXISTS idx_sync_queue_claim ON sync_queue(state, received_at, id);
CREATE INDEX IF NOT EXISTS idx_sync_queue_chat ON sync_queue(chat_id, state);

CREATE TABLE IF NOT EXISTS mirror_divergences (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  entry_id INTEGER,
  backend TEXT NOT NULL,
  kind TEXT NOT NULL,
  detail TEXT NOT NULL,
  created_at TEXT NOT NULL
);
`;

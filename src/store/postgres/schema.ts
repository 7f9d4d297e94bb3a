export interface PostgresSchemaOptions {
  /** Store geometry as PostGIS `geometry(Point, 4326)` instead of WKT text. */
  postgis: boolean;
}

export function postgresSchema({ postgis }: PostgresSchemaOptions): string {
  const geom = postgis ? 'geometry(Point, 4326)' : 'text';
  return `
${postgis ? 'CREATE EXTENSION IF NOT EXISTS postgis;' : ''}

CREATE TABLE IF NOT EXISTS sites (
  id serial PRIMARY KEY,
  site_code text NOT NULL UNIQUE,
  site_name text NOT NULL,
  status text NOT NULL DEFAULT 'active',
  description text,
  geom ${geom},
  created_at timestamptz NOT NULL DEFAULT now(),
  updated_at timestamptz NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS finds (
  id serial PRIMARY KEY,
  site_id integer NOT NULL REFERENCES sites(id),
  find_number text NOT NULL,
  material_type text,
  object_type text,
  description text,
  condition text,
  quantity integer NOT NULL DEFAULT 1,
  depth double precision,
  find_date text,
  finder_name text,
  geom ${geom},
  created_at timestamptz NOT NULL DEFAULT now(),
  updated_at timestamptz NOT NULL DEFAULT now(),
  UNIQUE (site_id, find_number)
);

CREATE INDEX IF NOT EXISTS idx_finds_number ON finds(find_number);

CREATE TABLE IF NOT EXISTS media (
  id serial PRIMARY KEY,
  media_type text NOT NULL,
  file_name text NOT NULL,
  file_path text NOT NULL,
  content_hash text NOT NULL UNIQUE,
  mime_type text,
  description text,
  photographer text,
  created_at timestamptz NOT NULL DEFAULT now(),
  updated_at timestamptz NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS media_relations (
  id serial PRIMARY KEY,
  media_id integer NOT NULL REFERENCES media(id) ON DELETE CASCADE,
  related_type text NOT NULL,
  related_id integer NOT NULL,
  relation_type text NOT NULL DEFAULT 'documentation',
  sort_order integer NOT NULL DEFAULT 0,
  UNIQUE (media_id, related_type, related_id)
);

CREATE INDEX IF NOT EXISTS idx_media_relations ON media_relations(related_type, related_id);

CREATE TABLE IF NOT EXISTS pending_links (
  id serial PRIMARY KEY,
  media_id integer NOT NULL REFERENCES media(id) ON DELETE CASCADE,
  ref_kind text NOT NULL,
  ref_site_code text NOT NULL DEFAULT '',
  ref_key text NOT NULL,
  relation_type text NOT NULL DEFAULT 'documentation',
  created_at timestamptz NOT NULL DEFAULT now(),
  UNIQUE (media_id, ref_kind, ref_site_code, ref_key)
);

CREATE INDEX IF NOT EXISTS idx_pending_links_ref ON pending_links(ref_kind, ref_key);

CREATE TABLE IF NOT EXISTS dive_logs (
  id serial PRIMARY KEY,
  site_id integer NOT NULL REFERENCES sites(id),
  dive_number text NOT NULL,
  dive_date date NOT NULL,
  dive_start text,
  dive_end text,
  max_depth double precision,
  dive_objectives text,
  work_completed text,
  created_at timestamptz NOT NULL DEFAULT now(),
  updated_at timestamptz NOT NULL DEFAULT now(),
  UNIQUE (site_id, dive_number)
);

CREATE TABLE IF NOT EXISTS dive_team_members (
  id serial PRIMARY KEY,
  dive_log_id integer NOT NULL REFERENCES dive_logs(id) ON DELETE CASCADE,
  member_name text NOT NULL,
  UNIQUE (dive_log_id, member_name)
);

CREATE TABLE IF NOT EXISTS workers (
  id serial PRIMARY KEY,
  worker_code text NOT NULL UNIQUE,
  full_name text NOT NULL,
  role text,
  telegram_username text,
  created_at timestamptz NOT NULL DEFAULT now(),
  updated_at timestamptz NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS expenses (
  id serial PRIMARY KEY,
  site_id integer NOT NULL REFERENCES sites(id),
  expense_date date NOT NULL,
  category text NOT NULL,
  description text,
  amount numeric(12, 2) NOT NULL,
  currency text NOT NULL DEFAULT 'IDR',
  created_at timestamptz NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS sync_queue (
  id serial PRIMARY KEY,
  chat_id text NOT NULL,
  message_id text NOT NULL,
  user_id text NOT NULL,
  username text,
  message_kind text NOT NULL,
  payload jsonb NOT NULL,
  state text NOT NULL DEFAULT 'pending',
  retry_count integer NOT NULL DEFAULT 0,
  last_error text,
  error_detail text,
  received_at timestamptz NOT NULL,
  available_at timestamptz NOT NULL,
  claimed_at timestamptz,
  heartbeat_at timestamptz,
  processed_at timestamptz,
  UNIQUE (chat_id, message_id)
);

CREATE INDEX IF NOT EXISTS idx_sync_queue_claim ON sync_queue(state, received_at, id);
CREATE INDEX IF NOT EXISTS idx_sync_queue_chat ON sync_queue(chat_id, state);

CREATE TABLE IF NOT EXISTS mirror_divergences (
  id serial PRIMARY KEY,
  entry_id integer,
  backend text NOT NULL,
  kind text NOT NULL,
  detail text NOT NULL,
  created_at timestamptz NOT NULL DEFAULT now()
);
`;
}

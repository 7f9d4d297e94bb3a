import type { BackendKind } from '../shared/config.js';
import type {
  DivergenceKind,
  DivergenceRecord,
  EnqueueResult,
  MessageKind,
  Origin,
  QueueEntry,
  QueueStats,
} from '../shared/types.js';
import type { LocationPin, NormalizedRecord, RelatedKind } from '../sync/records.js';

// ─── Canonical rows (mirror the relational schema) ──────────────────────────

export type Site = {
  id: number;
  site_code: string;
  site_name: string;
  status: string;
  description: string | null;
  geom_wkt: string | null;
};

export type Find = {
  id: number;
  site_id: number;
  find_number: string;
  material_type: string | null;
  object_type: string | null;
  description: string | null;
  condition: string | null;
  quantity: number;
  depth: number | null;
  find_date: string | null;
  finder_name: string | null;
  geom_wkt: string | null;
};

export type Media = {
  id: number;
  media_type: string;
  file_name: string;
  file_path: string;
  content_hash: string;
  mime_type: string | null;
  description: string | null;
  photographer: string | null;
};

export type MediaRelation = {
  id: number;
  media_id: number;
  related_type: RelatedKind;
  related_id: number;
  relation_type: string;
};

export type DiveLog = {
  id: number;
  site_id: number;
  dive_number: string;
  dive_date: string;
  dive_start: string | null;
  dive_end: string | null;
  max_depth: number | null;
  dive_objectives: string | null;
  work_completed: string | null;
};

export type Worker = {
  id: number;
  worker_code: string;
  full_name: string;
  role: string | null;
  telegram_username: string | null;
};

export type PendingLink = {
  id: number;
  media_id: number;
  ref_kind: RelatedKind;
  ref_site_code: string;
  ref_key: string;
  relation_type: string;
};

// ─── Upsert inputs: undefined means "leave the stored value alone" ──────────

export interface SiteInput {
  siteCode: string;
  siteName?: string;
  status?: string;
  description?: string;
}

export interface FindInput {
  siteId: number;
  findNumber: string;
  materialType?: string;
  objectType?: string;
  description?: string;
  condition?: string;
  quantity?: number;
  depth?: number;
  findDate?: string;
  finderName?: string;
  geometry?: LocationPin;
  /** Used only when the find is created. */
  defaultFindDate?: string;
  defaultFinderName?: string;
}

export interface MediaInput {
  contentHash: string;
  mediaType: string;
  fileName: string;
  filePath: string;
  mimeType?: string;
  description?: string;
  photographer?: string;
  /** Used only when the media row is created. */
  defaultPhotographer?: string;
}

export interface DiveLogInput {
  siteId: number;
  diveNumber: string;
  diveDate?: string;
  diveStart?: string;
  diveEnd?: string;
  maxDepth?: number;
  objectives?: string;
  workCompleted?: string;
  /** Used only when the dive log is created. */
  defaultDiveDate?: string;
}

export interface WorkerInput {
  workerCode: string;
  fullName?: string;
  role?: string;
  telegramUsername?: string;
}

export interface SiteKey {
  siteCode: string;
}

export interface SiteScopedKey {
  siteId: number;
  localKey: string;
}

export interface MediaKey {
  contentHash: string;
}

export interface WorkerKey {
  workerCode: string;
}

export interface MediaLinkInput {
  mediaId: number;
  relatedType: RelatedKind;
  relatedId: number;
  relationType?: string;
}

export interface PendingLinkInput {
  mediaId: number;
  refKind: RelatedKind;
  refSiteCode?: string;
  refKey: string;
  relationType?: string;
}

export interface PendingRefQuery {
  kind: RelatedKind;
  siteCode: string;
  key: string;
}

// ─── Repositories ───────────────────────────────────────────────────────────

export interface EntityRepository<TRow, TInput, TKey> {
  /** Insert, or update the non-null incoming fields on natural-key conflict. */
  upsertByNaturalKey(input: TInput): Promise<TRow>;
  fetchById(id: number): Promise<TRow | null>;
  fetchByNaturalKey(key: TKey): Promise<TRow | null>;
  /** Deletes the row and everything that hangs off it. Missing ids are a no-op. */
  deleteCascade(id: number): Promise<void>;
  count(): Promise<number>;
  /** Backend-independent natural keys, e.g. `WRK01/F-102`. Used by the divergence sweep. */
  listNaturalKeys(): Promise<string[]>;
}

export interface GeometryCapable {
  setGeometry(id: number, pin: LocationPin): Promise<void>;
}

export interface SiteScopedRepository<TRow, TInput> extends EntityRepository<TRow, TInput, SiteScopedKey> {
  /** All rows whose site-local key matches, across sites. */
  listByLocalKey(localKey: string): Promise<TRow[]>;
}

export interface CanonicalStore {
  readonly backend: BackendKind;
  readonly sites: EntityRepository<Site, SiteInput, SiteKey> & GeometryCapable;
  readonly finds: SiteScopedRepository<Find, FindInput> & GeometryCapable;
  readonly diveLogs: SiteScopedRepository<DiveLog, DiveLogInput>;
  readonly media: EntityRepository<Media, MediaInput, MediaKey>;
  readonly workers: EntityRepository<Worker, WorkerInput, WorkerKey>;

  /** Idempotent on (media, related type, related id). */
  linkMedia(link: MediaLinkInput): Promise<MediaRelation>;
  mediaRelations(relatedType: RelatedKind, relatedId: number): Promise<MediaRelation[]>;
  relationNaturalKeys(): Promise<string[]>;
  countRelations(): Promise<number>;

  workerByTelegram(handle: string): Promise<Worker | null>;
  addDiveTeamMembers(diveLogId: number, names: string[]): Promise<void>;
  diveTeamMembers(diveLogId: number): Promise<string[]>;

  /** Records media waiting for an entity that has not arrived yet. Idempotent. */
  addPendingLink(marker: PendingLinkInput): Promise<void>;
  /** Atomically turns matching markers into relations to `relatedId`. */
  resolvePendingLinks(ref: PendingRefQuery, relatedId: number): Promise<MediaRelation[]>;
  pendingLinks(): Promise<PendingLink[]>;

  migrate(): Promise<void>;
  close(): Promise<void>;
}

// ─── Durable sync queue ─────────────────────────────────────────────────────

export interface SyncQueueStore {
  enqueue(origin: Origin & { username?: string }, kind: MessageKind, payload: NormalizedRecord, receivedAt?: Date): Promise<EnqueueResult>;
  claimNext(now?: Date): Promise<QueueEntry | null>;
  heartbeat(id: number, now?: Date): Promise<void>;
  markApplied(id: number, now?: Date): Promise<void>;
  /** With `retry`, the failure is transient and the entry goes back to pending at `retryAt`. */
  markFailed(id: number, detail: string, retry?: { retryAt: Date }): Promise<void>;
  listFailed(limit?: number): Promise<QueueEntry[]>;
  requeue(id: number, now?: Date): Promise<QueueEntry>;
  get(id: number): Promise<QueueEntry | null>;
  recoverStale(cutoff: Date): Promise<number>;
  stats(): Promise<QueueStats>;
}

export interface DivergenceLog {
  recordDivergence(entry: { entryId: number | null; backend: string; kind: DivergenceKind; detail: string }): Promise<void>;
  listDivergences(limit?: number): Promise<DivergenceRecord[]>;
}

/** One opened backend: the canonical store plus the queue tables living beside it. */
export interface Backend {
  readonly kind: BackendKind;
  readonly store: CanonicalStore;
  readonly queue: SyncQueueStore & DivergenceLog;
  close(): Promise<void>;
}

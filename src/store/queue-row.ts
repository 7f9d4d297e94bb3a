import { z } from 'zod';
import { MESSAGE_KINDS, QUEUE_STATES, type DivergenceRecord, type QueueEntry } from '../shared/types.js';
import { normalizedRecordSchema } from '../sync/records.js';

// SQLite hands back ISO text, PostgreSQL hands back Date objects; both coerce.
const queueRowSchema = z.object({
  id: z.coerce.number().int(),
  chat_id: z.string(),
  message_id: z.string(),
  user_id: z.string(),
  username: z.string().nullable(),
  message_kind: z.enum(MESSAGE_KINDS),
  payload: z.unknown(),
  state: z.enum(QUEUE_STATES),
  retry_count: z.coerce.number().int(),
  last_error: z.string().nullable(),
  error_detail: z.string().nullable(),
  received_at: z.coerce.date(),
  available_at: z.coerce.date(),
  heartbeat_at: z.coerce.date().nullable(),
  processed_at: z.coerce.date().nullable(),
});

export const QUEUE_COLUMNS =
  'id, chat_id, message_id, user_id, username, message_kind, payload, state, retry_count, ' +
  'last_error, error_detail, received_at, available_at, heartbeat_at, processed_at';

export function toQueueEntry(raw: unknown): QueueEntry {
  const row = queueRowSchema.parse(raw);
  const payload: unknown = typeof row.payload === 'string' ? JSON.parse(row.payload) : row.payload;
  return {
    id: row.id,
    origin: {
      externalUserId: row.user_id,
      externalChatId: row.chat_id,
      externalMessageId: row.message_id,
    },
    username: row.username,
    messageKind: row.message_kind,
    payload: normalizedRecordSchema.parse(payload),
    state: row.state,
    retryCount: row.retry_count,
    lastError: row.last_error,
    errorDetail: row.error_detail,
    receivedAt: row.received_at,
    availableAt: row.available_at,
    heartbeatAt: row.heartbeat_at,
    processedAt: row.processed_at,
  };
}

const claimedIdSchema = z.object({ id: z.coerce.number().int() });

function unreadableDetail(err: unknown): string {
  if (err instanceof z.ZodError) {
    return err.issues.map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`).join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Maps a freshly claimed row. A row whose stored payload no longer parses is
 * reported by id so the claimer can fail it instead of leaving it `processing`.
 */
export function readClaimedRow(raw: unknown): { entry: QueueEntry } | { id: number; detail: string } {
  try {
    return { entry: toQueueEntry(raw) };
  } catch (err) {
    const { id } = claimedIdSchema.parse(raw);
    return { id, detail: `Unreadable queue entry: ${unreadableDetail(err)}` };
  }
}

const divergenceRowSchema = z.object({
  id: z.coerce.number().int(),
  entry_id: z.coerce.number().int().nullable(),
  backend: z.string(),
  kind: z.enum(['write_failed', 'enqueue_failed', 'sweep']),
  detail: z.string(),
  created_at: z.coerce.date(),
});

export const DIVERGENCE_COLUMNS = 'id, entry_id, backend, kind, detail, created_at';

export function toDivergenceRecord(raw: unknown): DivergenceRecord {
  const row = divergenceRowSchema.parse(raw);
  return {
    id: row.id,
    entryId: row.entry_id,
    backend: row.backend,
    kind: row.kind,
    detail: row.detail,
    createdAt: row.created_at,
  };
}

export function emptyStats(): Record<(typeof QUEUE_STATES)[number], number> {
  return { pending: 0, processing: 0, applied: 0, failed: 0 };
}

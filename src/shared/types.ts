import type { NormalizedRecord } from '../sync/records.js';

// ─── Field submission kinds ─────────────────────────────────────────────────

export const MESSAGE_KINDS = ['find', 'photo', 'video', 'location', 'signature', 'dive_log'] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

// ─── Queue state ────────────────────────────────────────────────────────────

export const QUEUE_STATES = ['pending', 'processing', 'applied', 'failed'] as const;

export type QueueState = (typeof QUEUE_STATES)[number];

// ─── Transport boundary ─────────────────────────────────────────────────────

export interface Origin {
  externalUserId: string;
  externalChatId: string;
  externalMessageId: string;
}

export interface InboundMessage extends Origin {
  kind: MessageKind;
  payload: string | Record<string, unknown>;
  mediaBlobRef?: string;
  /** Transport send time; orders the queue when present. */
  sentAt?: Date;
  username?: string;
}

// ─── Queue entry ────────────────────────────────────────────────────────────

export interface QueueEntry {
  id: number;
  origin: Origin;
  username: string | null;
  messageKind: MessageKind;
  payload: NormalizedRecord;
  state: QueueState;
  retryCount: number;
  /** Most recent transient failure, kept while the entry waits for its retry. */
  lastError: string | null;
  /** Set only while the entry is `failed`. */
  errorDetail: string | null;
  receivedAt: Date;
  availableAt: Date;
  heartbeatAt: Date | null;
  processedAt: Date | null;
}

export interface EnqueueResult {
  id: number;
  duplicate: boolean;
}

export type QueueStats = Record<QueueState, number>;

// ─── Mirror ─────────────────────────────────────────────────────────────────

export type DivergenceKind = 'write_failed' | 'enqueue_failed' | 'sweep';

export interface DivergenceRecord {
  id: number;
  entryId: number | null;
  backend: string;
  kind: DivergenceKind;
  detail: string;
  createdAt: Date;
}

/** Context an applied record carries over to the mirror. */
export interface ApplyContext {
  entryId: number;
  /** Display name credited as finder or photographer when the record names nobody. */
  submittedBy: string | null;
  /** UTC calendar day the submission was sent; the date of a find or dive created without one. */
  reportedOn: string;
}

export interface MirrorJob {
  entryId: number;
  record: NormalizedRecord;
  context: ApplyContext;
}

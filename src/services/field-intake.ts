import { MalformedInputError } from '../shared/errors.js';
import { createChildLogger } from '../shared/logger.js';
import type { InboundMessage } from '../shared/types.js';
import type { SyncQueueStore } from '../store/types.js';
import { normalizeMessage } from '../sync/normalizer.js';
import type { NormalizedRecord } from '../sync/records.js';

const log = createChildLogger('field-intake');

export type IntakeResult =
  | { status: 'accepted'; entryId: number }
  | { status: 'duplicate'; entryId: number }
  | { status: 'rejected'; problems: string[] };

function tryNormalize(message: InboundMessage): { record: NormalizedRecord } | { problems: string[] } {
  try {
    return { record: normalizeMessage(message) };
  } catch (err) {
    if (err instanceof MalformedInputError) return { problems: err.problems };
    throw err;
  }
}

/**
 * Normalizes a field submission and queues it. Malformed submissions are
 * rejected here and never reach the queue; re-deliveries return the original entry.
 */
export async function submitFieldMessage(queue: SyncQueueStore, message: InboundMessage): Promise<IntakeResult> {
  const normalized = tryNormalize(message);
  if ('problems' in normalized) {
    log.info(
      { chatId: message.externalChatId, messageId: message.externalMessageId, problems: normalized.problems },
      'Field submission rejected',
    );
    return { status: 'rejected', problems: normalized.problems };
  }

  const { id, duplicate } = await queue.enqueue(
    {
      externalUserId: message.externalUserId,
      externalChatId: message.externalChatId,
      externalMessageId: message.externalMessageId,
      username: message.username,
    },
    message.kind,
    normalized.record,
    message.sentAt,
  );

  if (duplicate) {
    log.info({ entryId: id, messageId: message.externalMessageId }, 'Duplicate delivery – already queued');
    return { status: 'duplicate', entryId: id };
  }
  log.info({ entryId: id, kind: message.kind }, 'Field submission queued');
  return { status: 'accepted', entryId: id };
}

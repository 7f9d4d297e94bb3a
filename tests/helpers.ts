import { createHash } from 'node:crypto';
import type { InboundMessage, Origin } from '../src/shared/types.js';
import { openSqliteBackend } from '../src/store/sqlite/database.js';
import type { Backend } from '../src/store/types.js';
import type { NormalizedRecord } from '../src/sync/records.js';

export const T0 = new Date('2024-03-05T08:00:00.000Z');

/** `T0` plus a number of seconds. */
export function at(seconds: number): Date {
  return new Date(T0.getTime() + seconds * 1000);
}

/** Manually advanced clock shared by the queue and the reconciler. */
export class TestClock {
  private current: Date;

  constructor(start: Date = T0) {
    this.current = new Date(start);
  }

  readonly now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function openMemoryBackend(clock: TestClock): Promise<Backend> {
  return openSqliteBackend(':memory:', clock.now);
}

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function origin(chatId: string, messageId: string): Origin {
  return { externalUserId: '99', externalChatId: chatId, externalMessageId: messageId };
}

export function findRecord(findNumber = 'F-102'): NormalizedRecord {
  return { type: 'find_report', siteRef: 'WRK01', findNumber, photoRefs: [] };
}

export function fieldMessage(
  fields: Pick<InboundMessage, 'kind' | 'payload'> & Partial<InboundMessage>,
): InboundMessage {
  return {
    externalUserId: '99',
    externalChatId: '42',
    externalMessageId: '1',
    sentAt: T0,
    ...fields,
  };
}

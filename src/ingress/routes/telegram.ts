import type { FastifyInstance } from 'fastify';
import { createChildLogger } from '../../shared/logger.js';
import type { SyncQueueStore } from '../../store/types.js';
import { submitFieldMessage } from '../../services/field-intake.js';
import { rejectionText, type TelegramReply } from '../../services/telegram-notifier.js';
import { telegramUpdateSchema, toInboundMessage } from '../telegram.js';
import { validateTelegramWebhook } from '../validators/telegram.js';

const log = createChildLogger('route:telegram');

export interface TelegramRouteOptions {
  queue: SyncQueueStore;
  webhookSecret: string;
  /** Sends the rejection notice back to the chat; omitted when no bot token is configured. */
  reply?: TelegramReply;
}

export async function telegramRoutes(app: FastifyInstance, opts: TelegramRouteOptions) {
  app.post('/webhook/telegram', async (request, reply) => {
    // 1. Validate secret token
    validateTelegramWebhook(request, opts.webhookSecret);

    // 2. Parse the update
    const parsed = telegramUpdateSchema.safeParse(request.body);
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues.length }, 'Unrecognised Telegram update');
      return reply.status(200).send({ status: 'ignored' });
    }

    const message = toInboundMessage(parsed.data);
    if (!message) {
      return reply.status(200).send({ status: 'ignored' });
    }

    // 3. Normalize + enqueue (idempotent on chat/message id)
    const result = await submitFieldMessage(opts.queue, message);

    if (result.status === 'rejected' && opts.reply) {
      opts
        .reply({
          chatId: message.externalChatId,
          text: rejectionText(result.problems),
          replyToMessageId: message.externalMessageId,
        })
        .catch((err: unknown) => {
          log.warn({ err, chatId: message.externalChatId }, 'Rejection reply failed');
        });
    }

    // Always 200 so Telegram does not redeliver
    return reply.status(200).send(result);
  });
}

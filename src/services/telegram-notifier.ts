import { createChildLogger } from '../shared/logger.js';

const log = createChildLogger('telegram-notifier');

const BASE_URL = 'https://api.telegram.org';

export interface SendTelegramParams {
  chatId: string;
  text: string;
  replyToMessageId?: string;
}

export type TelegramReply = (params: SendTelegramParams) => Promise<void>;

/** Bot API `sendMessage` bound to one bot token. */
export function createTelegramNotifier(botToken: string): TelegramReply {
  return async (params) => {
    log.info({ chatId: params.chatId }, 'Sending Telegram reply');

    const response = await fetch(`${BASE_URL}/bot${botToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: params.chatId,
        text: params.text,
        ...(params.replyToMessageId
          ? { reply_parameters: { message_id: Number(params.replyToMessageId), allow_sending_without_reply: true } }
          : {}),
      }),
    });

    if (!response.ok) {
      const errBody = await response.text();
      log.error({ status: response.status, body: errBody }, 'Telegram send failed');
      throw new Error(`Telegram API error: ${response.status} - ${errBody}`);
    }
  };
}

export function rejectionText(problems: string[]): string {
  return ['Submission not recorded:', ...problems.map((p) => `• ${p}`)].join('\n');
}

import { timingSafeEqual } from 'node:crypto';
import type { FastifyRequest } from 'fastify';
import { UnauthorizedError } from '../../shared/errors.js';
import { createChildLogger } from '../../shared/logger.js';

const log = createChildLogger('telegram-validator');

/**
 * Checks the `X-Telegram-Bot-Api-Secret-Token` header against the secret
 * registered with `setWebhook`. An empty secret disables the check.
 */
export function validateTelegramWebhook(request: FastifyRequest, secret: string): void {
  if (!secret) {
    log.warn('TELEGRAM_WEBHOOK_SECRET not set – skipping validation (dev mode only)');
    return;
  }

  const header = request.headers['x-telegram-bot-api-secret-token'];
  if (typeof header !== 'string') {
    throw new UnauthorizedError('Missing X-Telegram-Bot-Api-Secret-Token header');
  }

  const given = Buffer.from(header);
  const expected = Buffer.from(secret);
  if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
    log.warn('Telegram webhook secret mismatch');
    throw new UnauthorizedError('Invalid webhook secret');
  }
}

import Fastify, { type FastifyInstance } from 'fastify';
import { registerErrorHandler } from '../shared/http.js';
import { createChildLogger } from '../shared/logger.js';
import { telegramRoutes, type TelegramRouteOptions } from './routes/telegram.js';

const log = createChildLogger('ingress');

export async function buildIngressApp(deps: TelegramRouteOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own pino instance
    bodyLimit: 1_048_576, // 1 MB
  });

  registerErrorHandler(app, log);

  // ─── Health check ─────────────────────────────────────────────────
  app.get('/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }));

  // ─── Register routes ──────────────────────────────────────────────
  await app.register(telegramRoutes, deps);

  return app;
}

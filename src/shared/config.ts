import { z } from 'zod';
import 'dotenv/config';

const backendSchema = z.enum(['sqlite', 'postgres']);

const envSchema = z
  .object({
    // ─── Core ──────────────────────────────────────────────────────────
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

    // ─── HTTP ──────────────────────────────────────────────────────────
    INGRESS_PORT: z.coerce.number().default(3000),
    ADMIN_PORT: z.coerce.number().default(3001),

    // ─── Primary canonical store ───────────────────────────────────────
    STORE_BACKEND: backendSchema.default('sqlite'),
    SQLITE_PATH: z.string().default('./data/excavation.db'),
    DATABASE_URL: z.string().default(''),
    PG_POSTGIS: z
      .enum(['true', 'false'])
      .default('true')
      .transform((v) => v === 'true'),

    // ─── Mirror (migration window) ─────────────────────────────────────
    MIRROR_BACKEND: z.enum(['none', 'sqlite', 'postgres']).default('none'),
    MIRROR_SQLITE_PATH: z.string().default('./data/excavation-mirror.db'),
    MIRROR_DATABASE_URL: z.string().default(''),
    MIRROR_TRANSPORT: z.enum(['inline', 'bullmq']).default('inline'),
    MIRROR_SWEEP_CRON: z.string().default('*/15 * * * *'),

    // ─── Redis ─────────────────────────────────────────────────────────
    REDIS_URL: z.string().default('redis://localhost:6379'),

    // ─── Telegram ──────────────────────────────────────────────────────
    TELEGRAM_BOT_TOKEN: z.string().default(''),
    TELEGRAM_WEBHOOK_SECRET: z.string().default(''),

    // ─── Sync consumer ─────────────────────────────────────────────────
    SYNC_POLL_CRON: z.string().default('*/2 * * * * *'), // every 2 seconds (6-field cron)
    SYNC_CONCURRENCY: z.coerce.number().int().min(1).max(8).default(1),
    SYNC_MAX_RETRIES: z.coerce.number().int().min(1).default(8),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().positive().default(30_000),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().positive().default(600_000),
    STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(15_000),
    STALE_PROCESSING_MS: z.coerce.number().int().positive().default(300_000),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_BACKEND === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'required when STORE_BACKEND=postgres',
      });
    }
    if (env.MIRROR_BACKEND === 'postgres' && !env.MIRROR_DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MIRROR_DATABASE_URL'],
        message: 'required when MIRROR_BACKEND=postgres',
      });
    }
    if (
      env.STORE_BACKEND === 'sqlite' &&
      env.MIRROR_BACKEND === 'sqlite' &&
      env.MIRROR_SQLITE_PATH === env.SQLITE_PATH
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MIRROR_SQLITE_PATH'],
        message: 'mirror must not point at the primary database file',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;
export type BackendKind = z.infer<typeof backendSchema>;

function loadConfig(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('❌ Invalid environment variables:', result.error.flatten().fieldErrors);
    process.exit(1);
  }
  return result.data;
}

export const config = loadConfig();

import { z } from 'zod';

const flag = z.enum(['true', 'false']);

const baseSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().optional(),
  API_PREFIX: z.string().optional().refine((v) => !v || v === 'api', { message: 'API_PREFIX must be "api"' }),
  LOG_LEVEL: z.string().optional(),
  INTERNAL_SECRET: z.string().optional(),
  SWAGGER_ENABLED: flag.optional(),

  RATE_LIMIT_TTL: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),

  REDIS_ENABLED: flag.optional(),
  REDIS_URL: z.string().url().optional(),
  CACHE_DEFAULT_TTL_MS: z.coerce.number().int().nonnegative().default(60_000),

  SENTRY_DSN: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).optional(),

  MARKETPLACE_API_BASE_URL: z.string().url().default('https://merchant-api.ifood.com.br'),
  MARKETPLACE_CLIENT_ID: z.string().optional(),
  MARKETPLACE_CLIENT_SECRET: z.string().optional(),
  MARKETPLACE_CREDENTIALS: z.string().optional(),
  MARKETPLACE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(4000),
  MARKETPLACE_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),

  RETRY_BASE_MS: z.coerce.number().int().positive().default(1000),
  RETRY_FACTOR: z.coerce.number().min(1).default(2),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().positive().default(60_000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(6),

  BREAKER_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(5),
  BREAKER_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  BREAKER_COOLDOWN_MS: z.coerce.number().int().positive().default(30_000),
  BREAKER_MAX_COOLDOWN_MS: z.coerce.number().int().positive().default(300_000),

  TOKEN_REFRESH_RATIO: z.coerce.number().gt(0).lt(1).default(0.2),

  POLLER_ENABLED: flag.optional(),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  POLL_CONCURRENCY: z.coerce.number().int().positive().default(10),
  POLL_MERCHANTS: z.string().optional(),

  DEDUP_TTL_HOURS: z.coerce.number().positive().default(24),
  ACK_MAX_ATTEMPTS: z.coerce.number().int().positive().default(6),

  MERCHANT_STATUS_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(300_000),
  MERCHANT_AVAILABILITY_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(3_600_000),
  CANCELLATION_REASONS_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(3_600_000),
  SALES_SUMMARY_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(300_000),

  EVENT_BUS_WEBHOOK_URL: z.string().url().optional(),
  EVENT_BUS_HMAC_SECRET: z.string().optional(),
});

export type EnvShape = z.infer<typeof baseSchema>;

const credentialsMapSchema = z.record(
  z.object({
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
  }),
);

export type CredentialsMap = z.infer<typeof credentialsMapSchema>;

export function parseCredentialsMap(raw: string | undefined): CredentialsMap {
  if (!raw) return {};
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error('MARKETPLACE_CREDENTIALS must be valid JSON');
  }
  const parsed = credentialsMapSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error('MARKETPLACE_CREDENTIALS must map merchant ids to { clientId, clientSecret }');
  }
  return parsed.data;
}

export function validateEnv(config: Record<string, unknown>) {
  const parsed = baseSchema
    .superRefine((env, ctx) => {
      if (env.NODE_ENV === 'production' && !env.INTERNAL_SECRET) {
        ctx.addIssue({ code: 'custom', path: ['INTERNAL_SECRET'], message: 'INTERNAL_SECRET is required in production' });
      }
      if (env.EVENT_BUS_WEBHOOK_URL && !env.EVENT_BUS_HMAC_SECRET) {
        ctx.addIssue({
          code: 'custom',
          path: ['EVENT_BUS_HMAC_SECRET'],
          message: 'EVENT_BUS_HMAC_SECRET is required when EVENT_BUS_WEBHOOK_URL is set',
        });
      }
      if (Boolean(env.MARKETPLACE_CLIENT_ID) !== Boolean(env.MARKETPLACE_CLIENT_SECRET)) {
        ctx.addIssue({
          code: 'custom',
          path: ['MARKETPLACE_CLIENT_SECRET'],
          message: 'MARKETPLACE_CLIENT_ID and MARKETPLACE_CLIENT_SECRET must be set together',
        });
      }
      try {
        parseCredentialsMap(env.MARKETPLACE_CREDENTIALS);
      } catch (err) {
        ctx.addIssue({ code: 'custom', path: ['MARKETPLACE_CREDENTIALS'], message: err instanceof Error ? err.message : String(err) });
      }
      if (env.BREAKER_MAX_COOLDOWN_MS < env.BREAKER_COOLDOWN_MS) {
        ctx.addIssue({
          code: 'custom',
          path: ['BREAKER_MAX_COOLDOWN_MS'],
          message: 'BREAKER_MAX_COOLDOWN_MS must be >= BREAKER_COOLDOWN_MS',
        });
      }
    })
    .safeParse(config);

  if (!parsed.success) {
    const formatted = parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${formatted}`);
  }

  return parsed.data;
}

import { z } from 'zod';

/** Comma-separated list: entries trimmed, empties dropped. */
const csv = (fallback = '') =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0),
    );

/** Snowflake ID or nothing. An empty string counts as unset. */
const optionalId = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

export const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  DEBUG: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),

  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required'),
  MONGODB_DB_NAME: z.string().min(1).default('maestros_community'),
  REDIS_URL: z.string().default('redis://localhost:6379'),

  DISCORD_BOT_TOKEN: z.string().default(''),
  DISCORD_GUILD_ID: optionalId,
  COMMAND_PREFIX: z.string().default('!'),
  BOT_STATUS: z.string().default('Maestros Community'),

  CEO_ROLE_ID: optionalId,
  MANAGER_ROLE_ID: optionalId,
  MEMBER_ROLE_ID: optionalId,
  APPLICATION_PENDING_ROLE_ID: optionalId,

  RULES_CATEGORY_ID: optionalId,
  RP_INVITE_CHANNEL_ID: optionalId,
  APPLICATION_CHANNEL_ID: optionalId,
  ACCEPTED_LOG_CHANNEL_ID: optionalId,
  REJECTED_LOG_CHANNEL_ID: optionalId,
  AUDIT_LOG_CHANNEL_ID: optionalId,
  WELCOME_CHANNEL_ID: optionalId,
  MEMBER_COUNT_CHANNEL_ID: optionalId,
  DISCORD_INVITE_URL: z.string().default(''),

  DISCORD_CLIENT_ID: z.string().default(''),
  DISCORD_CLIENT_SECRET: z.string().default(''),
  DISCORD_REDIRECT_URI: z.string().default('http://localhost:8000/auth/callback'),

  JWT_SECRET_KEY: z.string().min(1, 'JWT_SECRET_KEY is required'),
  JWT_ALGORITHM: z.literal('HS256').default('HS256'),
  JWT_EXPIRE_MINUTES: z.coerce.number().int().min(1).default(60),

  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  CORS_ORIGINS: csv('http://localhost:3000'),
  FRONTEND_URL: z.string().default('http://localhost:3000'),
  ADMIN_DISCORD_IDS: csv(),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).default(60),

  JIOSAAVN_API_URL: z.string().url().default('https://www.jiosaavn.com/api.php'),
  SENTRY_DSN: z.string().default(''),
});

export type AppEnv = z.infer<typeof EnvSchema>;

/**
 * `ConfigModule.forRoot({ validate })` hook. Fails startup with every
 * problem listed at once.
 */
export function validateEnv(raw: Record<string, unknown>): AppEnv {
  const result = EnvSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}

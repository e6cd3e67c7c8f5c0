import { Throttle } from '@nestjs/throttler';

/** When true, all rate limits are effectively disabled. */
const isTestEnv = process.env.THROTTLE_DISABLED === 'true';

/**
 * Per-route overrides of the global RATE_LIMIT_PER_MINUTE throttle.
 */
export const RATE_LIMIT_TIERS = {
  auth: { ttl: 60_000, limit: isTestEnv ? 999_999 : 10 },
  music: { ttl: 60_000, limit: isTestEnv ? 999_999 : 30 },
  discord: { ttl: 60_000, limit: isTestEnv ? 999_999 : 20 },
} as const;

export type RateLimitTier = keyof typeof RATE_LIMIT_TIERS;

/**
 * Maps a tier name to `@Throttle()` overrides.
 *
 * Usage: `@RateLimit('auth')` on a controller method or class.
 */
export function RateLimit(
  tier: RateLimitTier,
): MethodDecorator & ClassDecorator {
  const { ttl, limit } = RATE_LIMIT_TIERS[tier];
  return Throttle({ default: { ttl, limit } });
}

import { z } from 'zod';

export const BotConnectionStateSchema = z.enum(['not_started', 'starting', 'online']);
export type BotConnectionState = z.infer<typeof BotConnectionStateSchema>;

/** Response for GET /health */
export const HealthResponseSchema = z.object({
    status: z.enum(['healthy', 'degraded']),
    api: z.literal('online'),
    database: z.object({
        connected: z.boolean(),
        latencyMs: z.number(),
    }),
    discord_bot: z.enum(['online', 'starting', 'offline']),
    timestamp: z.string().datetime(),
});

export type HealthResponseDto = z.infer<typeof HealthResponseSchema>;

/** Response for GET /bot/status */
export const BotStatusSchema = z.object({
    status: BotConnectionStateSchema,
    guilds: z.number().int(),
    /** Websocket heartbeat in ms, null until the first heartbeat */
    latency: z.number().nullable(),
});

export type BotStatusDto = z.infer<typeof BotStatusSchema>;

export const CacheNamespaceSchema = z.enum(['user', 'game', 'discord', 'general']);
export type CacheNamespace = z.infer<typeof CacheNamespaceSchema>;

export const CacheStatusSchema = z.object({
    caches: z.array(z.object({
        name: CacheNamespaceSchema,
        size: z.number().int(),
        ttlSeconds: z.number().int(),
    })),
});

export type CacheStatusDto = z.infer<typeof CacheStatusSchema>;

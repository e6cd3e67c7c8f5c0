import { z } from 'zod';

export const CreateGameSchema = z.object({
    name: z.string().trim().min(1).max(100),
    description: z.string().max(2000).default(''),
    image_url: z.string().url().nullable().optional(),
    category: z.string().max(50).default('general'),
    platform: z.string().max(50).nullable().optional(),
    clan: z.string().max(100).nullable().optional(),
    active: z.boolean().default(true),
});

export type CreateGameDto = z.infer<typeof CreateGameSchema>;

export const UpdateGameSchema = CreateGameSchema.partial();
export type UpdateGameDto = z.infer<typeof UpdateGameSchema>;

export const GameListQuerySchema = z.object({
    active_only: z.enum(['true', 'false']).default('true'),
    limit: z.coerce.number().int().min(1).max(100).default(100),
    skip: z.coerce.number().int().min(0).default(0),
});

export type GameListQueryDto = z.infer<typeof GameListQuerySchema>;

export const GameSchema = z.object({
    id: z.string(),
    name: z.string(),
    description: z.string(),
    image_url: z.string().nullable(),
    category: z.string(),
    platform: z.string().nullable(),
    clan: z.string().nullable(),
    active: z.boolean(),
    created_at: z.string().datetime(),
    updated_at: z.string().datetime().nullable(),
});

export type GameDto = z.infer<typeof GameSchema>;

import { z } from 'zod';
import { PermissionsSchema } from './auth.schema.js';

export const UserSchema = z.object({
    id: z.string(),
    discord_id: z.string(),
    username: z.string(),
    discriminator: z.string().nullable().optional(),
    avatar: z.string().nullable().optional(),
    email: z.string().nullable().optional(),
    roles: z.array(z.string()),
    guild_roles: z.array(z.string()),
    xp: z.number().int(),
    level: z.number().int(),
    badges: z.array(z.string()),
    joined_at: z.string().datetime().nullable().optional(),
    last_login: z.string().datetime().nullable().optional(),
});

export type UserDto = z.infer<typeof UserSchema>;

/** GET /auth/me */
export const CurrentUserSchema = UserSchema.extend({
    permissions: PermissionsSchema,
});

export type CurrentUserDto = z.infer<typeof CurrentUserSchema>;

export const UpdateUserSchema = z.object({
    username: z.string().trim().min(2).max(32),
});

export type UpdateUserDto = z.infer<typeof UpdateUserSchema>;

export const AddXpSchema = z.object({
    user_id: z.string().min(1),
    amount: z.number().int().min(1).max(10000),
    reason: z.string().max(200).optional(),
});

export type AddXpDto = z.infer<typeof AddXpSchema>;

export const LeaderboardQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(100).default(10),
});

export const LeaderboardEntrySchema = z.object({
    rank: z.number().int(),
    username: z.string(),
    avatar: z.string().nullable(),
    xp: z.number().int(),
    level: z.number().int(),
    badges: z.array(z.string()),
});

export type LeaderboardEntryDto = z.infer<typeof LeaderboardEntrySchema>;

export const ActivityEntrySchema = z.object({
    id: z.string(),
    user_id: z.string(),
    type: z.string(),
    description: z.string(),
    data: z.record(z.unknown()).optional(),
    timestamp: z.string().datetime(),
});

export type ActivityEntryDto = z.infer<typeof ActivityEntrySchema>;

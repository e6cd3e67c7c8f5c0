import { z } from 'zod';

export const BADGE_NAMES = [
    'Member',
    'VIP',
    'Elite',
    'Champion',
    'Legend',
    'Staff',
    'Moderator',
    'Event Winner',
    'Tournament Victor',
    'Top Player',
] as const;

export const BadgeSchema = z.enum(BADGE_NAMES, {
    errorMap: () => ({ message: 'Invalid badge name' }),
});
export type Badge = z.infer<typeof BadgeSchema>;

export const AwardBadgeSchema = z.object({
    badge: BadgeSchema,
});

export const AwardXpSchema = z.object({
    amount: z.number().int()
        .min(1, 'XP amount must be between 1 and 10000')
        .max(10000, 'XP amount must be between 1 and 10000'),
    reason: z.string().max(200).optional(),
});

export type AwardXpDto = z.infer<typeof AwardXpSchema>;

export const ReviewQuerySchema = z.object({
    status: z.enum(['approved', 'rejected']),
    notes: z.string().max(500).optional(),
});

export type ReviewQueryDto = z.infer<typeof ReviewQuerySchema>;

export const AdminPageQuerySchema = z.object({
    skip: z.coerce.number().int().min(0).default(0),
    limit: z.coerce.number().int().min(1).max(200).default(50),
});

export const AdminStatsSchema = z.object({
    total_users: z.number().int(),
    pending_applications: z.number().int(),
    total_events: z.number().int(),
    upcoming_events: z.number().int(),
});

export type AdminStatsDto = z.infer<typeof AdminStatsSchema>;

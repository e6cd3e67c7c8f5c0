import { z } from 'zod';

export const DEFAULT_RULE_CATEGORIES = ['general', 'conduct', 'gameplay'] as const;

export const CreateRuleSchema = z.object({
    title: z.string().trim().min(3).max(100),
    content: z.string().trim().min(10).max(4000),
    category: z.string().trim().min(1).max(100).default('general'),
    order: z.number().int().min(0).default(0),
    active: z.boolean().default(true),
    /** Discord text channel to post the rule in */
    channel_id: z.string().optional(),
});

export type CreateRuleDto = z.infer<typeof CreateRuleSchema>;

export const UpdateRuleSchema = CreateRuleSchema.partial();
export type UpdateRuleDto = z.infer<typeof UpdateRuleSchema>;

export const RuleListQuerySchema = z.object({
    active_only: z.enum(['true', 'false']).default('true'),
    category: z.string().optional(),
});

export type RuleListQueryDto = z.infer<typeof RuleListQuerySchema>;

export const RuleSchema = z.object({
    id: z.string(),
    title: z.string(),
    content: z.string(),
    category: z.string(),
    order: z.number().int(),
    active: z.boolean(),
    discord_channel_id: z.string().nullable(),
    discord_message_id: z.string().nullable(),
    created_by: z.string().nullable(),
    created_at: z.string().datetime(),
    updated_at: z.string().datetime().nullable(),
});

export type RuleDto = z.infer<typeof RuleSchema>;

/** A text channel under the rules category, or a default category when the bot is offline. */
export const RuleChannelSchema = z.object({
    id: z.string(),
    name: z.string(),
    display_name: z.string(),
});

export type RuleChannelDto = z.infer<typeof RuleChannelSchema>;

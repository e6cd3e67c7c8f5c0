import { z } from 'zod';

export const EmbedFieldSchema = z.object({
    name: z.string().min(1).max(256),
    value: z.string().min(1).max(1024),
    inline: z.boolean().default(false),
});

export const AnnouncementEmbedSchema = z.object({
    title: z.string().max(256).optional(),
    description: z.string().max(4096).optional(),
    /** Hex color such as `#5865F2` */
    color: z.string().default('#5865F2'),
    thumbnail_url: z.string().url().optional(),
    image_url: z.string().url().optional(),
    footer_text: z.string().max(2048).optional(),
    footer_icon_url: z.string().url().optional(),
    author_name: z.string().max(256).optional(),
    author_icon_url: z.string().url().optional(),
    /** Stamp the embed with the send time */
    timestamp: z.boolean().default(false),
    fields: z.array(EmbedFieldSchema).max(25).default([]),
});

export type AnnouncementEmbedDto = z.infer<typeof AnnouncementEmbedSchema>;

export const MentionConfigSchema = z.object({
    everyone: z.boolean().default(false),
    here: z.boolean().default(false),
    role_ids: z.array(z.string()).default([]),
    user_ids: z.array(z.string()).default([]),
});

export type MentionConfigDto = z.infer<typeof MentionConfigSchema>;

export const SendAnnouncementSchema = z.object({
    guild_id: z.string().min(1),
    channel_id: z.string().min(1),
    embed: AnnouncementEmbedSchema,
    mentions: MentionConfigSchema.default({}),
    /** Plain text sent above the embed */
    content: z.string().max(2000).optional(),
});

export type SendAnnouncementDto = z.infer<typeof SendAnnouncementSchema>;

export const SendAnnouncementResultSchema = z.object({
    success: z.literal(true),
    message_id: z.string(),
    channel_name: z.string(),
    guild_name: z.string(),
    message_url: z.string(),
});

export type SendAnnouncementResultDto = z.infer<typeof SendAnnouncementResultSchema>;

export const AnnouncementLogSchema = z.object({
    id: z.string(),
    manager_id: z.string(),
    manager_username: z.string(),
    guild_id: z.string(),
    guild_name: z.string(),
    channel_id: z.string(),
    channel_name: z.string(),
    embed_summary: z.object({
        title: z.string().nullable().optional(),
        description: z.string().nullable().optional(),
        fields_count: z.number().int().optional(),
    }),
    mentions: z.object({
        everyone: z.boolean().optional(),
        here: z.boolean().optional(),
        roles_count: z.number().int().optional(),
        users_count: z.number().int().optional(),
    }),
    content: z.string().nullable(),
    success: z.boolean(),
    error_message: z.string().nullable(),
    timestamp: z.string().datetime(),
});

export type AnnouncementLogDto = z.infer<typeof AnnouncementLogSchema>;

export const AnnouncementLogQuerySchema = z.object({
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(100).default(50),
});

export type AnnouncementLogQueryDto = z.infer<typeof AnnouncementLogQuerySchema>;

export const MemberSearchQuerySchema = z.object({
    query: z.string().trim().min(1).max(100),
    limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type MemberSearchQueryDto = z.infer<typeof MemberSearchQuerySchema>;

import { z } from 'zod';
import { AnnouncementEmbedSchema } from './announcements.schema.js';

export const DiscordStatsSchema = z.object({
    total: z.number().int(),
    online: z.number().int(),
    ceo_online: z.number().int(),
    manager_online: z.number().int(),
    community_member_online: z.number().int(),
    last_update: z.string().datetime().nullable(),
});

export type DiscordStatsDto = z.infer<typeof DiscordStatsSchema>;

export const GuildRoleSchema = z.object({
    id: z.string(),
    name: z.string(),
    color: z.number().int(),
});

export type GuildRoleDto = z.infer<typeof GuildRoleSchema>;

export const GuildMemberSchema = z.object({
    display_name: z.string(),
    username: z.string(),
    discriminator: z.string().nullable(),
    discord_id: z.string(),
    avatar: z.string().nullable(),
    guild_roles: z.array(GuildRoleSchema),
    is_online: z.boolean(),
    permissions: z.object({
        is_admin: z.boolean(),
        is_ceo: z.boolean(),
        is_manager: z.boolean(),
        is_member: z.boolean(),
    }),
    level: z.number().int(),
    xp: z.number().int(),
    badges: z.array(z.string()),
    joined_at: z.string().datetime().nullable(),
    last_login: z.string().datetime().nullable(),
});

export type GuildMemberDto = z.infer<typeof GuildMemberSchema>;

export const GuildMembersResponseSchema = z.object({
    total_members: z.number().int(),
    members: z.array(GuildMemberSchema),
});

export type GuildMembersResponseDto = z.infer<typeof GuildMembersResponseSchema>;

/** Body for POST /discord/send-announcement */
export const DiscordMessageSchema = z.object({
    channel_id: z.string().min(1),
    content: z.string().max(2000).default(''),
    mention_everyone: z.boolean().default(false),
    mention_here: z.boolean().default(false),
    mention_roles: z.array(z.string()).default([]),
    mention_users: z.array(z.string()).default([]),
    embed: AnnouncementEmbedSchema.optional(),
});

export type DiscordMessageDto = z.infer<typeof DiscordMessageSchema>;

/** Body for POST /discord/send-invite-request */
export const InviteRequestSchema = z.object({
    server_name: z.string().trim().min(1).max(100),
    owner_name: z.string().trim().min(1).max(100),
    discord_id: z.string().trim().min(1).max(32),
    server_description: z.string().trim().min(1).max(2000),
    player_count: z.string().trim().max(50).default(''),
    server_ip: z.string().trim().max(200).default(''),
    additional_info: z.string().trim().max(1000).default(''),
});

export type InviteRequestDto = z.infer<typeof InviteRequestSchema>;

export const GuildSummarySchema = z.object({
    id: z.string(),
    name: z.string(),
    icon: z.string().nullable(),
    member_count: z.number().int(),
});

export type GuildSummaryDto = z.infer<typeof GuildSummarySchema>;

export const ChannelPermissionsSchema = z.object({
    send_messages: z.boolean(),
    embed_links: z.boolean(),
    mention_everyone: z.boolean(),
});

export const GuildChannelSchema = z.object({
    id: z.string(),
    name: z.string(),
    category: z.string(),
    position: z.number().int(),
    permissions: ChannelPermissionsSchema,
    can_send: z.boolean(),
});

export type GuildChannelDto = z.infer<typeof GuildChannelSchema>;

export const MentionableRoleSchema = z.object({
    id: z.string(),
    name: z.string(),
    color: z.string(),
    position: z.number().int(),
    mentionable: z.boolean(),
    member_count: z.number().int(),
});

export type MentionableRoleDto = z.infer<typeof MentionableRoleSchema>;

export const MemberSearchResultSchema = z.object({
    id: z.string(),
    username: z.string(),
    display_name: z.string(),
    discriminator: z.string().nullable(),
    avatar: z.string().nullable(),
});

export type MemberSearchResultDto = z.infer<typeof MemberSearchResultSchema>;

export const GuildMemberEntrySchema = z.object({
    user: z.object({
        id: z.string(),
        username: z.string(),
        /** `0000` for accounts on the new username system */
        discriminator: z.string(),
        display_name: z.string(),
    }),
});

export type GuildMemberEntryDto = z.infer<typeof GuildMemberEntrySchema>;

export const DiscordStatusSchema = z.object({
    online: z.boolean(),
    last_update: z.string().datetime().nullable(),
});

export type DiscordStatusDto = z.infer<typeof DiscordStatusSchema>;

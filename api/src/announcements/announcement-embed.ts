import { EmbedBuilder } from 'discord.js';
import type {
  AnnouncementEmbedDto,
  MentionConfigDto,
} from '@maestros/contract';
import { EMBED_COLORS } from '../discord-bot/discord-bot.constants';

const HEX_COLOR = /^#?([0-9a-f]{1,6})$/i;

/** `#RRGGBB` (hash optional) to a Discord color int; blurple when unparseable. */
export function hexToColor(hex: string): number {
  const match = HEX_COLOR.exec(hex.trim());
  return match ? parseInt(match[1], 16) : EMBED_COLORS.ANNOUNCEMENT;
}

export function buildAnnouncementEmbed(
  dto: AnnouncementEmbedDto,
  now: Date = new Date(),
): EmbedBuilder {
  const embed = new EmbedBuilder().setColor(hexToColor(dto.color));

  if (dto.title) embed.setTitle(dto.title);
  if (dto.description) embed.setDescription(dto.description);
  if (dto.thumbnail_url) embed.setThumbnail(dto.thumbnail_url);
  if (dto.image_url) embed.setImage(dto.image_url);
  if (dto.footer_text) {
    embed.setFooter({ text: dto.footer_text, iconURL: dto.footer_icon_url });
  }
  if (dto.author_name) {
    embed.setAuthor({ name: dto.author_name, iconURL: dto.author_icon_url });
  }
  if (dto.timestamp) embed.setTimestamp(now);
  if (dto.fields.length > 0) embed.addFields(dto.fields);

  return embed;
}

/**
 * Mention tokens in send order: everyone, here, roles, users. Unknown
 * role IDs are dropped when `knownRoleIds` is given.
 */
export function mentionTokens(
  mentions: MentionConfigDto,
  knownRoleIds?: ReadonlySet<string>,
): string[] {
  const tokens: string[] = [];
  if (mentions.everyone) tokens.push('@everyone');
  if (mentions.here) tokens.push('@here');
  for (const roleId of mentions.role_ids) {
    if (!knownRoleIds || knownRoleIds.has(roleId)) tokens.push(`<@&${roleId}>`);
  }
  for (const userId of mentions.user_ids) tokens.push(`<@${userId}>`);
  return tokens;
}

/** Mentions on their own line above the content. */
export function composeContent(tokens: string[], content?: string): string {
  const body = content ?? '';
  if (tokens.length === 0) return body;
  const line = tokens.join(' ');
  return body ? `${line}\n${body}` : line;
}

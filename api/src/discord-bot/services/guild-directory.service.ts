import { Injectable, NotFoundException } from '@nestjs/common';
import {
  ChannelType,
  PermissionFlagsBits,
  type Guild,
  type TextChannel,
} from 'discord.js';
import type {
  GuildChannelDto,
  GuildMemberEntryDto,
  GuildSummaryDto,
  MemberSearchResultDto,
  MentionableRoleDto,
} from '@maestros/contract';
import { DiscordBridgeService } from '../discord-bridge.service';

export interface ChannelPermissions {
  send_messages: boolean;
  embed_links: boolean;
  mention_everyone: boolean;
}

/** Bot permissions in a text channel; all false when the bot's member is not cached. */
export function botPermissionsIn(channel: TextChannel): ChannelPermissions {
  const me = channel.guild.members.me;
  const permissions = me ? channel.permissionsFor(me) : null;
  return {
    send_messages: permissions?.has(PermissionFlagsBits.SendMessages) ?? false,
    embed_links: permissions?.has(PermissionFlagsBits.EmbedLinks) ?? false,
    mention_everyone:
      permissions?.has(PermissionFlagsBits.MentionEveryone) ?? false,
  };
}

/**
 * Read-only views of the guilds the bot can see, shaped for the
 * announcement composer and the admin Discord pages.
 */
@Injectable()
export class GuildDirectoryService {
  constructor(private readonly bridge: DiscordBridgeService) {}

  listGuilds(): GuildSummaryDto[] {
    const client = this.bridge.requireClient();
    return client.guilds.cache.map((guild) => ({
      id: guild.id,
      name: guild.name,
      icon: guild.iconURL(),
      member_count: guild.memberCount,
    }));
  }

  getGuild(guildId: string): Guild {
    const guild = this.bridge.requireClient().guilds.cache.get(guildId);
    if (!guild) {
      throw new NotFoundException('Guild not found');
    }
    return guild;
  }

  getTextChannel(guild: Guild, channelId: string): TextChannel {
    const channel = guild.channels.cache.get(channelId);
    if (!channel || channel.type !== ChannelType.GuildText) {
      throw new NotFoundException('Text channel not found');
    }
    return channel;
  }

  /** Text channels sorted by category name, then position. */
  listTextChannels(guildId: string): GuildChannelDto[] {
    const guild = this.getGuild(guildId);
    const channels = guild.channels.cache
      .filter(
        (channel): channel is TextChannel =>
          channel.type === ChannelType.GuildText,
      )
      .map((channel) => {
        const permissions = botPermissionsIn(channel);
        return {
          id: channel.id,
          name: channel.name,
          category: channel.parent?.name ?? 'Uncategorized',
          position: channel.position,
          permissions,
          can_send: permissions.send_messages && permissions.embed_links,
        };
      });

    return channels.sort(
      (a, b) =>
        a.category.localeCompare(b.category) || a.position - b.position,
    );
  }

  /** Roles except @everyone, highest position first. */
  listRoles(guildId: string): MentionableRoleDto[] {
    const guild = this.getGuild(guildId);
    return guild.roles.cache
      .filter((role) => role.id !== guild.id)
      .map((role) => ({
        id: role.id,
        name: role.name,
        color: role.hexColor,
        position: role.position,
        mentionable: role.mentionable,
        member_count: role.members.size,
      }))
      .sort((a, b) => b.position - a.position);
  }

  listMembers(guildId: string): GuildMemberEntryDto[] {
    const guild = this.getGuild(guildId);
    return guild.members.cache
      .filter((member) => !member.user.bot)
      .map((member) => ({
        user: {
          id: member.id,
          username: member.user.username,
          discriminator:
            member.user.discriminator === '0'
              ? '0000'
              : member.user.discriminator,
          display_name: member.displayName,
        },
      }));
  }

  /** Case-insensitive match on username or display name, bots excluded. */
  searchMembers(
    guildId: string,
    query: string,
    limit: number,
  ): MemberSearchResultDto[] {
    const guild = this.getGuild(guildId);
    const needle = query.toLowerCase();
    const results: MemberSearchResultDto[] = [];

    for (const member of guild.members.cache.values()) {
      if (member.user.bot) continue;
      if (
        !member.user.username.toLowerCase().includes(needle) &&
        !member.displayName.toLowerCase().includes(needle)
      ) {
        continue;
      }

      results.push({
        id: member.id,
        username: member.user.username,
        display_name: member.displayName,
        discriminator:
          member.user.discriminator === '0' ? null : member.user.discriminator,
        avatar: member.user.avatarURL(),
      });
      if (results.length >= limit) break;
    }
    return results;
  }
}

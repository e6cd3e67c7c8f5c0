import {
  BadRequestException,
  ForbiddenException,
  HttpException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DiscordAPIError, EmbedBuilder } from 'discord.js';
import type { Db } from 'mongodb';
import type {
  DiscordMessageDto,
  DiscordStatusDto,
  GuildMemberDto,
  GuildMembersResponseDto,
  InviteRequestDto,
  UserDto,
} from '@maestros/contract';
import type { AppEnv } from '../config/env.schema';
import {
  DISCORD_ROLE_IDS,
  holdsAnyRole,
  type DiscordRoleIds,
} from '../config/discord-roles';
import { COLLECTIONS, MONGO_DB } from '../mongo/mongo.constants';
import { toUserDto, type UserDocument } from '../users/user.types';
import { DiscordBridgeService } from '../discord-bot/discord-bridge.service';
import { DiscordStatsService } from '../discord-bot/services/discord-stats.service';
import {
  buildAnnouncementEmbed,
  composeContent,
  mentionTokens,
} from '../announcements/announcement-embed';

export const PARTNERSHIP_COLOR = 0xff6b6b;
const PARTNERSHIP_ICON_URL =
  'https://cdn-icons-png.flaticon.com/512/2666/2666505.png';

export interface SendResult {
  success: true;
  message: string;
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function buildPartnershipEmbed(
  request: InviteRequestDto,
  now: Date = new Date(),
): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle('🌟 New Partnership Opportunity')
    .setDescription(
      `> **${request.server_name}**\n> Looking to partner with Maestros Community!`,
    )
    .setColor(PARTNERSHIP_COLOR)
    .addFields(
      { name: '👤 Server Owner', value: request.owner_name },
      { name: '🔗 Discord ID', value: `\`${request.discord_id}\`` },
    );

  if (request.player_count) {
    embed.addFields({ name: '👥 Community Size', value: request.player_count });
  }
  embed.addFields({
    name: '📖 Server Description',
    value: request.server_description.slice(0, 500),
  });
  if (request.additional_info) {
    embed.addFields({
      name: '📌 Extra Information',
      value: `>>> ${request.additional_info.slice(0, 300)}`,
    });
  }

  return embed
    .setAuthor({
      name: 'RP Server Partnership Request',
      iconURL: PARTNERSHIP_ICON_URL,
    })
    .setFooter({ text: 'Review and respond • Maestros Community' })
    .setTimestamp(now);
}

@Injectable()
export class DiscordService {
  private readonly logger = new Logger(DiscordService.name);

  constructor(
    @Inject(MONGO_DB) private readonly db: Db,
    @Inject(DISCORD_ROLE_IDS) private readonly roleIds: DiscordRoleIds,
    private readonly config: ConfigService<AppEnv, true>,
    private readonly bridge: DiscordBridgeService,
    private readonly statsService: DiscordStatsService,
  ) {}

  private get users() {
    return this.db.collection<UserDocument>(COLLECTIONS.USERS);
  }

  status(): DiscordStatusDto {
    const stats = this.statsService.getStats();
    return { online: stats.total > 0, last_update: stats.last_update };
  }

  /**
   * Every non-bot member holding the CEO, manager or member role, online
   * or not, with their stored progression merged in.
   */
  async guildMembers(): Promise<GuildMembersResponseDto> {
    const guild = this.bridge.requireGuild();

    const candidates = guild.members.cache.filter(
      (member) =>
        !member.user.bot &&
        holdsAnyRole(this.roleIds, [...member.roles.cache.keys()], [
          'ceo',
          'manager',
          'member',
        ]),
    );

    const stored = await this.users
      .find({ discord_id: { $in: [...candidates.keys()] } })
      .toArray();
    const byDiscordId = new Map(stored.map((user) => [user.discord_id, user]));

    const members = candidates.map((member): GuildMemberDto => {
      const roleIds = [...member.roles.cache.keys()];
      const status = member.presence?.status ?? 'offline';
      const user = byDiscordId.get(member.id);
      const dto = user ? toUserDto(user) : null;

      return {
        display_name: member.displayName,
        username: member.user.username,
        discriminator:
          member.user.discriminator === '0' ? null : member.user.discriminator,
        discord_id: member.id,
        avatar: member.user.avatar,
        guild_roles: member.roles.cache
          .filter((role) => role.id !== guild.id)
          .map((role) => ({ id: role.id, name: role.name, color: role.color })),
        is_online: status !== 'offline',
        permissions: {
          is_admin: member.roles.cache.some((role) =>
            role.name.toLowerCase().includes('admin'),
          ),
          is_ceo: holdsAnyRole(this.roleIds, roleIds, ['ceo']),
          is_manager: holdsAnyRole(this.roleIds, roleIds, ['manager']),
          is_member: holdsAnyRole(this.roleIds, roleIds, ['member']),
        },
        level: dto?.level ?? 1,
        xp: dto?.xp ?? 0,
        badges: dto?.badges ?? [],
        joined_at: dto?.joined_at ?? null,
        last_login: dto?.last_login ?? null,
      };
    });

    return { total_members: members.length, members };
  }

  async userDetails(discordId: string): Promise<UserDto> {
    const user = await this.users.findOne({ discord_id: discordId });
    if (!user) {
      throw new NotFoundException('Member not found');
    }
    return toUserDto(user);
  }

  /**
   * Post to any channel the bot can see. The embed is only built when it
   * has a title or description; mentions go on their own line.
   */
  async sendAnnouncement(dto: DiscordMessageDto): Promise<SendResult> {
    const client = this.bridge.requireClient();

    const embed =
      dto.embed && (dto.embed.title || dto.embed.description)
        ? buildAnnouncementEmbed(dto.embed)
        : null;
    const content = composeContent(
      mentionTokens({
        everyone: dto.mention_everyone,
        here: dto.mention_here,
        role_ids: dto.mention_roles,
        user_ids: dto.mention_users,
      }),
      dto.content,
    ).trim();

    if (!embed && !content) {
      throw new BadRequestException('Message must have content or embed');
    }

    const channel = client.channels.cache.get(dto.channel_id);
    if (!channel || !channel.isSendable()) {
      throw new NotFoundException('Channel not found');
    }

    try {
      await channel.send({
        content: content || undefined,
        embeds: embed ? [embed] : [],
      });
    } catch (error) {
      if (error instanceof DiscordAPIError && error.status === 403) {
        throw new ForbiddenException(
          "Bot doesn't have permission to send messages in that channel",
        );
      }
      throw new InternalServerErrorException(
        `Failed to send announcement: ${errorText(error)}`,
      );
    }

    this.logger.log(`Announcement sent to channel ${dto.channel_id}`);
    return { success: true, message: 'Announcement sent successfully' };
  }

  /** Partnership embed to RP_INVITE_CHANNEL_ID, then the server IP as plain text. */
  async sendInviteRequest(request: InviteRequestDto): Promise<SendResult> {
    this.bridge.requireClient();

    const channelId = this.config.get('RP_INVITE_CHANNEL_ID', { infer: true });
    if (!channelId) {
      throw new InternalServerErrorException('RP invite channel not configured');
    }

    try {
      const sent = await this.bridge.sendToChannel(channelId, {
        embeds: [buildPartnershipEmbed(request)],
      });
      if (!sent) {
        throw new NotFoundException('Channel not found');
      }
      if (request.server_ip) {
        await this.bridge.sendToChannel(channelId, request.server_ip);
      }
    } catch (error) {
      if (error instanceof HttpException) throw error;
      throw new InternalServerErrorException(
        `Failed to send request: ${errorText(error)}`,
      );
    }

    this.logger.log(`Partnership request from ${request.server_name} posted`);
    return { success: true, message: 'Request sent successfully' };
  }
}

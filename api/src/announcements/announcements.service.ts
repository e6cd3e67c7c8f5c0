import {
  ForbiddenException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { DiscordAPIError } from 'discord.js';
import { ObjectId, type Db } from 'mongodb';
import type {
  AnnouncementLogDto,
  SendAnnouncementDto,
  SendAnnouncementResultDto,
} from '@maestros/contract';
import { COLLECTIONS, MONGO_DB } from '../mongo/mongo.constants';
import { parseObjectId } from '../common/object-id';
import type { UserDocument } from '../users/user.types';
import {
  botPermissionsIn,
  GuildDirectoryService,
} from '../discord-bot/services/guild-directory.service';
import {
  buildAnnouncementEmbed,
  composeContent,
  mentionTokens,
} from './announcement-embed';
import {
  toAnnouncementLogDto,
  type AnnouncementLogDocument,
} from './announcement.types';

export const DESCRIPTION_SUMMARY_LENGTH = 100;

export interface AnnouncementLogPage {
  logs: AnnouncementLogDto[];
  total: number;
  page: number;
  pages: number;
}

type LogTarget = Pick<
  AnnouncementLogDocument,
  'guild_id' | 'guild_name' | 'channel_id' | 'channel_name'
>;

@Injectable()
export class AnnouncementsService {
  private readonly logger = new Logger(AnnouncementsService.name);

  constructor(
    @Inject(MONGO_DB) private readonly db: Db,
    private readonly directory: GuildDirectoryService,
  ) {}

  private get logsCollection() {
    return this.db.collection<AnnouncementLogDocument>(
      COLLECTIONS.ANNOUNCEMENT_LOGS,
    );
  }

  /**
   * Post an embed announcement, prefixed by its mentions, and record the
   * attempt in `announcement_logs` whether or not Discord accepted it.
   */
  async send(
    dto: SendAnnouncementDto,
    manager: UserDocument,
    now: Date = new Date(),
  ): Promise<SendAnnouncementResultDto> {
    const guild = this.directory.getGuild(dto.guild_id);
    const channel = this.directory.getTextChannel(guild, dto.channel_id);

    const permissions = botPermissionsIn(channel);
    if (!permissions.send_messages || !permissions.embed_links) {
      throw new ForbiddenException(
        'Bot lacks required permissions (Send Messages, Embed Links)',
      );
    }
    if ((dto.mentions.everyone || dto.mentions.here) && !permissions.mention_everyone) {
      throw new ForbiddenException(
        'Bot lacks permission to mention @everyone/@here',
      );
    }

    const embed = buildAnnouncementEmbed(dto.embed, now);
    const tokens = mentionTokens(
      dto.mentions,
      new Set(guild.roles.cache.keys()),
    );
    const content = composeContent(tokens, dto.content);
    const target: LogTarget = {
      guild_id: guild.id,
      guild_name: guild.name,
      channel_id: channel.id,
      channel_name: channel.name,
    };

    try {
      const message = await channel.send({
        content: content || undefined,
        embeds: [embed],
      });

      await this.writeLog(manager, target, now, {
        embed_summary: {
          title: dto.embed.title ?? null,
          description:
            dto.embed.description?.slice(0, DESCRIPTION_SUMMARY_LENGTH) ?? null,
          fields_count: dto.embed.fields.length,
        },
        mentions: {
          everyone: dto.mentions.everyone,
          here: dto.mentions.here,
          roles_count: dto.mentions.role_ids.length,
          users_count: dto.mentions.user_ids.length,
        },
        content: dto.content ?? null,
        success: true,
        error_message: null,
      });
      this.logger.log(
        `Announcement sent to #${channel.name} in ${guild.name} by ${manager.username}`,
      );

      return {
        success: true,
        message_id: message.id,
        channel_name: channel.name,
        guild_name: guild.name,
        message_url: message.url,
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const forbidden = error instanceof DiscordAPIError && error.status === 403;
      const errorMessage = forbidden
        ? `Permission denied: ${reason}`
        : `Failed to send message: ${reason}`;

      await this.writeLog(manager, target, now, {
        embed_summary: {},
        mentions: {},
        content: null,
        success: false,
        error_message: errorMessage,
      });
      this.logger.warn(`Announcement to #${channel.name} failed: ${reason}`);

      if (forbidden) throw new ForbiddenException(errorMessage);
      throw new InternalServerErrorException(errorMessage);
    }
  }

  async listLogs(page: number, limit: number): Promise<AnnouncementLogPage> {
    const [rows, total] = await Promise.all([
      this.logsCollection
        .find({})
        .sort({ timestamp: -1 })
        .skip((page - 1) * limit)
        .limit(limit)
        .toArray(),
      this.logsCollection.countDocuments({}),
    ]);

    return {
      logs: rows.map(toAnnouncementLogDto),
      total,
      page,
      pages: Math.ceil(total / limit),
    };
  }

  async findLog(id: string): Promise<AnnouncementLogDto> {
    const log = await this.logsCollection.findOne({
      _id: parseObjectId(id, 'Invalid log ID'),
    });
    if (!log) {
      throw new NotFoundException('Log not found');
    }
    return toAnnouncementLogDto(log);
  }

  private async writeLog(
    manager: UserDocument,
    target: LogTarget,
    timestamp: Date,
    outcome: Pick<
      AnnouncementLogDocument,
      'embed_summary' | 'mentions' | 'content' | 'success' | 'error_message'
    >,
  ): Promise<void> {
    await this.logsCollection.insertOne({
      _id: new ObjectId(),
      manager_id: manager.discord_id,
      manager_username: manager.username,
      ...target,
      ...outcome,
      timestamp,
    });
  }
}

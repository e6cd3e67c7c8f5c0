import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { ChannelType } from 'discord.js';
import type { AnyBulkWriteOperation, Db } from 'mongodb';
import type { AppEnv } from '../../config/env.schema';
import { COLLECTIONS, MONGO_DB } from '../../mongo/mongo.constants';
import type { UserDocument } from '../../users/user.types';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DiscordStatsService } from '../services/discord-stats.service';

/**
 * Periodic bot work: the presence snapshot every 10 seconds, the
 * member-count channel name every minute and the guild-role sync every
 * 5 minutes. All are no-ops while the bot is offline.
 */
@Injectable()
export class BotTasksService {
  private readonly logger = new Logger(BotTasksService.name);

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly statsService: DiscordStatsService,
    @Inject(MONGO_DB) private readonly db: Db,
    private readonly config: ConfigService<AppEnv, true>,
  ) {}

  @Cron('*/10 * * * * *', { name: 'BotTasksService_refreshStats' })
  refreshStats(): void {
    const guild = this.clientService.getGuild();
    if (!guild) return;

    try {
      const stats = this.statsService.refresh(guild);
      this.logger.debug(
        `Stats: total=${stats.total} online=${stats.online} ceo=${stats.ceo_online} managers=${stats.manager_online} members=${stats.community_member_online}`,
      );
    } catch (error) {
      this.logger.error('Error updating stats:', error);
    }
  }

  /**
   * Renames the MEMBER_COUNT_CHANNEL_ID voice channel to the guild's member
   * count. Discord is only called when the name actually changes.
   */
  @Cron('0 * * * * *', { name: 'BotTasksService_updateMemberCount' })
  async updateMemberCount(): Promise<string | null> {
    const channelId = this.config.get('MEMBER_COUNT_CHANNEL_ID', { infer: true });
    if (!channelId) return null;
    const guild = this.clientService.getGuild();
    if (!guild) return null;

    const channel = guild.channels.cache.get(channelId);
    if (!channel || channel.type !== ChannelType.GuildVoice) {
      this.logger.warn(
        `Member count channel ${channelId} not found or not a voice channel`,
      );
      return null;
    }

    const name = `👥 Members: ${guild.memberCount}`;
    if (channel.name === name) return name;

    try {
      await channel.setName(name);
      this.logger.log(`Updated member count: ${name}`);
      return name;
    } catch (error) {
      this.logger.error('Error updating member count channel:', error);
      return null;
    }
  }

  /**
   * Copies every non-bot member's current role IDs onto their stored user.
   * Members with no stored user are skipped (no upsert).
   */
  @Cron('0 */5 * * * *', { name: 'BotTasksService_syncRoles' })
  async syncRoles(): Promise<number> {
    const guild = this.clientService.getGuild();
    if (!guild) return 0;

    const now = new Date();
    const ops: AnyBulkWriteOperation<UserDocument>[] = [];
    for (const member of guild.members.cache.values()) {
      if (member.user.bot) continue;
      ops.push({
        updateOne: {
          filter: { discord_id: member.id },
          update: {
            $set: {
              guild_roles: member.roles.cache
                .filter((role) => role.id !== guild.id)
                .map((role) => role.id),
              username: member.user.username,
              avatar: member.user.avatar,
              roles_synced_at: now,
            },
          },
          upsert: false,
        },
      });
    }

    if (ops.length === 0) return 0;

    try {
      const result = await this.db
        .collection<UserDocument>(COLLECTIONS.USERS)
        .bulkWrite(ops, { ordered: false });
      this.logger.log(`Synced guild roles for ${result.matchedCount} user(s)`);
      return result.matchedCount;
    } catch (error) {
      this.logger.error('Error syncing roles:', error);
      return 0;
    }
  }
}

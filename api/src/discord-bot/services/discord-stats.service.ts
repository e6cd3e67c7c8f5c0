import { Inject, Injectable } from '@nestjs/common';
import type { Guild } from 'discord.js';
import type { DiscordStatsDto } from '@maestros/contract';
import {
  DISCORD_ROLE_IDS,
  type DiscordRoleIds,
} from '../../config/discord-roles';

const EMPTY_STATS: DiscordStatsDto = {
  total: 0,
  online: 0,
  ceo_online: 0,
  manager_online: 0,
  community_member_online: 0,
  last_update: null,
};

/**
 * In-memory guild presence snapshot. Written by the bot's stats task,
 * read by `/discord/stats` and `/discord/status`.
 */
@Injectable()
export class DiscordStatsService {
  private stats: DiscordStatsDto = { ...EMPTY_STATS };

  constructor(
    @Inject(DISCORD_ROLE_IDS) private readonly roleIds: DiscordRoleIds,
  ) {}

  getStats(): DiscordStatsDto {
    return { ...this.stats };
  }

  /**
   * Recount non-bot members who are not offline. Each online member lands
   * in one bucket: CEO first, then manager, then community member.
   */
  refresh(guild: Guild, now: Date = new Date()): DiscordStatsDto {
    const { ceo, manager, member } = this.roleIds;
    let online = 0;
    let ceoOnline = 0;
    let managerOnline = 0;
    let memberOnline = 0;

    for (const m of guild.members.cache.values()) {
      if (m.user.bot) continue;
      const status = m.presence?.status ?? 'offline';
      if (status === 'offline' || status === 'invisible') continue;

      online++;
      if (ceo && m.roles.cache.has(ceo)) ceoOnline++;
      else if (manager && m.roles.cache.has(manager)) managerOnline++;
      else if (member && m.roles.cache.has(member)) memberOnline++;
    }

    this.stats = {
      total: guild.memberCount,
      online,
      ceo_online: ceoOnline,
      manager_online: managerOnline,
      community_member_online: memberOnline,
      last_update: now.toISOString(),
    };
    return this.getStats();
  }
}

import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ObjectId, type Db } from 'mongodb';
import type {
  ActivityEntryDto,
  EventDto,
  LeaderboardEntryDto,
  UserDto,
} from '@maestros/contract';
import { COLLECTIONS, MONGO_DB } from '../mongo/mongo.constants';
import {
  levelForXp,
  toUserDto,
  type UserDocument,
} from './user.types';
import { ActivityService } from './activity.service';
import {
  toApplicationView,
  type ApplicationDocument,
  type ApplicationView,
} from '../applications/application.types';
import { toEventDto, type EventDocument } from '../events/event.types';

export const DASHBOARD_ACTIVITY_LIMIT = 10;
export const DASHBOARD_LIST_LIMIT = 5;

/** Discord profile fields refreshed on every login. */
export interface DiscordProfile {
  discord_id: string;
  username: string;
  discriminator: string | null;
  avatar: string | null;
  email: string | null;
  guild_roles: string[];
}

export interface XpAward {
  xp: number;
  level: number;
}

export interface DashboardDto {
  user: Pick<UserDto, 'username' | 'level' | 'xp' | 'badges'>;
  recent_activity: ActivityEntryDto[];
  applications: ApplicationView[];
  events: EventDto[];
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @Inject(MONGO_DB) private readonly db: Db,
    private readonly activity: ActivityService,
  ) {}

  private get users() {
    return this.db.collection<UserDocument>(COLLECTIONS.USERS);
  }

  async findByDiscordId(discordId: string): Promise<UserDocument | null> {
    return this.users.findOne({ discord_id: discordId });
  }

  async getByDiscordId(discordId: string): Promise<UserDocument> {
    const user = await this.findByDiscordId(discordId);
    if (!user) {
      throw new NotFoundException('User not found');
    }
    return user;
  }

  /**
   * Insert or refresh a user from their Discord profile. New users start
   * at level 1 with no XP, site roles or badges.
   */
  async upsertFromDiscord(
    profile: DiscordProfile,
    now = new Date(),
  ): Promise<UserDocument> {
    const existing = await this.findByDiscordId(profile.discord_id);
    if (existing) {
      const updated = await this.users.findOneAndUpdate(
        { discord_id: profile.discord_id },
        { $set: { ...profile, last_login: now } },
        { returnDocument: 'after' },
      );
      return updated ?? { ...existing, ...profile, last_login: now };
    }

    const doc: UserDocument = {
      _id: new ObjectId(),
      ...profile,
      roles: [],
      xp: 0,
      level: 1,
      badges: [],
      joined_at: now,
      last_login: now,
    };
    await this.users.insertOne(doc);
    this.logger.log(`Created user ${profile.username} (${profile.discord_id})`);
    return doc;
  }

  async setGuildRoles(discordId: string, guildRoles: string[]): Promise<void> {
    await this.users.updateOne(
      { discord_id: discordId },
      { $set: { guild_roles: guildRoles, roles_synced_at: new Date() } },
    );
  }

  async updateUsername(discordId: string, username: string): Promise<UserDocument> {
    const updated = await this.users.findOneAndUpdate(
      { discord_id: discordId },
      { $set: { username } },
      { returnDocument: 'after' },
    );
    if (!updated) {
      throw new NotFoundException('User not found');
    }
    return updated;
  }

  /**
   * Add XP atomically, then store the level derived from the new total and
   * log an `xp_gained` activity entry. Null when the user does not exist.
   */
  async awardXp(
    discordId: string,
    amount: number,
    reason?: string,
  ): Promise<XpAward | null> {
    const updated = await this.users.findOneAndUpdate(
      { discord_id: discordId },
      { $inc: { xp: amount } },
      { returnDocument: 'after' },
    );
    if (!updated) return null;

    const level = levelForXp(updated.xp);
    if (level !== updated.level) {
      await this.users.updateOne({ discord_id: discordId }, { $set: { level } });
    }

    await this.activity.log(
      discordId,
      'xp_gained',
      reason ?? `Gained ${amount} XP`,
      { amount, new_xp: updated.xp, new_level: level },
    );

    return { xp: updated.xp, level };
  }

  async leaderboard(limit: number): Promise<LeaderboardEntryDto[]> {
    const rows = await this.users
      .find({})
      .sort({ xp: -1 })
      .limit(limit)
      .toArray();

    return rows.map((row, index) => ({
      rank: index + 1,
      username: row.username,
      avatar: row.avatar ?? null,
      xp: row.xp ?? 0,
      level: row.level ?? 1,
      badges: row.badges ?? [],
    }));
  }

  async dashboard(user: UserDocument): Promise<DashboardDto> {
    const [recentActivity, applications, events] = await Promise.all([
      this.activity.recent(user.discord_id, DASHBOARD_ACTIVITY_LIMIT),
      this.db
        .collection<ApplicationDocument>(COLLECTIONS.APPLICATIONS)
        .find({ user_id: user.discord_id })
        .sort({ submitted_at: -1 })
        .limit(DASHBOARD_LIST_LIMIT)
        .toArray(),
      this.db
        .collection<EventDocument>(COLLECTIONS.EVENTS)
        .find({ participants: user.discord_id, status: 'upcoming' })
        .sort({ date: 1 })
        .limit(DASHBOARD_LIST_LIMIT)
        .toArray(),
    ]);

    const dto = toUserDto(user);
    return {
      user: {
        username: dto.username,
        level: dto.level,
        xp: dto.xp,
        badges: dto.badges,
      },
      recent_activity: recentActivity,
      applications: applications.map(toApplicationView),
      events: events.map(toEventDto),
    };
  }
}

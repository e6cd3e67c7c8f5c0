import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import type { Db, Filter } from 'mongodb';
import type {
  AdminStatsDto,
  ApplicationStatus,
  Badge,
  ReviewQueryDto,
  UserDto,
} from '@maestros/contract';
import { COLLECTIONS, MONGO_DB } from '../mongo/mongo.constants';
import { UsersService } from '../users/users.service';
import { ActivityService } from '../users/activity.service';
import { toUserDto, type UserDocument } from '../users/user.types';
import { ApplicationsService, APPROVAL_XP } from '../applications/applications.service';
import {
  toApplicationView,
  type ApplicationDocument,
  type ApplicationView,
} from '../applications/application.types';
import type { EventDocument } from '../events/event.types';
import { toLogDto, type LogDocument, type LogDto } from './log.types';

export const MEMBER_BADGE = 'Member';
export const MEMBER_ROLE = 'Member';

export interface Page {
  total: number;
  skip: number;
  limit: number;
}

export interface XpAwardResult {
  message: string;
  old_xp: number;
  new_xp: number;
  old_level: number;
  new_level: number;
  level_up: boolean;
}

@Injectable()
export class AdminService {
  private readonly logger = new Logger(AdminService.name);

  constructor(
    @Inject(MONGO_DB) private readonly db: Db,
    private readonly usersService: UsersService,
    private readonly activity: ActivityService,
    private readonly applicationsService: ApplicationsService,
  ) {}

  private get users() {
    return this.db.collection<UserDocument>(COLLECTIONS.USERS);
  }

  private get applications() {
    return this.db.collection<ApplicationDocument>(COLLECTIONS.APPLICATIONS);
  }

  async listUsers(skip: number, limit: number): Promise<Page & { users: UserDto[] }> {
    const [rows, total] = await Promise.all([
      this.users.find({}).skip(skip).limit(limit).toArray(),
      this.users.countDocuments({}),
    ]);
    return { users: rows.map(toUserDto), total, skip, limit };
  }

  async listApplications(
    status: ApplicationStatus | undefined,
    skip: number,
    limit: number,
  ): Promise<Page & { applications: ApplicationView[] }> {
    const filter: Filter<ApplicationDocument> = status ? { status } : {};
    const [rows, total] = await Promise.all([
      this.applications.find(filter).skip(skip).limit(limit).toArray(),
      this.applications.countDocuments(filter),
    ]);
    return { applications: rows.map(toApplicationView), total, skip, limit };
  }

  /**
   * Approval gives XP plus the Member badge and site role; rejection only
   * records the decision.
   */
  async review(id: string, review: ReviewQueryDto, admin: UserDocument) {
    const application = await this.applicationsService.findById(id);
    if (application.status !== 'pending') {
      throw new BadRequestException(`Application already ${application.status}`);
    }

    await this.applications.updateOne(
      { _id: application._id },
      {
        $set: {
          status: review.status,
          reviewed_at: new Date(),
          reviewed_by: admin.discord_id,
          reviewer_name: admin.username,
          ...(review.notes ? { review_notes: review.notes } : {}),
        },
      },
    );

    const userId = application.user_id;
    if (review.status === 'rejected') {
      await this.activity.log(userId, 'application_rejected', 'Application rejected', {
        application_id: id,
        reviewed_by: admin.discord_id,
      });
      return { message: 'Application rejected' };
    }

    const before = await this.usersService.findByDiscordId(userId);
    const award = await this.usersService.awardXp(userId, APPROVAL_XP, 'Application approved');
    await this.users.updateOne(
      { discord_id: userId },
      { $addToSet: { badges: MEMBER_BADGE, roles: MEMBER_ROLE } },
    );
    await this.activity.log(userId, 'application_approved', 'Application approved', {
      application_id: id,
      reviewed_by: admin.discord_id,
      xp_awarded: APPROVAL_XP,
      level_up: award !== null && before !== null && award.level > before.level,
    });

    this.logger.log(`Application ${id} approved by admin ${admin.username}`);
    return {
      message: 'Application approved',
      xp_awarded: APPROVAL_XP,
      badges_added: [MEMBER_BADGE],
      roles_added: [MEMBER_ROLE],
    };
  }

  async awardXp(
    discordId: string,
    amount: number,
    reason: string | undefined,
    admin: UserDocument,
  ): Promise<XpAwardResult> {
    const user = await this.usersService.getByDiscordId(discordId);
    const award = await this.usersService.awardXp(
      discordId,
      amount,
      reason ?? `Admin award from ${admin.username}`,
    );
    if (!award) {
      throw new NotFoundException('User not found');
    }
    return {
      message: `Awarded ${amount} XP`,
      old_xp: user.xp,
      new_xp: award.xp,
      old_level: user.level,
      new_level: award.level,
      level_up: award.level > user.level,
    };
  }

  async awardBadge(
    discordId: string,
    badge: Badge,
    admin: UserDocument,
  ): Promise<{ message: string; badge: Badge }> {
    const user = await this.usersService.getByDiscordId(discordId);
    if ((user.badges ?? []).includes(badge)) {
      throw new BadRequestException('User already has this badge');
    }
    await this.users.updateOne({ discord_id: discordId }, { $addToSet: { badges: badge } });
    await this.activity.log(discordId, 'badge_awarded', `Earned the ${badge} badge`, {
      badge,
      awarded_by: admin.discord_id,
    });
    return { message: `Awarded badge: ${badge}`, badge };
  }

  async removeBadge(discordId: string, badge: string): Promise<{ message: string }> {
    await this.users.updateOne({ discord_id: discordId }, { $pull: { badges: badge } });
    return { message: `Removed badge: ${badge}` };
  }

  async logs(limit: number): Promise<LogDto[]> {
    const rows = await this.db
      .collection<LogDocument>(COLLECTIONS.LOGS)
      .find({})
      .sort({ timestamp: -1 })
      .limit(limit)
      .toArray();
    return rows.map(toLogDto);
  }

  async stats(now = new Date()): Promise<AdminStatsDto> {
    const events = this.db.collection<EventDocument>(COLLECTIONS.EVENTS);
    const [totalUsers, pendingApplications, totalEvents, upcomingEvents] =
      await Promise.all([
        this.users.countDocuments({}),
        this.applications.countDocuments({ status: 'pending' }),
        events.countDocuments({}),
        events.countDocuments({ status: 'upcoming', date: { $gte: now } }),
      ]);
    return {
      total_users: totalUsers,
      pending_applications: pendingApplications,
      total_events: totalEvents,
      upcoming_events: upcomingEvents,
    };
  }
}

import {
  BadRequestException,
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ObjectId, type Db, type Filter } from 'mongodb';
import type {
  ApplicationFormDto,
  ApplicationListQueryDto,
  ApplicationStatsDto,
  ApplicationStatus,
} from '@maestros/contract';
import { COLLECTIONS, MONGO_DB } from '../mongo/mongo.constants';
import { parseObjectId, snowflakeCreatedAt } from '../common/object-id';
import { UsersService } from '../users/users.service';
import { ActivityService } from '../users/activity.service';
import type { UserDocument } from '../users/user.types';
import { analyzeApplication, validateApplication } from './application-scoring';
import {
  toApplicationView,
  type ApplicationDocument,
  type ApplicationView,
  type NewApplicationDocument,
} from './application.types';
import { AuditLogService } from './audit-log.service';

export const SUBMISSION_XP = 50;
export const APPROVAL_XP = 100;
const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export interface ApplicantInfo {
  username: string;
  discriminator: string | null;
  avatar: string | null;
  email: string | null;
  level: number;
  xp: number;
  badges: string[];
  guild_roles: string[];
  joined_at: string | null;
  last_login: string | null;
  account_created: string | null;
}

export interface ManagerApplicationView extends ApplicationView {
  score: number;
  user_info: ApplicantInfo | null;
}

export interface ApplicationPage {
  applications: ManagerApplicationView[];
  total: number;
  page: number;
  pages: number;
}

export interface SubmissionResult {
  message: string;
  application_id: string;
  score: number;
  xp_awarded: number;
  level_up: boolean;
  new_level: number;
}

@Injectable()
export class ApplicationsService {
  private readonly logger = new Logger(ApplicationsService.name);

  constructor(
    @Inject(MONGO_DB) private readonly db: Db,
    private readonly usersService: UsersService,
    private readonly activity: ActivityService,
    private readonly auditLog: AuditLogService,
  ) {}

  private get applications() {
    return this.db.collection<ApplicationDocument>(COLLECTIONS.APPLICATIONS);
  }

  async hasPending(discordId: string): Promise<boolean> {
    const existing = await this.applications.findOne({
      user_id: discordId,
      status: 'pending',
    });
    return existing !== null;
  }

  /**
   * Validates and scores a form, then stores it as pending. Throws 400
   * with per-field errors when validation fails.
   */
  buildApplication(
    user: Pick<UserDocument, 'discord_id' | 'username'>,
    form: ApplicationFormDto,
    now = new Date(),
  ): NewApplicationDocument {
    const validation = validateApplication(form);
    if (!validation.valid) {
      this.logger.warn(
        `Application validation failed for ${user.username}: ${Object.keys(validation.errors).join(', ')}`,
      );
      throw new BadRequestException({
        message: 'Validation failed',
        errors: validation.errors,
      });
    }

    const analysis = analyzeApplication(validation.answers);
    return {
      user_id: user.discord_id,
      username: user.username,
      form_type: 'membership',
      data: validation.answers,
      status: 'pending',
      submitted_at: now,
      result_score: analysis.score,
      ai_analysis: analysis,
    };
  }

  async insert(doc: NewApplicationDocument): Promise<string> {
    const _id = new ObjectId();
    await this.applications.insertOne({ ...doc, _id });
    return _id.toHexString();
  }

  async submit(user: UserDocument, form: ApplicationFormDto): Promise<SubmissionResult> {
    const doc = this.buildApplication(user, form);

    if (await this.hasPending(user.discord_id)) {
      throw new BadRequestException('You already have a pending application');
    }

    const applicationId = await this.insert(doc);
    await this.activity.log(
      user.discord_id,
      'application_submitted',
      'Submitted a membership application',
      { application_id: applicationId, score: doc.result_score },
    );

    const award = await this.usersService.awardXp(
      user.discord_id,
      SUBMISSION_XP,
      'Application submitted',
    );
    const newLevel = award?.level ?? user.level;

    return {
      message: 'Application submitted successfully',
      application_id: applicationId,
      score: doc.result_score,
      xp_awarded: SUBMISSION_XP,
      level_up: newLevel > user.level,
      new_level: newLevel,
    };
  }

  async listMine(discordId: string, status?: ApplicationStatus): Promise<ApplicationView[]> {
    const filter: Filter<ApplicationDocument> = { user_id: discordId };
    if (status) filter.status = status;
    const rows = await this.applications
      .find(filter)
      .sort({ submitted_at: -1 })
      .limit(100)
      .toArray();
    return rows.map(toApplicationView);
  }

  async list(query: ApplicationListQueryDto): Promise<ApplicationPage> {
    const filter: Filter<ApplicationDocument> = query.status
      ? { status: query.status }
      : {};
    const [rows, total] = await Promise.all([
      this.applications
        .find(filter)
        .sort({ submitted_at: -1 })
        .skip((query.page - 1) * query.limit)
        .limit(query.limit)
        .toArray(),
      this.applications.countDocuments(filter),
    ]);

    return {
      applications: await Promise.all(rows.map((row) => this.withApplicant(row))),
      total,
      page: query.page,
      pages: Math.ceil(total / query.limit),
    };
  }

  async findById(id: string): Promise<ApplicationDocument> {
    const application = await this.applications.findOne({
      _id: parseObjectId(id, 'Invalid application ID'),
    });
    if (!application) {
      throw new NotFoundException('Application not found');
    }
    return application;
  }

  /** The caller's own application; unknown or malformed ids are a plain 404. */
  async getOwn(id: string, discordId: string): Promise<ApplicationView> {
    const application = ObjectId.isValid(id)
      ? await this.applications.findOne({ _id: new ObjectId(id) })
      : null;
    if (!application) {
      throw new NotFoundException('Application not found');
    }
    if (application.user_id !== discordId) {
      throw new ForbiddenException('Access denied');
    }
    return toApplicationView(application);
  }

  async getDetail(id: string): Promise<ManagerApplicationView> {
    return this.withApplicant(await this.findById(id));
  }

  async findPending(id: string): Promise<ApplicationDocument> {
    const application = await this.findById(id);
    if (application.status !== 'pending') {
      throw new BadRequestException('Application is not pending');
    }
    return application;
  }

  async approve(
    id: string,
    reviewer: UserDocument,
    notes?: string,
  ): Promise<{ message: string; application_id: string; xp_awarded: number }> {
    const application = await this.findPending(id);

    await this.applications.updateOne(
      { _id: application._id },
      {
        $set: {
          status: 'approved',
          reviewed_at: new Date(),
          reviewed_by: reviewer.discord_id,
          reviewer_name: reviewer.username,
          ...(notes ? { review_notes: notes } : {}),
        },
      },
    );
    await this.usersService.awardXp(
      application.user_id,
      APPROVAL_XP,
      'Application approved',
    );
    await this.auditLog.record(application.user_id, 'application_approved', {
      application_id: id,
      reviewed_by: reviewer.discord_id,
      xp_awarded: APPROVAL_XP,
    });

    this.logger.log(`Application ${id} approved by ${reviewer.username}`);
    return {
      message: 'Application approved successfully',
      application_id: id,
      xp_awarded: APPROVAL_XP,
    };
  }

  async reject(
    id: string,
    reviewer: UserDocument,
    reason: string,
  ): Promise<{ message: string; application_id: string }> {
    const application = await this.findPending(id);

    await this.applications.updateOne(
      { _id: application._id },
      {
        $set: {
          status: 'rejected',
          reviewed_at: new Date(),
          reviewed_by: reviewer.discord_id,
          reviewer_name: reviewer.username,
          review_notes: reason,
        },
      },
    );
    await this.auditLog.record(application.user_id, 'application_rejected', {
      application_id: id,
      reviewed_by: reviewer.discord_id,
      reason,
    });

    this.logger.log(`Application ${id} rejected by ${reviewer.username}`);
    return { message: 'Application rejected successfully', application_id: id };
  }

  async stats(now = new Date()): Promise<ApplicationStatsDto> {
    const [total, pending, approved, rejected, recentWeek] = await Promise.all([
      this.applications.countDocuments({}),
      this.applications.countDocuments({ status: 'pending' }),
      this.applications.countDocuments({ status: 'approved' }),
      this.applications.countDocuments({ status: 'rejected' }),
      this.applications.countDocuments({
        submitted_at: { $gte: new Date(now.getTime() - WEEK_MS) },
      }),
    ]);

    return {
      total,
      pending,
      approved,
      rejected,
      recent_week: recentWeek,
      approval_rate: total > 0 ? Math.round((approved / total) * 10000) / 100 : 0,
    };
  }

  async remove(id: string, actor: UserDocument): Promise<{ message: string }> {
    const application = await this.findById(id);
    await this.applications.deleteOne({ _id: application._id });
    await this.auditLog.record(application.user_id, 'application_deleted', {
      application_id: id,
      deleted_by: actor.discord_id,
      previous_status: application.status,
    });

    this.logger.log(`Application ${id} deleted by ${actor.username}`);
    return { message: 'Application deleted successfully' };
  }

  private async withApplicant(doc: ApplicationDocument): Promise<ManagerApplicationView> {
    const user = await this.usersService.findByDiscordId(doc.user_id);
    return {
      ...toApplicationView(doc),
      score: doc.result_score,
      user_info: user
        ? {
            username: user.username,
            discriminator: user.discriminator ?? '0',
            avatar: user.avatar ?? null,
            email: user.email ?? null,
            level: user.level ?? 1,
            xp: user.xp ?? 0,
            badges: user.badges ?? [],
            guild_roles: user.guild_roles ?? [],
            joined_at: user.joined_at?.toISOString() ?? null,
            last_login: user.last_login?.toISOString() ?? null,
            account_created:
              snowflakeCreatedAt(doc.user_id)?.toISOString() ?? null,
          }
        : null,
    };
  }
}

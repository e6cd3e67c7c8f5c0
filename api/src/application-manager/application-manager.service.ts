import {
  BadRequestException,
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ObjectId, type Db } from 'mongodb';
import type { GuildMember } from 'discord.js';
import type { ApplicationFormDto, EligibilityDto } from '@maestros/contract';
import type { AppEnv } from '../config/env.schema';
import {
  DISCORD_ROLE_IDS,
  holdsAnyRole,
  type DiscordRoleIds,
} from '../config/discord-roles';
import { COLLECTIONS, MONGO_DB } from '../mongo/mongo.constants';
import { DiscordBridgeService } from '../discord-bot/discord-bridge.service';
import { ApplicationsService } from '../applications/applications.service';
import { AuditLogService } from '../applications/audit-log.service';
import type { ApplicationDocument } from '../applications/application.types';
import type { UserDocument } from '../users/user.types';
import {
  buildAcceptedDm,
  buildAcceptedLog,
  buildAuditEmbed,
  buildOverrideDm,
  buildReceivedDm,
  buildRejectedDm,
  buildRejectedLog,
  buildReviewEmbed,
} from './application-embeds';

export const COOLDOWN_DAYS = 30;
export const OVERRIDE_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_ACCEPT_NOTES = 'Welcome to Maestros!';

const ELIGIBLE: EligibilityDto = {
  eligible: true,
  message: 'You are eligible to submit an application.',
  action: 'APPLY',
};

export interface DiscordSubmissionResult {
  success: true;
  message: string;
  application_id: string;
  dm_sent: boolean;
  score: number;
}

export interface DecisionResult {
  success: true;
  message: string;
  dm_sent: boolean;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Application lifecycle driven through Discord: eligibility, role changes,
 * DMs and log-channel posts around each decision.
 */
@Injectable()
export class ApplicationManagerService {
  private readonly logger = new Logger(ApplicationManagerService.name);

  constructor(
    @Inject(MONGO_DB) private readonly db: Db,
    @Inject(DISCORD_ROLE_IDS) private readonly roleIds: DiscordRoleIds,
    private readonly config: ConfigService<AppEnv, true>,
    private readonly bridge: DiscordBridgeService,
    private readonly applicationsService: ApplicationsService,
    private readonly auditLog: AuditLogService,
  ) {}

  private get applications() {
    return this.db.collection<ApplicationDocument>(COLLECTIONS.APPLICATIONS);
  }

  /**
   * Checks run in order; the first failing one decides the answer. A
   * pending role without a pending application is cleaned up on the way.
   */
  async checkEligibility(discordId: string, now = new Date()): Promise<EligibilityDto> {
    const member = await this.bridge.fetchMember(discordId);
    if (!member) {
      return {
        eligible: false,
        reason: 'NOT_IN_SERVER',
        message: 'You must be a member of the Discord server to apply.',
        action: 'JOIN_SERVER',
        invite_url: this.config.get('DISCORD_INVITE_URL', { infer: true }) || undefined,
      };
    }

    const held = [...member.roles.cache.keys()];
    if (holdsAnyRole(this.roleIds, held, ['member'])) {
      return {
        eligible: false,
        reason: 'ALREADY_MEMBER',
        message: 'You are already a community member.',
        action: 'NONE',
      };
    }

    if (holdsAnyRole(this.roleIds, held, ['applicationPending'])) {
      if (!(await this.applicationsService.hasPending(discordId))) {
        await this.removeRole(
          member,
          this.roleIds.applicationPending,
          'No pending application found',
        );
        this.logger.warn(`Removed orphaned pending role from ${member.displayName}`);
        return ELIGIBLE;
      }
      return {
        eligible: false,
        reason: 'PENDING',
        message:
          'Your application is under review. Please contact a Manager in Discord for updates.',
        action: 'WAIT',
        estimated_time: '24-48 hours',
      };
    }

    const last = await this.applications.findOne(
      { user_id: discordId },
      { sort: { submitted_at: -1 } },
    );
    if (last) {
      const elapsed = now.getTime() - last.submitted_at.getTime();
      const overrideValid =
        last.override_by_ceo === true &&
        last.override_expires_at !== undefined &&
        now < last.override_expires_at;
      const cooldownMs = COOLDOWN_DAYS * DAY_MS;

      if (elapsed < cooldownMs && !overrideValid) {
        const daysRemaining = Math.floor((cooldownMs - elapsed) / DAY_MS);
        return {
          eligible: false,
          reason: 'COOLDOWN',
          message: `You can apply only once every ${COOLDOWN_DAYS} days. Wait ${daysRemaining} days or contact a CEO for early reapplication permission.`,
          action: 'WAIT',
          days_remaining: daysRemaining,
          can_apply_after: new Date(
            last.submitted_at.getTime() + cooldownMs,
          ).toISOString(),
        };
      }
    }

    return ELIGIBLE;
  }

  async grantReapply(
    ceo: UserDocument,
    targetId: string,
    now = new Date(),
  ): Promise<{ success: true; message: string; valid_until: string }> {
    const ceoRoles = await this.bridge.getMemberRoleIds(ceo.discord_id);
    if (!ceoRoles || !holdsAnyRole(this.roleIds, ceoRoles, ['ceo'])) {
      throw new ForbiddenException('Only CEOs can grant reapply permission');
    }

    const last = await this.applications.findOne(
      { user_id: targetId, status: 'rejected' },
      { sort: { submitted_at: -1 } },
    );
    if (!last) {
      throw new NotFoundException('No rejected application found for this user');
    }

    const expiresAt = new Date(now.getTime() + OVERRIDE_DAYS * DAY_MS);
    await this.applications.updateOne(
      { _id: last._id },
      {
        $set: {
          override_by_ceo: true,
          override_granted_by: ceo.discord_id,
          override_granted_at: now,
          override_expires_at: expiresAt,
        },
      },
    );

    await this.bridge.sendDirectMessage(targetId, {
      embeds: [buildOverrideDm(expiresAt)],
    });
    await this.auditLog.record(targetId, 'reapply_override_granted', {
      application_id: last._id.toHexString(),
      granted_by: ceo.discord_id,
      expires_at: expiresAt,
    });
    await this.postAudit('CEO Reapply Override Granted', last.username, targetId, {
      'Granted By': ceo.username,
      'Valid Until': `${expiresAt.toISOString().slice(0, 16).replace('T', ' ')} UTC`,
      'Application ID': last._id.toHexString(),
    });

    return {
      success: true,
      message: 'Reapply permission granted',
      valid_until: expiresAt.toISOString(),
    };
  }

  async submitWithDiscord(
    user: UserDocument,
    form: ApplicationFormDto,
  ): Promise<DiscordSubmissionResult> {
    const eligibility = await this.checkEligibility(user.discord_id);
    if (!eligibility.eligible) {
      throw new BadRequestException(eligibility);
    }

    const member = await this.bridge.fetchMember(user.discord_id);
    if (!member) {
      throw new BadRequestException('User not found in server');
    }

    const doc = this.applicationsService.buildApplication(
      { discord_id: user.discord_id, username: member.displayName },
      form,
    );
    doc.discord_user_info = {
      username: member.user.username,
      global_name: member.user.globalName,
      avatar: member.user.avatar,
    };
    const applicationId = await this.applicationsService.insert(doc);
    const shortId = applicationId.slice(0, 8);

    await this.addRole(member, this.roleIds.applicationPending, 'Application submitted');

    const dmSent = await this.bridge.sendDirectMessage(user.discord_id, {
      embeds: [buildReceivedDm(shortId)],
    });
    await this.applications.updateOne(
      { _id: new ObjectId(applicationId) },
      { $set: { dm_delivery_status: dmSent ? 'sent' : 'failed' } },
    );

    await this.bridge.postBestEffort(
      this.config.get('APPLICATION_CHANNEL_ID', { infer: true }),
      {
        embeds: [
          buildReviewEmbed({
            member,
            shortId,
            level: user.level,
            email: user.email ?? null,
            answers: doc.data,
            analysis: doc.ai_analysis,
          }),
        ],
      },
    );
    await this.auditLog.record(user.discord_id, 'application_submitted', {
      application_id: applicationId,
      score: doc.result_score,
      dm_sent: dmSent,
    });
    await this.postAudit('Application Submitted', member.displayName, user.discord_id, {
      'Application ID': shortId,
      'DM Delivered': dmSent ? '✅' : '❌',
      Score: `${doc.result_score.toFixed(1)}/100`,
    });

    return {
      success: true,
      message: 'Application submitted successfully',
      application_id: applicationId,
      dm_sent: dmSent,
      score: doc.result_score,
    };
  }

  async accept(
    id: string,
    manager: UserDocument,
    notes?: string,
  ): Promise<DecisionResult> {
    this.bridge.requireGuild();
    const application = await this.applicationsService.findPending(id);
    const member = await this.bridge.fetchMember(application.user_id);
    if (!member) {
      throw new NotFoundException('User not found in server');
    }
    const decisionNotes = notes || DEFAULT_ACCEPT_NOTES;

    await this.addRole(
      member,
      this.roleIds.member,
      `Application accepted by ${manager.username}`,
    );
    await this.removeRole(member, this.roleIds.applicationPending, 'Application accepted');

    await this.applications.updateOne(
      { _id: application._id },
      {
        $set: {
          status: 'accepted',
          handled_by: manager.discord_id,
          handler_name: manager.username,
          decision_timestamp: new Date(),
          decision_reason: decisionNotes,
        },
      },
    );

    const dmSent = await this.bridge.sendDirectMessage(application.user_id, {
      embeds: [buildAcceptedDm(decisionNotes)],
    });
    const managerMember = await this.bridge.fetchMember(manager.discord_id);
    await this.bridge.postBestEffort(
      this.config.get('ACCEPTED_LOG_CHANNEL_ID', { infer: true }),
      {
        embeds: [
          buildAcceptedLog({
            member,
            applicationId: id,
            acceptedBy: managerMember?.toString() ?? manager.username,
            notes: decisionNotes,
          }),
        ],
      },
    );
    await this.auditLog.record(application.user_id, 'application_accepted', {
      application_id: id,
      handled_by: manager.discord_id,
      dm_sent: dmSent,
    });
    await this.postAudit('Application Accepted', member.displayName, application.user_id, {
      'Handled By': manager.username,
      'Application ID': id.slice(0, 8),
      'DM Delivered': dmSent ? '✅' : '❌',
    });

    this.logger.log(`Application ${id} accepted by ${manager.username}`);
    return { success: true, message: 'Application accepted successfully', dm_sent: dmSent };
  }

  async reject(
    id: string,
    manager: UserDocument,
    reason: string,
  ): Promise<DecisionResult> {
    this.bridge.requireGuild();
    const application = await this.applicationsService.findPending(id);
    // The applicant may have left the server already
    const member = await this.bridge.fetchMember(application.user_id);
    if (member) {
      await this.removeRole(
        member,
        this.roleIds.applicationPending,
        `Application rejected by ${manager.username}`,
      );
    }

    await this.applications.updateOne(
      { _id: application._id },
      {
        $set: {
          status: 'rejected',
          handled_by: manager.discord_id,
          handler_name: manager.username,
          decision_timestamp: new Date(),
          decision_reason: reason,
        },
      },
    );

    const dmSent = await this.bridge.sendDirectMessage(application.user_id, {
      embeds: [buildRejectedDm(reason)],
    });
    await this.bridge.postBestEffort(
      this.config.get('REJECTED_LOG_CHANNEL_ID', { infer: true }),
      {
        embeds: [
          buildRejectedLog({
            applicant: member ? `${member.toString()} (${member.user.tag})` : application.username,
            userId: application.user_id,
            applicationId: id,
            rejectedBy: manager.username,
            reason,
          }),
        ],
      },
    );
    await this.auditLog.record(application.user_id, 'application_rejected', {
      application_id: id,
      handled_by: manager.discord_id,
      reason,
      dm_sent: dmSent,
    });
    await this.postAudit(
      'Application Rejected',
      member?.displayName ?? application.username,
      application.user_id,
      {
        'Handled By': manager.username,
        'Application ID': id.slice(0, 8),
        'DM Delivered': dmSent ? '✅' : '❌',
      },
    );

    this.logger.log(`Application ${id} rejected by ${manager.username}`);
    return { success: true, message: 'Application rejected successfully', dm_sent: dmSent };
  }

  private async addRole(member: GuildMember, roleId: string | null, reason: string): Promise<void> {
    if (!roleId) return;
    try {
      await member.roles.add(roleId, reason);
    } catch (error) {
      this.logger.warn(`Failed to add role ${roleId} to ${member.id}: ${describe(error)}`);
    }
  }

  private async removeRole(member: GuildMember, roleId: string | null, reason: string): Promise<void> {
    if (!roleId || !member.roles.cache.has(roleId)) return;
    try {
      await member.roles.remove(roleId, reason);
    } catch (error) {
      this.logger.warn(`Failed to remove role ${roleId} from ${member.id}: ${describe(error)}`);
    }
  }

  private async postAudit(
    action: string,
    username: string,
    discordId: string,
    details: Record<string, string>,
  ): Promise<void> {
    await this.bridge.postBestEffort(
      this.config.get('AUDIT_LOG_CHANNEL_ID', { infer: true }),
      { embeds: [buildAuditEmbed(action, { username, discordId }, details)] },
    );
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ObjectId, type Db } from 'mongodb';
import type { CreateWarningDto, WarningDto } from '@maestros/contract';
import { COLLECTIONS, MONGO_DB } from '../mongo/mongo.constants';
import { ActivityService } from '../users/activity.service';
import type { UserDocument } from '../users/user.types';

export const WARNING_LIST_LIMIT = 100;

interface WarningDocument {
  _id: ObjectId;
  user_id: string;
  reason: string;
  severity: CreateWarningDto['severity'];
  issued_by: string;
  timestamp: Date;
}

function toWarningDto(doc: WarningDocument): WarningDto {
  return {
    id: doc._id.toHexString(),
    user_id: doc.user_id,
    reason: doc.reason,
    severity: doc.severity ?? 'low',
    issued_by: doc.issued_by,
    timestamp: doc.timestamp.toISOString(),
  };
}

@Injectable()
export class ModerationService {
  private readonly logger = new Logger(ModerationService.name);

  constructor(
    @Inject(MONGO_DB) private readonly db: Db,
    private readonly activity: ActivityService,
  ) {}

  private get warnings() {
    return this.db.collection<WarningDocument>(COLLECTIONS.WARNINGS);
  }

  async issueWarning(
    dto: CreateWarningDto,
    issuer: UserDocument,
  ): Promise<{ message: string; warning: WarningDto }> {
    const doc: WarningDocument = {
      _id: new ObjectId(),
      user_id: dto.user_id,
      reason: dto.reason,
      severity: dto.severity,
      issued_by: issuer.discord_id,
      timestamp: new Date(),
    };
    await this.warnings.insertOne(doc);
    await this.activity.log(dto.user_id, 'warning_issued', `Warning: ${dto.reason}`, {
      reason: dto.reason,
      severity: dto.severity,
      issued_by: issuer.discord_id,
    });

    this.logger.log(`Warning issued to ${dto.user_id} by ${issuer.username}`);
    return { message: 'Warning issued', warning: toWarningDto(doc) };
  }

  async listWarnings(userId: string): Promise<WarningDto[]> {
    const rows = await this.warnings
      .find({ user_id: userId })
      .sort({ timestamp: -1 })
      .limit(WARNING_LIST_LIMIT)
      .toArray();
    return rows.map(toWarningDto);
  }
}

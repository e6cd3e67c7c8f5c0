import { Inject, Injectable } from '@nestjs/common';
import type { Db } from 'mongodb';
import { COLLECTIONS, MONGO_DB } from '../mongo/mongo.constants';

export interface AuditLogDocument {
  user_id: string;
  action: string;
  metadata: Record<string, unknown>;
  timestamp: Date;
}

/** Manager decisions on applications, written to `activity_logs`. */
@Injectable()
export class AuditLogService {
  constructor(@Inject(MONGO_DB) private readonly db: Db) {}

  async record(
    userId: string,
    action: string,
    metadata: Record<string, unknown>,
  ): Promise<void> {
    await this.db
      .collection<AuditLogDocument>(COLLECTIONS.ACTIVITY_LOGS)
      .insertOne({ user_id: userId, action, metadata, timestamp: new Date() });
  }
}

import { Inject, Injectable } from '@nestjs/common';
import type { Db, ObjectId } from 'mongodb';
import type { ActivityEntryDto } from '@maestros/contract';
import { COLLECTIONS, MONGO_DB } from '../mongo/mongo.constants';

export interface ActivityDocument {
  _id?: ObjectId;
  user_id: string;
  type: string;
  description: string;
  data?: Record<string, unknown>;
  timestamp: Date;
}

/** Per-user activity feed shown on the dashboard. */
@Injectable()
export class ActivityService {
  constructor(@Inject(MONGO_DB) private readonly db: Db) {}

  private get collection() {
    return this.db.collection<ActivityDocument>(COLLECTIONS.ACTIVITY);
  }

  async log(
    userId: string,
    type: string,
    description: string,
    data?: Record<string, unknown>,
  ): Promise<void> {
    await this.collection.insertOne({
      user_id: userId,
      type,
      description,
      data,
      timestamp: new Date(),
    });
  }

  async recent(userId: string, limit: number): Promise<ActivityEntryDto[]> {
    const rows = await this.collection
      .find({ user_id: userId })
      .sort({ timestamp: -1 })
      .limit(limit)
      .toArray();

    return rows.map((row) => ({
      id: row._id.toHexString(),
      user_id: row.user_id,
      type: row.type,
      description: row.description,
      data: row.data,
      timestamp: row.timestamp.toISOString(),
    }));
  }
}

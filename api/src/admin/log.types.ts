import type { ObjectId } from 'mongodb';

export type LogLevel = 'info' | 'warning' | 'error';

/** A document in the `logs` collection. The bot writes `member_join`/`member_leave`. */
export interface LogDocument {
  _id: ObjectId;
  event: string;
  level: LogLevel;
  metadata: Record<string, unknown>;
  timestamp: Date;
}

export interface LogDto {
  id: string;
  event: string;
  level: LogLevel;
  metadata: Record<string, unknown>;
  timestamp: string;
}

export function toLogDto(doc: LogDocument): LogDto {
  return {
    id: doc._id.toHexString(),
    event: doc.event,
    level: doc.level,
    metadata: doc.metadata,
    timestamp: doc.timestamp.toISOString(),
  };
}

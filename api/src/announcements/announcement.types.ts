import type { ObjectId } from 'mongodb';
import type { AnnouncementLogDto } from '@maestros/contract';

/** Audit record written for every send attempt, successful or not. */
export interface AnnouncementLogDocument {
  _id: ObjectId;
  manager_id: string;
  manager_username: string;
  guild_id: string;
  guild_name: string;
  channel_id: string;
  channel_name: string;
  embed_summary: AnnouncementLogDto['embed_summary'];
  mentions: AnnouncementLogDto['mentions'];
  content: string | null;
  success: boolean;
  error_message: string | null;
  timestamp: Date;
}

export function toAnnouncementLogDto(
  doc: AnnouncementLogDocument,
): AnnouncementLogDto {
  return {
    id: doc._id.toHexString(),
    manager_id: doc.manager_id,
    manager_username: doc.manager_username,
    guild_id: doc.guild_id,
    guild_name: doc.guild_name,
    channel_id: doc.channel_id,
    channel_name: doc.channel_name,
    embed_summary: doc.embed_summary,
    mentions: doc.mentions,
    content: doc.content,
    success: doc.success,
    error_message: doc.error_message,
    timestamp: doc.timestamp.toISOString(),
  };
}

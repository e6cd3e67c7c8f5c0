import type { ObjectId } from 'mongodb';
import type { RuleDto } from '@maestros/contract';

/** Shape of a document in the `rules` collection. */
export interface RuleDocument {
  _id: ObjectId;
  title: string;
  content: string;
  category: string;
  order: number;
  active: boolean;
  /** Where the rule embed was posted, set once a post succeeds */
  discord_channel_id: string | null;
  discord_message_id: string | null;
  created_by: string | null;
  created_at: Date;
  updated_at?: Date;
  updated_by?: string;
}

export function toRuleDto(doc: RuleDocument): RuleDto {
  return {
    id: doc._id.toHexString(),
    title: doc.title,
    content: doc.content,
    category: doc.category ?? 'general',
    order: doc.order ?? 0,
    active: doc.active ?? true,
    discord_channel_id: doc.discord_channel_id ?? null,
    discord_message_id: doc.discord_message_id ?? null,
    created_by: doc.created_by ?? null,
    created_at: doc.created_at.toISOString(),
    updated_at: doc.updated_at?.toISOString() ?? null,
  };
}

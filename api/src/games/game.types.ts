import type { ObjectId } from 'mongodb';
import type { GameDto } from '@maestros/contract';

/** Shape of a document in the `games` collection. */
export interface GameDocument {
  _id: ObjectId;
  name: string;
  description: string;
  image_url: string | null;
  category: string;
  platform: string | null;
  clan: string | null;
  active: boolean;
  created_by: string | null;
  created_at: Date;
  updated_at?: Date;
  updated_by?: string;
}

export function toGameDto(doc: GameDocument): GameDto {
  return {
    id: doc._id.toHexString(),
    name: doc.name,
    description: doc.description ?? '',
    image_url: doc.image_url ?? null,
    category: doc.category ?? 'general',
    platform: doc.platform ?? null,
    clan: doc.clan ?? null,
    active: doc.active ?? true,
    created_at: doc.created_at.toISOString(),
    updated_at: doc.updated_at?.toISOString() ?? null,
  };
}

import type { ObjectId } from 'mongodb';
import type { EventDto, EventStatus } from '@maestros/contract';

/** Shape of a document in the `events` collection. */
export interface EventDocument {
  _id: ObjectId;
  title: string;
  description: string;
  game: string;
  date: Date;
  max_participants: number;
  prize: string | null;
  /** Discord ids of registered users */
  participants: string[];
  winners: string[];
  status: EventStatus;
  created_by: string | null;
  created_at: Date;
  updated_at?: Date;
  updated_by?: string;
}

export type NewEventDocument = Omit<EventDocument, '_id'>;

export function toEventDto(doc: EventDocument): EventDto {
  return {
    id: doc._id.toHexString(),
    title: doc.title,
    description: doc.description,
    game: doc.game,
    date: doc.date.toISOString(),
    max_participants: doc.max_participants,
    prize: doc.prize ?? null,
    participants: doc.participants ?? [],
    winners: doc.winners ?? [],
    status: doc.status,
    created_by: doc.created_by ?? null,
    created_at: doc.created_at.toISOString(),
  };
}

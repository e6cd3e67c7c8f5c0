import type { ObjectId } from 'mongodb';
import type { UserDto } from '@maestros/contract';

/** Shape of a document in the `users` collection. */
export interface UserDocument {
  _id: ObjectId;
  discord_id: string;
  username: string;
  discriminator?: string | null;
  avatar?: string | null;
  email?: string | null;
  /** Site roles granted through the admin flow, e.g. `Member`. */
  roles: string[];
  /** Discord role IDs held in the configured guild. */
  guild_roles: string[];
  xp: number;
  level: number;
  badges: string[];
  joined_at?: Date | null;
  last_login?: Date | null;
  roles_synced_at?: Date | null;
}

/** `level = floor(sqrt(xp / 100))` */
export function levelForXp(xp: number): number {
  return Math.floor(Math.sqrt(Math.max(xp, 0) / 100));
}

export function toUserDto(doc: UserDocument): UserDto {
  return {
    id: doc._id.toHexString(),
    discord_id: doc.discord_id,
    username: doc.username,
    discriminator: doc.discriminator ?? null,
    avatar: doc.avatar ?? null,
    email: doc.email ?? null,
    roles: doc.roles ?? [],
    guild_roles: doc.guild_roles ?? [],
    xp: doc.xp ?? 0,
    level: doc.level ?? levelForXp(doc.xp ?? 0),
    badges: doc.badges ?? [],
    joined_at: doc.joined_at?.toISOString() ?? null,
    last_login: doc.last_login?.toISOString() ?? null,
  };
}

import { BadRequestException } from '@nestjs/common';
import { ObjectId } from 'mongodb';

const OBJECT_ID_PATTERN = /^[0-9a-f]{24}$/i;

/** Parse a path parameter as an ObjectId or fail with 400 `message`. */
export function parseObjectId(id: string, message: string): ObjectId {
  if (!OBJECT_ID_PATTERN.test(id)) {
    throw new BadRequestException(message);
  }
  return new ObjectId(id);
}

const DISCORD_EPOCH_MS = 1420070400000n;

/** Creation time encoded in a Discord snowflake, or null if it is not one. */
export function snowflakeCreatedAt(snowflake: string): Date | null {
  if (!/^\d+$/.test(snowflake)) return null;
  return new Date(Number((BigInt(snowflake) >> 22n) + DISCORD_EPOCH_MS));
}

import type { Db, IndexDescription } from 'mongodb';
import { COLLECTIONS, type CollectionName } from './mongo.constants';

export const INDEX_DEFINITIONS: Record<string, IndexDescription[]> = {
  [COLLECTIONS.USERS]: [
    { key: { discord_id: 1 }, unique: true },
    { key: { username: 1 } },
    { key: { xp: -1 } },
    { key: { level: -1 } },
  ],
  [COLLECTIONS.GAMES]: [
    { key: { active: 1 } },
    { key: { created_at: -1 } },
    { key: { name: 1 } },
  ],
  [COLLECTIONS.APPLICATIONS]: [
    { key: { user_id: 1 } },
    { key: { status: 1 } },
    { key: { submitted_at: -1 } },
    { key: { user_id: 1, status: 1 } },
  ],
  [COLLECTIONS.ACTIVITY]: [
    { key: { user_id: 1, timestamp: -1 } },
    { key: { timestamp: -1 } },
  ],
  [COLLECTIONS.EVENTS]: [
    { key: { status: 1 } },
    { key: { date: 1 } },
    { key: { participants: 1 } },
  ],
  [COLLECTIONS.RULES]: [{ key: { category: 1 } }, { key: { order: 1 } }],
} satisfies Partial<Record<CollectionName, IndexDescription[]>>;

/**
 * Create every index. `createIndexes` is idempotent for identical specs.
 * Returns the number of index specs applied.
 */
export async function ensureIndexes(db: Db): Promise<number> {
  let applied = 0;
  for (const [name, indexes] of Object.entries(INDEX_DEFINITIONS)) {
    await db.collection(name).createIndexes(indexes);
    applied += indexes.length;
  }
  return applied;
}

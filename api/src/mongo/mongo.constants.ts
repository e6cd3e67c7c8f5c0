export const MONGO_CLIENT = 'MONGO_CLIENT';
export const MONGO_DB = 'MONGO_DB';

/** Collection names in the community database. */
export const COLLECTIONS = {
  USERS: 'users',
  APPLICATIONS: 'applications',
  EVENTS: 'events',
  GAMES: 'games',
  RULES: 'rules',
  ACTIVITY: 'activity',
  ACTIVITY_LOGS: 'activity_logs',
  LOGS: 'logs',
  WARNINGS: 'warnings',
  ANNOUNCEMENT_LOGS: 'announcement_logs',
} as const;

export type CollectionName = (typeof COLLECTIONS)[keyof typeof COLLECTIONS];

// System / health
export * from './system.schema.js';

// Auth & permissions
export * from './auth.schema.js';

// Users
export * from './users.schema.js';

// Membership applications
export * from './applications.schema.js';

// Events
export * from './events.schema.js';

// Games
export * from './games.schema.js';

// Rules
export * from './rules.schema.js';

// Admin
export * from './admin.schema.js';

// Moderation
export * from './moderation.schema.js';

// Announcements
export * from './announcements.schema.js';

// Discord guild state
export * from './discord.schema.js';

// Music (JioSaavn)
export * from './music.schema.js';

export const DISCORD_BOT_EVENTS = {
  CONNECTED: 'discord-bot.connected',
  DISCONNECTED: 'discord-bot.disconnected',
  ERROR: 'discord-bot.error',
} as const;

/** Embed accent colors as decimal ints for discord.js. */
export const EMBED_COLORS = {
  /** Maestros gold #FFD363 */
  BRAND: 0xffd363,
  /** Discord blurple, default for announcements */
  ANNOUNCEMENT: 0x5865f2,
  SUCCESS: 0x57f287,
  ERROR: 0xed4245,
  WARNING: 0xfee75c,
  INFO: 0x3498db,
  MUSIC: 0x1db954,
  PLAYLIST: 0x9b59b6,
  ALBUM: 0xffd700,
  NOT_FOUND: 0xe67e22,
  MUTED: 0x979c9f,
  /** Rule posts, gold #D4AF37 */
  RULES: 0xd4af37,
} as const;

/** Emitted by the music player whenever a track starts. */
export const MUSIC_EVENTS = {
  TRACK_STARTED: 'music.track-started',
} as const;

export const BOT_FOOTER = 'Maestros Community';

export const NOT_CONNECTED_MESSAGE = 'Discord bot not connected';

/**
 * Custom IDs for the now-playing control buttons.
 * Format: `music:{action}`
 */
export const MUSIC_BUTTON_IDS = {
  PREVIOUS: 'music:previous',
  PAUSE: 'music:pause',
  RESUME: 'music:resume',
  SKIP: 'music:skip',
  LOOP: 'music:loop',
  SHUFFLE: 'music:shuffle',
  STOP: 'music:stop',
  QUEUE: 'music:queue',
} as const;

export type MusicButtonId =
  (typeof MUSIC_BUTTON_IDS)[keyof typeof MUSIC_BUTTON_IDS];

const MUSIC_BUTTON_ID_SET: ReadonlySet<string> = new Set(
  Object.values(MUSIC_BUTTON_IDS),
);

export function isMusicButtonId(customId: string): customId is MusicButtonId {
  return MUSIC_BUTTON_ID_SET.has(customId);
}

/**
 * Convert discord.js login errors into operator-readable messages.
 */
export function friendlyDiscordErrorMessage(error: unknown): string {
  if (!(error instanceof Error)) return 'Failed to connect with provided token';
  const raw = error.message;
  const code = 'code' in error ? error.code : undefined;

  if (/disallowed intent|privileged intent/i.test(raw) || code === 4014) {
    return 'Missing privileged intents. Enable Server Members, Presence and Message Content under Bot > Privileged Gateway Intents.';
  }
  if (/invalid token|TOKEN_INVALID/i.test(raw)) {
    return 'Invalid bot token. Check DISCORD_BOT_TOKEN.';
  }
  if (/getaddrinfo|ENOTFOUND/i.test(raw)) {
    return 'Unable to reach Discord servers. Check your internet connection.';
  }
  if (/ECONNREFUSED/i.test(raw)) {
    return 'Connection to Discord was refused. Try again in a few moments.';
  }

  return 'Failed to connect with provided token';
}

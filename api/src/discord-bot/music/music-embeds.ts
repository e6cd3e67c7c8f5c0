import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
} from 'discord.js';
import type { SongSummaryDto } from '@maestros/contract';
import { EMBED_COLORS, MUSIC_BUTTON_IDS } from '../discord-bot.constants';
import type { QueuedTrack } from './music-queue.service';

export const QUEUE_PREVIEW_LIMIT = 10;

export type MusicEmbedKind = 'now_playing' | 'queued' | 'playlist' | 'album';
export type PlaybackStatus = 'playing' | 'paused' | 'queued';

const KIND_STYLE: Record<
  MusicEmbedKind,
  { title: string; color: number; footer: string }
> = {
  now_playing: {
    title: '🎵 Now Playing',
    color: EMBED_COLORS.MUSIC,
    footer: '🎶 Enjoy the music!',
  },
  queued: {
    title: '➕ Added to Queue',
    color: EMBED_COLORS.INFO,
    footer: '🎶 Added to queue',
  },
  playlist: {
    title: '📀 Playlist - Now Playing',
    color: EMBED_COLORS.PLAYLIST,
    footer: '🎶 Playlist • Use 🔀 button to shuffle',
  },
  album: {
    title: '💿 Album - Now Playing',
    color: EMBED_COLORS.ALBUM,
    footer: '🎶 Album • Use 🔀 button to shuffle',
  },
};

const STATUS_TEXT: Record<PlaybackStatus, string> = {
  playing: '🟢 Playing',
  paused: '⏸️ Paused',
  queued: '⏸️ Queued',
};

export interface MusicEmbedOptions {
  kind?: MusicEmbedKind;
  status?: PlaybackStatus;
  requester?: string;
  channelName?: string | null;
  /** Playlist or album name, shown for collection embeds */
  collectionName?: string;
}

/** Discord rejects empty field values. */
function orUnknown(value: string): string {
  return value.trim() ? value : 'Unknown';
}

export function buildMusicEmbed(
  song: SongSummaryDto,
  options: MusicEmbedOptions = {},
): EmbedBuilder {
  const kind = options.kind ?? 'now_playing';
  const style = KIND_STYLE[kind];

  const embed = new EmbedBuilder()
    .setTitle(style.title)
    .setDescription(`**${orUnknown(song.song)}**`)
    .setColor(style.color)
    .addFields(
      { name: '💿 Album', value: orUnknown(song.album), inline: true },
      { name: '📅 Year', value: orUnknown(song.year), inline: true },
      { name: '⏱️ Duration', value: `${song.duration} min`, inline: true },
      { name: '🎼 Music', value: orUnknown(song.music), inline: true },
      {
        name: '🎚️ Status',
        value: STATUS_TEXT[options.status ?? 'playing'],
        inline: true,
      },
    )
    .setFooter({ text: style.footer });

  if (song.image) embed.setThumbnail(song.image);
  if (options.channelName) {
    embed.addFields({ name: '📢 Channel', value: options.channelName, inline: true });
  }
  embed.addFields({ name: '🎤 Singers', value: orUnknown(song.singers) });
  if (kind === 'playlist') {
    embed.addFields({
      name: '📀 Playlist',
      value: options.collectionName ?? 'Unknown',
    });
  } else if (kind === 'album') {
    embed.addFields({
      name: '💿 Album Name',
      value: options.collectionName ?? orUnknown(song.album),
    });
  }
  if (options.requester) {
    embed.addFields({ name: '👤 Requested by', value: options.requester });
  }

  return embed;
}

/** The first ten pending tracks, or the empty-queue notice. */
export function buildQueueEmbed(queue: readonly QueuedTrack[]): EmbedBuilder {
  if (queue.length === 0) {
    return new EmbedBuilder()
      .setTitle('📋 Queue Empty')
      .setDescription('No songs in queue. Use `/play` to add some!')
      .setColor(EMBED_COLORS.MUTED);
  }

  const lines = queue
    .slice(0, QUEUE_PREVIEW_LIMIT)
    .map((track, index) => `**${index + 1}.** ${track.song}`);
  const more = queue.length > QUEUE_PREVIEW_LIMIT ? ' (showing first 10)' : '';

  return new EmbedBuilder()
    .setTitle('📋 Current Queue')
    .setDescription(lines.join('\n'))
    .setColor(EMBED_COLORS.INFO)
    .setFooter({ text: `Total: ${queue.length} songs${more}` });
}

export function buildStoppedEmbed(): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle('⏹️ Stopped')
    .setDescription('Playback stopped and queue cleared.')
    .setColor(EMBED_COLORS.ERROR);
}

export function buildMusicNoticeEmbed(
  title: string,
  description: string,
  color: number = EMBED_COLORS.ERROR,
): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(title)
    .setDescription(description)
    .setColor(color);
}

const BUTTON_ROWS: { id: string; emoji: string; style: ButtonStyle }[][] = [
  [
    { id: MUSIC_BUTTON_IDS.PREVIOUS, emoji: '⏮️', style: ButtonStyle.Secondary },
    { id: MUSIC_BUTTON_IDS.PAUSE, emoji: '⏸️', style: ButtonStyle.Secondary },
    { id: MUSIC_BUTTON_IDS.RESUME, emoji: '▶️', style: ButtonStyle.Success },
    { id: MUSIC_BUTTON_IDS.SKIP, emoji: '⏭️', style: ButtonStyle.Secondary },
  ],
  [
    { id: MUSIC_BUTTON_IDS.LOOP, emoji: '🔁', style: ButtonStyle.Secondary },
    { id: MUSIC_BUTTON_IDS.SHUFFLE, emoji: '🔀', style: ButtonStyle.Secondary },
    { id: MUSIC_BUTTON_IDS.STOP, emoji: '⏹️', style: ButtonStyle.Danger },
    { id: MUSIC_BUTTON_IDS.QUEUE, emoji: '📋', style: ButtonStyle.Primary },
  ],
];

/** Playback controls attached under every now-playing message. */
export function buildControlRows(): ActionRowBuilder<ButtonBuilder>[] {
  return BUTTON_ROWS.map((row) =>
    new ActionRowBuilder<ButtonBuilder>().addComponents(
      row.map((button) =>
        new ButtonBuilder()
          .setCustomId(button.id)
          .setEmoji(button.emoji)
          .setStyle(button.style),
      ),
    ),
  );
}

import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import type { Message } from 'discord.js';
import { MUSIC_EVENTS } from '../discord-bot.constants';
import { buildMusicEmbed } from './music-embeds';
import type { TrackStartedEvent } from './music-player.service';

/**
 * Remembers the latest now-playing message per guild and rewrites its
 * embed whenever the player moves to another track.
 */
@Injectable()
export class NowPlayingMessageService {
  private readonly logger = new Logger(NowPlayingMessageService.name);
  private readonly messages = new Map<string, Message>();

  track(guildId: string, message: Message): void {
    this.messages.set(guildId, message);
  }

  get(guildId: string): Message | null {
    return this.messages.get(guildId) ?? null;
  }

  forget(guildId: string): void {
    this.messages.delete(guildId);
  }

  @OnEvent(MUSIC_EVENTS.TRACK_STARTED)
  async onTrackStarted(event: TrackStartedEvent): Promise<void> {
    const message = this.messages.get(event.guildId);
    if (!message) return;

    try {
      await message.edit({
        embeds: [
          buildMusicEmbed(event.track, {
            status: 'playing',
            channelName: event.channelName,
          }),
        ],
      });
    } catch (error) {
      this.logger.warn(
        `Dropping now-playing message for guild ${event.guildId}: ${error instanceof Error ? error.message : String(error)}`,
      );
      this.messages.delete(event.guildId);
    }
  }
}

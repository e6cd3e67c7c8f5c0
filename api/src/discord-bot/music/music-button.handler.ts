import { Injectable } from '@nestjs/common';
import type { ButtonInteraction } from 'discord.js';
import { MUSIC_BUTTON_IDS } from '../discord-bot.constants';
import {
  buildMusicEmbed,
  buildQueueEmbed,
  buildStoppedEmbed,
  type PlaybackStatus,
} from './music-embeds';
import { MusicPlayerService } from './music-player.service';
import { MusicQueueService } from './music-queue.service';
import { NowPlayingMessageService } from './now-playing-message.service';

const NOTHING_PLAYING = '❌ Nothing is playing.';

/**
 * Handles the playback buttons under a now-playing message. Track changes
 * (previous, skip) only acknowledge the click; the embed is rewritten when
 * the player emits its track-started event.
 */
@Injectable()
export class MusicButtonHandler {
  constructor(
    private readonly player: MusicPlayerService,
    private readonly queue: MusicQueueService,
    private readonly nowPlaying: NowPlayingMessageService,
  ) {}

  async handle(interaction: ButtonInteraction): Promise<void> {
    const guildId = interaction.guildId;
    if (!guildId) {
      await this.notify(interaction, NOTHING_PLAYING);
      return;
    }

    switch (interaction.customId) {
      case MUSIC_BUTTON_IDS.PREVIOUS:
        if (!this.player.previous(guildId)) {
          await this.notify(interaction, '⏮️ No previous song in history!');
          return;
        }
        await interaction.deferUpdate();
        return;
      case MUSIC_BUTTON_IDS.PAUSE:
        if (!this.player.pause(guildId)) {
          await this.notify(interaction, NOTHING_PLAYING);
          return;
        }
        await this.refresh(interaction, guildId, 'paused');
        return;
      case MUSIC_BUTTON_IDS.RESUME:
        if (!this.player.resume(guildId)) {
          await this.notify(interaction, NOTHING_PLAYING);
          return;
        }
        await this.refresh(interaction, guildId, 'playing');
        return;
      case MUSIC_BUTTON_IDS.SKIP:
        if (!this.player.skip(guildId)) {
          await this.notify(interaction, NOTHING_PLAYING);
          return;
        }
        await interaction.deferUpdate();
        return;
      case MUSIC_BUTTON_IDS.LOOP: {
        const loop = this.queue.toggleLoop(guildId);
        await this.notify(interaction, `🔁 Loop: ${loop ? 'ON' : 'OFF'}`);
        return;
      }
      case MUSIC_BUTTON_IDS.SHUFFLE:
        if (this.queue.get(guildId).queue.length > 1) {
          this.queue.shuffle(guildId);
          await this.notify(interaction, '🔀 Queue shuffled!');
        } else {
          await this.notify(interaction, '❌ Not enough songs in queue to shuffle.');
        }
        return;
      case MUSIC_BUTTON_IDS.STOP:
        this.player.stop(guildId);
        this.nowPlaying.forget(guildId);
        await interaction.update({
          embeds: [buildStoppedEmbed()],
          components: [],
        });
        return;
      case MUSIC_BUTTON_IDS.QUEUE:
        await interaction.reply({
          embeds: [buildQueueEmbed(this.queue.get(guildId).queue)],
          ephemeral: true,
        });
        return;
      default:
        await this.notify(interaction, '❌ Unknown control.');
    }
  }

  private async refresh(
    interaction: ButtonInteraction,
    guildId: string,
    status: PlaybackStatus,
  ): Promise<void> {
    const track = this.queue.get(guildId).nowPlaying;
    if (!track) {
      await interaction.deferUpdate();
      return;
    }
    await interaction.update({
      embeds: [
        buildMusicEmbed(track, {
          status,
          requester: track.requestedBy,
          channelName: this.player.getChannelName(guildId),
        }),
      ],
    });
  }

  private async notify(
    interaction: ButtonInteraction,
    content: string,
  ): Promise<void> {
    await interaction.reply({ content, ephemeral: true });
  }
}

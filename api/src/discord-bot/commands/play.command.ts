import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import type { SongSummaryDto } from '@maestros/contract';
import { MusicService } from '../../music/music.service';
import { EMBED_COLORS } from '../discord-bot.constants';
import {
  buildControlRows,
  buildMusicEmbed,
  buildMusicNoticeEmbed,
} from '../music/music-embeds';
import { MusicPlayerService } from '../music/music-player.service';
import { MusicQueueService } from '../music/music-queue.service';
import { NowPlayingMessageService } from '../music/now-playing-message.service';
import { voiceChannelOf } from '../music/voice-channel';
import type { SlashCommandHandler } from './slash-command';

@Injectable()
export class PlayCommand implements SlashCommandHandler {
  readonly commandName = 'play';
  readonly group = 'music';
  private readonly logger = new Logger(PlayCommand.name);

  constructor(
    private readonly musicService: MusicService,
    private readonly player: MusicPlayerService,
    private readonly queue: MusicQueueService,
    private readonly nowPlaying: NowPlayingMessageService,
  ) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('play')
      .setDescription('Play a song in voice channel')
      .setDMPermission(false)
      .addStringOption((option) =>
        option
          .setName('song_name')
          .setDescription('Name of the song to play')
          .setRequired(true),
      )
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const query = interaction.options.getString('song_name', true);
    await interaction.deferReply();

    const voiceChannel = voiceChannelOf(interaction);
    if (!voiceChannel) {
      await interaction.editReply({
        embeds: [
          buildMusicNoticeEmbed(
            '❌ Error',
            'You must be in a voice channel to use this command!',
          ),
        ],
      });
      return;
    }

    const notFound = buildMusicNoticeEmbed(
      '❌ Not Found',
      `Could not find: **${query}**`,
      EMBED_COLORS.NOT_FOUND,
    );

    let song: SongSummaryDto;
    try {
      song = await this.musicService.findSongSummary(query, false, true);
    } catch (error) {
      if (error instanceof NotFoundException) {
        await interaction.editReply({ embeds: [notFound] });
        return;
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Song lookup failed for "${query}": ${reason}`);
      await interaction.editReply({
        embeds: [
          buildMusicNoticeEmbed(
            '❌ Error',
            `Failed to fetch song: ${reason.slice(0, 100)}`,
          ),
        ],
      });
      return;
    }

    if (!song.media_url) {
      await interaction.editReply({ embeds: [notFound] });
      return;
    }

    const guildId = voiceChannel.guild.id;
    await this.player.join(voiceChannel);
    this.queue.enqueue(guildId, {
      ...song,
      requestedBy: interaction.user.toString(),
    });

    const started = this.player.startIfIdle(guildId);
    if (!started) {
      await interaction.editReply({
        embeds: [
          buildMusicEmbed(song, {
            kind: 'queued',
            status: 'queued',
            requester: interaction.user.toString(),
            channelName: voiceChannel.name,
          }),
        ],
      });
      return;
    }

    const message = await interaction.editReply({
      embeds: [
        buildMusicEmbed(started, {
          requester: interaction.user.toString(),
          channelName: voiceChannel.name,
        }),
      ],
      components: buildControlRows(),
    });
    this.nowPlaying.track(guildId, message);
  }
}

import { Injectable } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import type { SongListDto } from '@maestros/contract';
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

type CollectionKind = 'playlist' | 'album';

/**
 * Shared flow for `/playlist` and `/album`: load the collection, queue every
 * song that has a media URL, start playback if idle and post the embed.
 */
@Injectable()
abstract class CollectionPlayCommand implements SlashCommandHandler {
  abstract readonly commandName: CollectionKind;
  readonly group = 'music';

  constructor(
    protected readonly musicService: MusicService,
    private readonly player: MusicPlayerService,
    private readonly queue: MusicQueueService,
    private readonly nowPlaying: NowPlayingMessageService,
  ) {}

  protected abstract load(query: string): Promise<SongListDto>;

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    const kind = this.commandName;
    return new SlashCommandBuilder()
      .setName(kind)
      .setDescription(`Play ${kind === 'album' ? 'an album' : 'a playlist'} in voice channel`)
      .setDMPermission(false)
      .addStringOption((option) =>
        option
          .setName(`${kind}_name`)
          .setDescription(`Name or URL of the ${kind}`)
          .setRequired(true),
      )
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const kind = this.commandName;
    const name = interaction.options.getString(`${kind}_name`, true);
    await interaction.deferReply();

    const voiceChannel = voiceChannelOf(interaction);
    if (!voiceChannel) {
      await interaction.editReply({
        embeds: [buildMusicNoticeEmbed('❌ Error', 'You must be in a voice channel!')],
      });
      return;
    }

    let list: SongListDto;
    try {
      list = await this.load(name);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      await interaction.editReply({
        embeds: [
          buildMusicNoticeEmbed(
            '❌ Error',
            `Failed to fetch ${kind}: ${reason.slice(0, 100)}`,
          ),
        ],
      });
      return;
    }

    const playable = list.songs.filter((song) => song.media_url);
    const [first] = list.songs;
    if (!first || playable.length === 0) {
      await interaction.editReply({
        embeds: [
          buildMusicNoticeEmbed(
            '❌ Not Found',
            `${kind === 'album' ? 'Album' : 'Playlist'} empty: **${name}**`,
            EMBED_COLORS.NOT_FOUND,
          ),
        ],
      });
      return;
    }

    const guildId = voiceChannel.guild.id;
    const requestedBy = interaction.user.toString();
    await this.player.join(voiceChannel);
    this.queue.enqueue(
      guildId,
      ...playable.map((song) => ({ ...song, requestedBy })),
    );
    this.player.startIfIdle(guildId);

    const message = await interaction.editReply({
      embeds: [
        buildMusicEmbed(first, {
          kind,
          requester: requestedBy,
          channelName: voiceChannel.name,
          collectionName: name,
        }),
      ],
      components: buildControlRows(),
    });
    this.nowPlaying.track(guildId, message);
  }
}

@Injectable()
export class PlaylistCommand extends CollectionPlayCommand {
  readonly commandName = 'playlist';

  protected load(query: string): Promise<SongListDto> {
    return this.musicService.playlistSongs(query);
  }
}

@Injectable()
export class AlbumCommand extends CollectionPlayCommand {
  readonly commandName = 'album';

  protected load(query: string): Promise<SongListDto> {
    return this.musicService.albumSongs(query);
  }
}

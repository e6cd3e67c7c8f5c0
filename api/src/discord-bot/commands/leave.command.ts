import { Injectable } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { MusicPlayerService } from '../music/music-player.service';
import { NowPlayingMessageService } from '../music/now-playing-message.service';
import type { SlashCommandHandler } from './slash-command';

@Injectable()
export class LeaveCommand implements SlashCommandHandler {
  readonly commandName = 'leave';
  readonly group = 'music';

  constructor(
    private readonly player: MusicPlayerService,
    private readonly nowPlaying: NowPlayingMessageService,
  ) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('leave')
      .setDescription('Leave voice channel')
      .setDMPermission(false)
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const guildId = interaction.guildId;
    if (!guildId || !this.player.leave(guildId)) {
      await interaction.reply('❌ Not in a voice channel.');
      return;
    }
    this.nowPlaying.forget(guildId);
    await interaction.reply('👋 Left the voice channel.');
  }
}

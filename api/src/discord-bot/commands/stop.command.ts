import { Injectable } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { MusicPlayerService } from '../music/music-player.service';
import type { SlashCommandHandler } from './slash-command';

@Injectable()
export class StopCommand implements SlashCommandHandler {
  readonly commandName = 'stop';
  readonly group = 'music';

  constructor(private readonly player: MusicPlayerService) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('stop')
      .setDescription('Stop playback and clear queue')
      .setDMPermission(false)
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const stopped =
      interaction.guildId !== null && this.player.stop(interaction.guildId);
    await interaction.reply(
      stopped
        ? '⏹️ Playback stopped and queue cleared.'
        : '❌ Nothing is playing.',
    );
  }
}

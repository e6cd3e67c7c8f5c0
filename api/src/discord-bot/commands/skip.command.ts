import { Injectable } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { MusicPlayerService } from '../music/music-player.service';
import type { SlashCommandHandler } from './slash-command';

@Injectable()
export class SkipCommand implements SlashCommandHandler {
  readonly commandName = 'skip';
  readonly group = 'music';

  constructor(private readonly player: MusicPlayerService) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('skip')
      .setDescription('Skip current song')
      .setDMPermission(false)
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const skipped =
      interaction.guildId !== null && this.player.skip(interaction.guildId);
    await interaction.reply(skipped ? '⏭️ Skipped!' : '❌ Nothing is playing.');
  }
}

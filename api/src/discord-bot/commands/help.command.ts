import { Injectable } from '@nestjs/common';
import {
  EmbedBuilder,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { EMBED_COLORS } from '../discord-bot.constants';
import type { SlashCommandHandler } from './slash-command';

/** Each entry in the help listing. Add new commands here. */
export const HELP_ENTRIES: readonly { name: string; description: string }[] = [
  { name: '/ping', description: 'Check bot latency' },
  { name: '/stats', description: 'Show server statistics' },
  { name: '/help', description: 'Show this help message' },
  { name: '/apply', description: 'Get application link' },
  { name: '/events', description: 'Show upcoming events' },
  { name: '/announce', description: 'Make an announcement (Admin only)' },
  { name: '/play', description: 'Play a song in voice channel' },
  { name: '/playlist', description: 'Play a playlist' },
  { name: '/album', description: 'Play an album' },
  { name: '/skip', description: 'Skip to next song' },
  { name: '/queue', description: 'Show current queue' },
  { name: '/stop', description: 'Stop playback and clear queue' },
  { name: '/leave', description: 'Leave voice channel' },
];

@Injectable()
export class HelpCommand implements SlashCommandHandler {
  readonly commandName = 'help';
  readonly group = 'general';

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('help')
      .setDescription('Show bot commands')
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const embed = new EmbedBuilder()
      .setColor(EMBED_COLORS.BRAND)
      .setTitle('🤖 Maestros Bot Commands')
      .setDescription('Here are the available slash commands:')
      .addFields(
        HELP_ENTRIES.map((entry) => ({
          name: entry.name,
          value: entry.description,
        })),
      );

    await interaction.reply({ embeds: [embed] });
  }
}

import { Injectable } from '@nestjs/common';
import {
  EmbedBuilder,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { EMBED_COLORS } from '../discord-bot.constants';
import type { SlashCommandHandler } from './slash-command';

@Injectable()
export class PingCommand implements SlashCommandHandler {
  readonly commandName = 'ping';
  readonly group = 'general';

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('ping')
      .setDescription('Check bot latency')
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const latency = Math.round(interaction.client.ws.ping);
    const embed = new EmbedBuilder()
      .setTitle('🏓 Pong!')
      .setDescription(`Latency: ${latency}ms`)
      .setColor(EMBED_COLORS.BRAND);

    await interaction.reply({ embeds: [embed] });
  }
}

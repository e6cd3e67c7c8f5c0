import { Injectable } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { buildQueueEmbed } from '../music/music-embeds';
import { MusicQueueService } from '../music/music-queue.service';
import type { SlashCommandHandler } from './slash-command';

@Injectable()
export class QueueCommand implements SlashCommandHandler {
  readonly commandName = 'queue';
  readonly group = 'music';

  constructor(private readonly queue: MusicQueueService) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('queue')
      .setDescription('Show current queue')
      .setDMPermission(false)
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const pending = interaction.guildId
      ? this.queue.get(interaction.guildId).queue
      : [];
    await interaction.reply({ embeds: [buildQueueEmbed(pending)] });
  }
}

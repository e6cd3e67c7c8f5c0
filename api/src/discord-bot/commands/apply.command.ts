import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  EmbedBuilder,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import type { AppEnv } from '../../config/env.schema';
import { EMBED_COLORS } from '../discord-bot.constants';
import type { SlashCommandHandler } from './slash-command';

@Injectable()
export class ApplyCommand implements SlashCommandHandler {
  readonly commandName = 'apply';
  readonly group = 'general';

  constructor(private readonly config: ConfigService<AppEnv, true>) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('apply')
      .setDescription('Get application link to join Maestros')
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const frontendUrl = this.config.get('FRONTEND_URL', { infer: true });
    const embed = new EmbedBuilder()
      .setTitle('📝 Apply to Maestros')
      .setDescription('Ready to join our elite community? Apply now!')
      .setColor(EMBED_COLORS.BRAND)
      .addFields(
        {
          name: 'Application Portal',
          value: `[Click here to apply](${frontendUrl}/apply)`,
        },
        {
          name: 'Requirements',
          value:
            '• Active Discord member\n• Positive attitude\n• Team player\n• Gaming experience',
        },
      );

    await interaction.reply({ embeds: [embed] });
  }
}

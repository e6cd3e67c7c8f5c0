import { Injectable } from '@nestjs/common';
import {
  ChannelType,
  EmbedBuilder,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
  type User,
} from 'discord.js';
import { EMBED_COLORS } from '../discord-bot.constants';
import type { SlashCommandHandler } from './slash-command';

export function buildAnnounceEmbed(
  message: string,
  author: User,
  now: Date = new Date(),
): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle('📢 Announcement')
    .setDescription(message)
    .setColor(EMBED_COLORS.BRAND)
    .setTimestamp(now)
    .setFooter({
      text: `By ${author.tag}`,
      iconURL: author.displayAvatarURL(),
    });
}

/**
 * `/announce channel message`: Administrator only. Pings @everyone in the
 * chosen text channel, then confirms privately.
 */
@Injectable()
export class AnnounceCommand implements SlashCommandHandler {
  readonly commandName = 'announce';
  readonly group = 'general';

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('announce')
      .setDescription('Make an announcement (Admin only)')
      .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
      .setDMPermission(false)
      .addChannelOption((option) =>
        option
          .setName('channel')
          .setDescription('The channel to send the announcement to')
          .addChannelTypes(ChannelType.GuildText)
          .setRequired(true),
      )
      .addStringOption((option) =>
        option
          .setName('message')
          .setDescription('The announcement message')
          .setRequired(true),
      )
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    if (!interaction.inCachedGuild()) {
      await interaction.reply({
        content: 'This command only works in a server.',
        ephemeral: true,
      });
      return;
    }
    if (!interaction.memberPermissions.has(PermissionFlagsBits.Administrator)) {
      await interaction.reply({
        content: '❌ You need Administrator permissions to use this command.',
        ephemeral: true,
      });
      return;
    }

    const channel = interaction.options.getChannel('channel', true, [
      ChannelType.GuildText,
    ]);
    const message = interaction.options.getString('message', true);

    await channel.send({
      content: '@everyone',
      embeds: [buildAnnounceEmbed(message, interaction.user)],
    });
    await interaction.reply({
      content: `✅ Announcement sent to ${channel.toString()}`,
      ephemeral: true,
    });
  }
}

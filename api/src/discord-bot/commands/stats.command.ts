import { Injectable } from '@nestjs/common';
import {
  EmbedBuilder,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type Guild,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { EMBED_COLORS } from '../discord-bot.constants';
import type { SlashCommandHandler } from './slash-command';

/** Non-bot members whose presence is anything but offline. */
export function countOnline(guild: Guild): number {
  return guild.members.cache.filter(
    (member) =>
      !member.user.bot &&
      (member.presence?.status ?? 'offline') !== 'offline',
  ).size;
}

export function buildServerStatsEmbed(guild: Guild): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle('📊 Server Statistics')
    .setColor(EMBED_COLORS.BRAND)
    .addFields(
      { name: 'Total Members', value: String(guild.memberCount), inline: true },
      { name: 'Online', value: String(countOnline(guild)), inline: true },
      { name: 'Channels', value: String(guild.channels.cache.size), inline: true },
      { name: 'Roles', value: String(guild.roles.cache.size), inline: true },
      { name: 'Boost Level', value: String(guild.premiumTier), inline: true },
      {
        name: 'Boosts',
        value: String(guild.premiumSubscriptionCount ?? 0),
        inline: true,
      },
    )
    .setThumbnail(guild.iconURL())
    .setFooter({ text: `Server ID: ${guild.id}` });
  return embed;
}

@Injectable()
export class StatsCommand implements SlashCommandHandler {
  readonly commandName = 'stats';
  readonly group = 'general';

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('stats')
      .setDescription('Show server statistics')
      .setDMPermission(false)
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

    await interaction.reply({
      embeds: [buildServerStatsEmbed(interaction.guild)],
    });
  }
}

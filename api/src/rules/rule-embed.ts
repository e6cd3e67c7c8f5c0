import { EmbedBuilder } from 'discord.js';
import { EMBED_COLORS } from '../discord-bot/discord-bot.constants';

const MAX_FIELDS = 25;
const AUTHOR = 'Maestros Community Rules';
const FOOTER = 'Regards from Maestros Community';

/** One field per non-blank line of the rule text. */
export function buildRuleEmbed(
  rule: { title: string; content: string },
  guildIconUrl: string | null,
): EmbedBuilder {
  const lines = rule.content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, MAX_FIELDS);

  const embed = new EmbedBuilder()
    .setTitle(`📜 ${rule.title}`)
    .setColor(EMBED_COLORS.RULES)
    .setTimestamp()
    .addFields(
      lines.map((line, index) => ({ name: `📌 Rule ${index + 1}`, value: line })),
    );

  if (guildIconUrl) {
    return embed
      .setAuthor({ name: AUTHOR, iconURL: guildIconUrl })
      .setThumbnail(guildIconUrl)
      .setFooter({ text: FOOTER, iconURL: guildIconUrl });
  }
  return embed.setAuthor({ name: AUTHOR }).setFooter({ text: FOOTER });
}

function normalizeChannelName(name: string): string {
  return name.toLowerCase().replace(/[-_]/g, '');
}

/**
 * Channel whose name overlaps the rule category ("server" matches
 * "Server-Rules"), falling back to the first channel.
 */
export function matchRuleChannel<T extends { name: string }>(
  channels: readonly T[],
  category: string,
): T | undefined {
  const wanted = normalizeChannelName(category);
  const match = channels.find((channel) => {
    const name = normalizeChannelName(channel.name);
    return name.includes(wanted) || wanted.includes(name);
  });
  return match ?? channels[0];
}

/** "server-rules" -> "Server Rules" */
export function channelDisplayName(name: string): string {
  return name
    .split(/[-_\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

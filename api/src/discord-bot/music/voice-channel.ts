import type {
  ButtonInteraction,
  ChatInputCommandInteraction,
  VoiceBasedChannel,
} from 'discord.js';

/** The caller's current voice channel, or null outside a guild or voice. */
export function voiceChannelOf(
  interaction: ChatInputCommandInteraction | ButtonInteraction,
): VoiceBasedChannel | null {
  if (!interaction.inCachedGuild()) return null;
  return interaction.member.voice.channel;
}

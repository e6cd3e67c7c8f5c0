import { EmbedBuilder, type GuildMember } from 'discord.js';
import type { ApplicationAnalysisDto, ApplicationAnswersDto } from '@maestros/contract';
import { BOT_FOOTER, EMBED_COLORS } from '../discord-bot/discord-bot.constants';

const FIELD_LIMIT = 1024;

/** Discord `<t:unix:style>` timestamp markup. */
export function discordTimestamp(date: Date, style: 'D' | 'F' = 'F'): string {
  return `<t:${Math.floor(date.getTime() / 1000)}:${style}>`;
}

function bullets(items: string[]): string {
  return `• ${items.slice(0, 3).join('\n• ')}`;
}

export function buildReceivedDm(shortId: string): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle('✅ Application Received')
    .setDescription('Thank you for your application to Maestros Community!')
    .setColor(EMBED_COLORS.SUCCESS)
    .addFields(
      { name: 'Application ID', value: `\`${shortId}\`` },
      {
        name: 'Next Steps',
        value: 'A Manager will review your application soon. Contact a Manager in Discord for updates.',
      },
      { name: 'Estimated Review Time', value: '24-48 hours' },
    )
    .setFooter({ text: 'You will be notified once your application is reviewed.' });
}

export function buildReviewEmbed(params: {
  member: GuildMember;
  shortId: string;
  level: number;
  email: string | null;
  answers: ApplicationAnswersDto;
  analysis: ApplicationAnalysisDto;
}): EmbedBuilder {
  const { member, shortId, answers, analysis } = params;
  const embed = new EmbedBuilder()
    .setTitle('📄 New Application Submitted')
    .setDescription(`**${member.toString()}** has submitted a membership application`)
    .setColor(EMBED_COLORS.WARNING)
    .setTimestamp()
    .addFields(
      { name: '👤 Discord Tag', value: member.user.tag, inline: true },
      { name: '🆔 User ID', value: `\`${member.id}\``, inline: true },
      { name: '📊 Level', value: String(params.level), inline: true },
      { name: '📧 Email', value: params.email ?? 'Not provided', inline: true },
      {
        name: '🎂 Account Created',
        value: discordTimestamp(member.user.createdAt, 'D'),
        inline: true,
      },
    );

  if (member.joinedAt) {
    embed.addFields({
      name: '📅 Server Joined',
      value: discordTimestamp(member.joinedAt, 'D'),
      inline: true,
    });
  }

  embed.addFields(
    { name: '🎮 Primary Game', value: answers.primary_game, inline: true },
    { name: '⏱️ Gameplay Hours', value: `${answers.gameplay_hours} hrs`, inline: true },
    { name: '🏆 Rank', value: answers.rank, inline: true },
    { name: '📅 Availability', value: `${answers.availability} hrs/week`, inline: true },
    { name: '🤖 AI Score', value: `**${analysis.score.toFixed(1)}%**`, inline: true },
    { name: '📋 Application ID', value: `\`${shortId}\``, inline: true },
    { name: '💼 Experience', value: answers.experience.slice(0, FIELD_LIMIT) },
    { name: '💭 Why Join Maestros?', value: answers.reason.slice(0, FIELD_LIMIT) },
    { name: '🌟 Contribution Plans', value: answers.contribution.slice(0, FIELD_LIMIT) },
  );

  if (analysis.strengths.length > 0) {
    embed.addFields({ name: '✅ Strengths', value: bullets(analysis.strengths), inline: true });
  }
  if (analysis.weaknesses.length > 0) {
    embed.addFields({ name: '⚠️ Weaknesses', value: bullets(analysis.weaknesses), inline: true });
  }

  return embed
    .setThumbnail(member.displayAvatarURL())
    .setFooter({ text: 'Status: PENDING • Review this application in the Manager Panel' });
}

export function buildAcceptedDm(notes: string): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle('🎉 Application Accepted!')
    .setDescription('Congratulations! Your application has been approved.')
    .setColor(EMBED_COLORS.SUCCESS)
    .addFields(
      { name: 'Welcome Message', value: notes },
      { name: 'Next Steps', value: 'You now have full access to the community!' },
    )
    .setFooter({ text: `Welcome to ${BOT_FOOTER}!` });
}

export function buildAcceptedLog(params: {
  member: GuildMember;
  applicationId: string;
  acceptedBy: string;
  notes: string;
}): EmbedBuilder {
  const { member } = params;
  return new EmbedBuilder()
    .setTitle('✅ Application Accepted')
    .setDescription(
      `**Welcome to our server, ${member.toString()}!**\n\nCongratulations on being accepted to Maestros Community!`,
    )
    .setColor(EMBED_COLORS.SUCCESS)
    .setTimestamp()
    .addFields(
      { name: 'Applicant', value: `${member.toString()} (${member.user.tag})`, inline: true },
      { name: 'User ID', value: `\`${member.id}\``, inline: true },
      { name: 'Application ID', value: `\`${params.applicationId.slice(0, 8)}\``, inline: true },
      { name: 'Accepted By', value: params.acceptedBy },
      { name: 'Acceptance Notes', value: params.notes.slice(0, 500) },
    )
    .setThumbnail(member.displayAvatarURL())
    .setFooter({ text: '🎉 Welcome to Maestros!' });
}

export function buildRejectedDm(reason: string): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle('Application Update')
    .setDescription('Thank you for your interest in Maestros Community. Unfortunately your application was not accepted this time.')
    .setColor(EMBED_COLORS.ERROR)
    .addFields(
      { name: 'Reason', value: reason.slice(0, FIELD_LIMIT) },
      { name: 'Reapply', value: 'You can apply again after 30 days.' },
    )
    .setFooter({ text: BOT_FOOTER });
}

export function buildRejectedLog(params: {
  applicant: string;
  userId: string;
  applicationId: string;
  rejectedBy: string;
  reason: string;
}): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle('❌ Application Rejected')
    .setColor(EMBED_COLORS.ERROR)
    .setTimestamp()
    .addFields(
      { name: 'Applicant', value: params.applicant, inline: true },
      { name: 'User ID', value: `\`${params.userId}\``, inline: true },
      { name: 'Application ID', value: `\`${params.applicationId.slice(0, 8)}\``, inline: true },
      { name: 'Rejected By', value: params.rejectedBy },
      { name: 'Reason', value: params.reason.slice(0, 500) },
    );
}

export function buildOverrideDm(validUntil: Date): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle('🎉 Early Reapplication Granted')
    .setDescription('The CEO has granted you permission to reapply before the 30-day cooldown!')
    .setColor(EMBED_COLORS.SUCCESS)
    .addFields(
      { name: 'Valid Until', value: discordTimestamp(validUntil) },
      { name: 'Next Steps', value: 'Visit the application portal to submit your new application.' },
    );
}

/** Audit-channel entry: who it concerns plus inline detail fields. */
export function buildAuditEmbed(
  action: string,
  subject: { username: string; discordId: string },
  details: Record<string, string>,
): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(`🔒 ${action}`)
    .setColor(EMBED_COLORS.ANNOUNCEMENT)
    .setTimestamp()
    .addFields(
      { name: 'User', value: `${subject.username} (${subject.discordId})` },
      ...Object.entries(details).map(([name, value]) => ({ name, value, inline: true })),
    );
}

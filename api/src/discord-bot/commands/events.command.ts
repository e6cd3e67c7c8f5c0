import { Injectable, Logger } from '@nestjs/common';
import {
  EmbedBuilder,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import type { EventDto } from '@maestros/contract';
import { EventsService } from '../../events/events.service';
import { EMBED_COLORS } from '../discord-bot.constants';
import type { SlashCommandHandler } from './slash-command';

export const UPCOMING_EVENTS_LIMIT = 5;

/** `2026-03-01T18:30:00.000Z` → `2026-03-01 18:30 UTC` */
export function formatEventDate(iso: string): string {
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

export function buildUpcomingEventsEmbed(events: EventDto[]): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle('📅 Upcoming Events')
    .setColor(EMBED_COLORS.BRAND)
    .addFields(
      events.map((event) => ({
        name: event.title,
        value: [
          `📅 ${formatEventDate(event.date)}`,
          `🎮 ${event.game || 'N/A'}`,
          `👥 ${event.participants.length}/${event.max_participants}`,
          `🏆 ${event.prize ?? 'N/A'}`,
        ].join('\n'),
      })),
    )
    .setFooter({ text: 'Visit the website to register' });
}

@Injectable()
export class EventsCommand implements SlashCommandHandler {
  readonly commandName = 'events';
  readonly group = 'general';
  private readonly logger = new Logger(EventsCommand.name);

  constructor(private readonly eventsService: EventsService) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('events')
      .setDescription('Show upcoming events')
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    let events: EventDto[];
    try {
      events = await this.eventsService.findUpcoming(UPCOMING_EVENTS_LIMIT);
    } catch (error) {
      this.logger.error('Failed to load upcoming events:', error);
      await interaction.reply('❌ Database not connected');
      return;
    }

    if (events.length === 0) {
      await interaction.reply('No upcoming events at the moment.');
      return;
    }

    await interaction.reply({ embeds: [buildUpcomingEventsEmbed(events)] });
  }
}

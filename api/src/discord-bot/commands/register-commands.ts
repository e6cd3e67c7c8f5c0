import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import { REST, Routes } from 'discord.js';
import type { AppEnv } from '../../config/env.schema';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS } from '../discord-bot.constants';
import {
  BOT_COMMANDS,
  type CommandGroup,
  type SlashCommandHandler,
} from './slash-command';

/**
 * Registers every slash command on the bound guild once the bot connects.
 * Guild-scoped registration takes effect immediately, unlike global commands.
 */
@Injectable()
export class RegisterCommandsService {
  private readonly logger = new Logger(RegisterCommandsService.name);

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly config: ConfigService<AppEnv, true>,
    @Inject(BOT_COMMANDS) private readonly commands: SlashCommandHandler[],
  ) {}

  /** Command names keyed by group, in registration order. */
  groups(): Map<CommandGroup, string[]> {
    const groups = new Map<CommandGroup, string[]>();
    for (const command of this.commands) {
      const names = groups.get(command.group) ?? [];
      names.push(command.commandName);
      groups.set(command.group, names);
    }
    return groups;
  }

  /** Returns the number of commands registered, 0 when skipped or failed. */
  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  async registerCommands(): Promise<number> {
    for (const [group, names] of this.groups()) {
      this.logger.log(
        `Loaded ${group} commands: ${names.map((n) => `/${n}`).join(', ')}`,
      );
    }

    const token = this.config.get('DISCORD_BOT_TOKEN', { infer: true });
    const clientId = this.clientService.getClientId();
    const guild = this.clientService.getGuild();
    if (!token || !clientId || !guild) {
      this.logger.warn(
        'Bot identity or guild unavailable, skipping slash command registration',
      );
      return 0;
    }

    const body = this.commands.map((command) => command.getDefinition());
    try {
      const rest = new REST({ version: '10' }).setToken(token);
      await rest.put(Routes.applicationGuildCommands(clientId, guild.id), {
        body,
      });
      this.logger.log(
        `Registered ${body.length} slash command(s) for guild ${guild.id}`,
      );
      return body.length;
    } catch (error) {
      this.logger.error('Failed to register slash commands:', error);
      return 0;
    }
  }
}

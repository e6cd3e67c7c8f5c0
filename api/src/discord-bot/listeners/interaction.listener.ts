import { Inject, Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  Events,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  type Interaction,
} from 'discord.js';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS, isMusicButtonId } from '../discord-bot.constants';
import { BOT_COMMANDS, type SlashCommandHandler } from '../commands/slash-command';
import { MusicButtonHandler } from '../music/music-button.handler';

const FAILURE_REPLY = 'Something went wrong. Please try again later.';

/**
 * Routes slash commands to their handler by name and music control
 * buttons to the button handler.
 */
@Injectable()
export class InteractionListener {
  private readonly logger = new Logger(InteractionListener.name);
  private readonly handlers: Map<string, SlashCommandHandler>;
  private listenerAttached = false;

  constructor(
    private readonly clientService: DiscordBotClientService,
    @Inject(BOT_COMMANDS) commands: SlashCommandHandler[],
    private readonly musicButtons: MusicButtonHandler,
  ) {
    this.handlers = new Map(commands.map((c) => [c.commandName, c]));
  }

  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  attachListener(): void {
    const client = this.clientService.getClient();
    if (!client || this.listenerAttached) return;

    client.on(Events.InteractionCreate, (interaction: Interaction) => {
      this.handleInteraction(interaction).catch((err: unknown) => {
        this.logger.error('Unhandled error in interaction handler:', err);
      });
    });

    this.listenerAttached = true;
    this.logger.log('Interaction listener attached');
  }

  /** The client is rebuilt on reconnect, so the listener must be re-attached. */
  @OnEvent(DISCORD_BOT_EVENTS.DISCONNECTED)
  detachListener(): void {
    this.listenerAttached = false;
  }

  async handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      await this.handleCommand(interaction);
    } else if (interaction.isButton() && isMusicButtonId(interaction.customId)) {
      await this.handleButton(interaction);
    }
  }

  private async handleCommand(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const handler = this.handlers.get(interaction.commandName);
    if (!handler) {
      this.logger.warn(`No handler for command: ${interaction.commandName}`);
      return;
    }

    try {
      await handler.handleInteraction(interaction);
    } catch (error) {
      this.logger.error(`Error handling /${interaction.commandName}:`, error);
      await this.replyFailure(interaction);
    }
  }

  private async handleButton(interaction: ButtonInteraction): Promise<void> {
    try {
      await this.musicButtons.handle(interaction);
    } catch (error) {
      this.logger.error(`Error handling button ${interaction.customId}:`, error);
      await this.replyFailure(interaction);
    }
  }

  private async replyFailure(
    interaction: ChatInputCommandInteraction | ButtonInteraction,
  ): Promise<void> {
    try {
      if (interaction.replied || interaction.deferred) {
        await interaction.followUp({ content: FAILURE_REPLY, ephemeral: true });
      } else {
        await interaction.reply({ content: FAILURE_REPLY, ephemeral: true });
      }
    } catch (error) {
      this.logger.warn(
        `Could not report failure to user: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}

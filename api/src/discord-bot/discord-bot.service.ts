import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { BotConnectionState, BotStatusDto } from '@maestros/contract';
import type { AppEnv } from '../config/env.schema';
import { DiscordBotClientService } from './discord-bot-client.service';

@Injectable()
export class DiscordBotService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(DiscordBotService.name);
  private started = false;

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly config: ConfigService<AppEnv, true>,
  ) {}

  /**
   * Connect in the background once the HTTP side is wired, so a slow
   * gateway handshake never blocks the API from serving.
   */
  onApplicationBootstrap(): void {
    const token = this.config.get('DISCORD_BOT_TOKEN', { infer: true });
    if (!token) {
      this.logger.warn('DISCORD_BOT_TOKEN not set, Discord bot disabled');
      return;
    }

    this.started = true;
    this.logger.log('Starting Discord bot...');
    this.clientService.connect(token).catch((error: unknown) => {
      this.started = false;
      this.logger.error(
        'Failed to start Discord bot:',
        error instanceof Error ? error.message : error,
      );
    });
  }

  async onModuleDestroy(): Promise<void> {
    await this.clientService.disconnect();
  }

  getState(): BotConnectionState {
    if (this.clientService.isConnected()) return 'online';
    if (this.started || this.clientService.isConnecting()) return 'starting';
    return 'not_started';
  }

  getStatus(): BotStatusDto {
    return {
      status: this.getState(),
      guilds: this.clientService.getGuildCount(),
      latency: this.clientService.getPing(),
    };
  }
}

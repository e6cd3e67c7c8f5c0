import { Injectable } from '@nestjs/common';
import type { HealthResponseDto } from '@maestros/contract';
import { MongoService } from './mongo/mongo.service';
import { DiscordBotService } from './discord-bot/discord-bot.service';

export const API_VERSION = '1.0.0';

export interface RootStatus {
  message: string;
  version: string;
  status: 'online';
  discord_bot: 'active' | 'starting';
}

@Injectable()
export class AppService {
  constructor(
    private readonly mongo: MongoService,
    private readonly discordBot: DiscordBotService,
  ) {}

  getRoot(): RootStatus {
    return {
      message: 'Maestros Community API + Discord Bot',
      version: API_VERSION,
      status: 'online',
      discord_bot:
        this.discordBot.getState() === 'online' ? 'active' : 'starting',
    };
  }

  /** Degraded when MongoDB does not answer a ping. The bot does not affect it. */
  async getHealth(now: Date = new Date()): Promise<HealthResponseDto> {
    const database = await this.mongo.ping();
    const bot = this.discordBot.getState();

    return {
      status: database.connected ? 'healthy' : 'degraded',
      api: 'online',
      database,
      discord_bot: bot === 'not_started' ? 'offline' : bot,
      timestamp: now.toISOString(),
    };
  }
}

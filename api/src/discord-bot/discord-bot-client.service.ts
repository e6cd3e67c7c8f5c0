import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  ActivityType,
  Client,
  Events,
  GatewayIntentBits,
  type Guild,
} from 'discord.js';
import type { AppEnv } from '../config/env.schema';
import {
  DISCORD_BOT_EVENTS,
  friendlyDiscordErrorMessage,
} from './discord-bot.constants';

const CONNECT_TIMEOUT_MS = 15_000;

/**
 * Owns the single discord.js gateway client for the process.
 */
@Injectable()
export class DiscordBotClientService {
  private readonly logger = new Logger(DiscordBotClientService.name);
  private client: Client | null = null;
  private connecting = false;

  constructor(
    private readonly eventEmitter: EventEmitter2,
    private readonly config: ConfigService<AppEnv, true>,
  ) {}

  async connect(token: string): Promise<void> {
    if (this.client) {
      await this.disconnect();
    }

    const client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMembers,
        GatewayIntentBits.GuildPresences,
        GatewayIntentBits.GuildVoiceStates,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
      ],
      presence: {
        activities: [
          {
            name: this.config.get('BOT_STATUS', { infer: true }),
            type: ActivityType.Watching,
          },
        ],
      },
    });
    this.client = client;
    this.connecting = true;

    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.connecting = false;
        reject(new Error('Discord bot connection timed out after 15s'));
      }, CONNECT_TIMEOUT_MS);

      client.once(Events.ClientReady, (ready) => {
        clearTimeout(timeout);
        this.connecting = false;
        this.logger.log(`Discord bot connected as ${ready.user.tag}`);

        const guild = this.getGuild();
        if (guild) {
          this.logger.log(`Bound to guild ${guild.name} (${guild.id})`);
        } else {
          this.logger.warn('Configured guild not found in the bot guild list');
        }

        // emitAsync so command registration finishes before connect() resolves
        this.eventEmitter
          .emitAsync(DISCORD_BOT_EVENTS.CONNECTED)
          .catch((err: unknown) => {
            this.logger.error(
              'Error in CONNECTED event handlers:',
              err instanceof Error ? err.message : err,
            );
          })
          .finally(() => {
            resolve();
          });
      });

      client.once(Events.Error, (error: Error) => {
        clearTimeout(timeout);
        this.connecting = false;
        const message = friendlyDiscordErrorMessage(error);
        this.logger.error('Discord bot connection error:', message);
        this.eventEmitter.emit(DISCORD_BOT_EVENTS.ERROR, error);
        reject(new Error(message));
      });

      client.login(token).catch((err: unknown) => {
        clearTimeout(timeout);
        this.connecting = false;
        const message = friendlyDiscordErrorMessage(err);
        this.logger.error('Discord bot login failed:', message);
        this.client = null;
        reject(new Error(message));
      });
    });
  }

  async disconnect(): Promise<void> {
    this.connecting = false;

    if (!this.client) return;

    try {
      await this.client.destroy();
      this.logger.log('Discord bot disconnected');
      this.eventEmitter.emit(DISCORD_BOT_EVENTS.DISCONNECTED);
    } catch (error) {
      this.logger.error('Error disconnecting Discord bot:', error);
    } finally {
      this.client = null;
    }
  }

  isConnected(): boolean {
    return this.client?.isReady() ?? false;
  }

  isConnecting(): boolean {
    return this.connecting;
  }

  /** The ready client, or null before the handshake completes. */
  getClient(): Client<true> | null {
    const client = this.client;
    if (client && client.isReady()) return client;
    return null;
  }

  /**
   * The configured guild (DISCORD_GUILD_ID), falling back to the first
   * guild the bot is in when no ID is configured.
   */
  getGuild(): Guild | null {
    const client = this.getClient();
    if (!client) return null;

    const guildId = this.config.get('DISCORD_GUILD_ID', { infer: true });
    if (guildId) {
      return client.guilds.cache.get(guildId) ?? null;
    }
    return client.guilds.cache.first() ?? null;
  }

  getClientId(): string | null {
    return this.getClient()?.user.id ?? null;
  }

  /** Websocket heartbeat latency in ms, or null when offline. */
  getPing(): number | null {
    const client = this.getClient();
    if (!client) return null;
    const ping = client.ws.ping;
    return ping >= 0 ? Math.round(ping) : null;
  }

  getGuildCount(): number {
    return this.getClient()?.guilds.cache.size ?? 0;
  }
}

import {
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  DiscordAPIError,
  RESTJSONErrorCodes,
  type Client,
  type Guild,
  type GuildMember,
  type Message,
  type MessageCreateOptions,
} from 'discord.js';
import { DiscordBotClientService } from './discord-bot-client.service';
import { NOT_CONNECTED_MESSAGE } from './discord-bot.constants';

function isUnknownMemberError(error: unknown): boolean {
  return (
    error instanceof DiscordAPIError &&
    (error.code === RESTJSONErrorCodes.UnknownMember ||
      error.code === RESTJSONErrorCodes.UnknownUser)
  );
}

/**
 * The seam HTTP handlers use to reach the bot. Every accessor fails with
 * 503 until the gateway handshake has finished; nothing is retried.
 */
@Injectable()
export class DiscordBridgeService {
  private readonly logger = new Logger(DiscordBridgeService.name);

  constructor(private readonly clientService: DiscordBotClientService) {}

  isReady(): boolean {
    return this.clientService.isConnected();
  }

  requireClient(): Client<true> {
    const client = this.clientService.getClient();
    if (!client) {
      throw new ServiceUnavailableException(NOT_CONNECTED_MESSAGE);
    }
    return client;
  }

  requireGuild(): Guild {
    this.requireClient();
    const guild = this.clientService.getGuild();
    if (!guild) {
      throw new NotFoundException('Guild not found');
    }
    return guild;
  }

  /** The guild member, or null when the user is not in the guild. */
  async fetchMember(discordId: string): Promise<GuildMember | null> {
    const guild = this.requireGuild();
    try {
      return await guild.members.fetch(discordId);
    } catch (error) {
      if (isUnknownMemberError(error)) return null;
      throw error;
    }
  }

  /** Role IDs held by the member (without @everyone), or null for non-members. */
  async getMemberRoleIds(discordId: string): Promise<string[] | null> {
    const member = await this.fetchMember(discordId);
    if (!member) return null;
    return member.roles.cache
      .filter((role) => role.id !== member.guild.id)
      .map((role) => role.id);
  }

  /**
   * DM a user. Returns false when delivery fails (DMs closed, unknown user)
   * so callers can record the outcome.
   */
  async sendDirectMessage(
    discordId: string,
    payload: string | MessageCreateOptions,
  ): Promise<boolean> {
    const client = this.requireClient();
    try {
      const user = await client.users.fetch(discordId);
      await user.send(payload);
      return true;
    } catch (error) {
      this.logger.warn(
        `Failed to DM ${discordId}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  /** Post to a guild text channel. Null when the channel cannot take messages. */
  async sendToChannel(
    channelId: string,
    payload: string | MessageCreateOptions,
  ): Promise<Message | null> {
    const client = this.requireClient();
    const channel = await client.channels.fetch(channelId);
    if (!channel || !channel.isSendable()) {
      this.logger.warn(`Channel ${channelId} not found or not sendable`);
      return null;
    }
    return channel.send(payload);
  }

  /** Like sendToChannel, but logs and swallows failures for side-channel posts. */
  async postBestEffort(
    channelId: string | null,
    payload: MessageCreateOptions,
  ): Promise<Message | null> {
    if (!channelId || !this.isReady()) return null;
    try {
      return await this.sendToChannel(channelId, payload);
    } catch (error) {
      this.logger.warn(
        `Failed to post to channel ${channelId}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ChannelType,
  DiscordAPIError,
  RESTJSONErrorCodes,
  type TextChannel,
} from 'discord.js';
import {
  DEFAULT_RULE_CATEGORIES,
  type RuleChannelDto,
} from '@maestros/contract';
import type { AppEnv } from '../config/env.schema';
import { DiscordBridgeService } from '../discord-bot/discord-bridge.service';
import {
  buildRuleEmbed,
  channelDisplayName,
  matchRuleChannel,
} from './rule-embed';
import type { RuleDocument } from './rule.types';

export interface PublishedRule {
  channelId: string;
  messageId: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isUnknownMessage(error: unknown): boolean {
  return (
    error instanceof DiscordAPIError &&
    error.code === RESTJSONErrorCodes.UnknownMessage
  );
}

export const DEFAULT_RULE_CHANNELS: RuleChannelDto[] = DEFAULT_RULE_CATEGORIES.map(
  (name) => ({ id: name, name, display_name: channelDisplayName(name) }),
);

/**
 * Mirrors rules into the text channels under the rules category. Every
 * operation is best-effort: failures are logged and the database write
 * that triggered it stands.
 */
@Injectable()
export class RulePublisherService {
  private readonly logger = new Logger(RulePublisherService.name);

  constructor(
    private readonly config: ConfigService<AppEnv, true>,
    private readonly bridge: DiscordBridgeService,
  ) {}

  async listChannels(): Promise<RuleChannelDto[]> {
    try {
      const channels = await this.categoryTextChannels();
      if (!channels) return DEFAULT_RULE_CHANNELS;
      return channels.map((channel) => ({
        id: channel.id,
        name: channel.name,
        display_name: channelDisplayName(channel.name),
      }));
    } catch (error) {
      this.logger.warn(`Failed to list rule channels: ${describe(error)}`);
      return DEFAULT_RULE_CHANNELS;
    }
  }

  /** Edit the existing post when there is one, otherwise post anew. */
  async publish(rule: RuleDocument): Promise<PublishedRule | null> {
    try {
      const channels = await this.categoryTextChannels();
      if (!channels) return null;

      const channel =
        channels.find((c) => c.id === rule.discord_channel_id) ??
        matchRuleChannel(channels, rule.category);
      if (!channel) {
        this.logger.warn('No text channels under the rules category');
        return null;
      }

      const embed = buildRuleEmbed(rule, channel.guild.iconURL());

      if (rule.discord_message_id && rule.discord_channel_id === channel.id) {
        try {
          const message = await channel.messages.fetch(rule.discord_message_id);
          await message.edit({ embeds: [embed] });
          return { channelId: channel.id, messageId: message.id };
        } catch (error) {
          if (!isUnknownMessage(error)) throw error;
          this.logger.warn(`Rule message ${rule.discord_message_id} is gone, posting a new one`);
        }
      }

      const message = await channel.send({ embeds: [embed] });
      this.logger.log(`Posted rule "${rule.title}" to #${channel.name}`);
      return { channelId: channel.id, messageId: message.id };
    } catch (error) {
      this.logger.warn(`Failed to post rule "${rule.title}": ${describe(error)}`);
      return null;
    }
  }

  async unpublish(rule: RuleDocument): Promise<void> {
    if (!rule.discord_message_id || !rule.discord_channel_id) return;
    try {
      const channels = await this.categoryTextChannels();
      const channel = channels?.find((c) => c.id === rule.discord_channel_id);
      if (!channel) return;

      const message = await channel.messages.fetch(rule.discord_message_id);
      await message.delete();
      this.logger.log(`Deleted rule "${rule.title}" from #${channel.name}`);
    } catch (error) {
      this.logger.warn(`Failed to delete rule "${rule.title}": ${describe(error)}`);
    }
  }

  /** Null when the bot is offline or no category is configured. */
  private async categoryTextChannels(): Promise<TextChannel[] | null> {
    const categoryId = this.config.get('RULES_CATEGORY_ID', { infer: true });
    if (!categoryId || !this.bridge.isReady()) return null;

    const category = await this.bridge.requireClient().channels.fetch(categoryId);
    if (!category || category.type !== ChannelType.GuildCategory) {
      this.logger.warn(`Rules category ${categoryId} not found`);
      return [];
    }
    return [...category.children.cache.values()].filter(
      (channel): channel is TextChannel => channel.type === ChannelType.GuildText,
    );
  }
}

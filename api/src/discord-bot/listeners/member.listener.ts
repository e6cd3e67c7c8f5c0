import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import {
  EmbedBuilder,
  Events,
  type GuildMember,
  type PartialGuildMember,
} from 'discord.js';
import { ObjectId, type Db } from 'mongodb';
import type { AppEnv } from '../../config/env.schema';
import { COLLECTIONS, MONGO_DB } from '../../mongo/mongo.constants';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS, EMBED_COLORS } from '../discord-bot.constants';
import type { LogDocument } from '../../admin/log.types';

/**
 * Logs guild joins and leaves to `logs` and greets new members.
 */
@Injectable()
export class MemberListener {
  private readonly logger = new Logger(MemberListener.name);
  private listenerAttached = false;

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly config: ConfigService<AppEnv, true>,
    @Inject(MONGO_DB) private readonly db: Db,
  ) {}

  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  attachListener(): void {
    const client = this.clientService.getClient();
    if (!client || this.listenerAttached) return;

    client.on(Events.GuildMemberAdd, (member: GuildMember) => {
      this.handleJoin(member).catch((err: unknown) => {
        this.logger.error('Error handling member join:', err);
      });
    });
    client.on(
      Events.GuildMemberRemove,
      (member: GuildMember | PartialGuildMember) => {
        this.handleLeave(member).catch((err: unknown) => {
          this.logger.error('Error handling member leave:', err);
        });
      },
    );

    this.listenerAttached = true;
  }

  @OnEvent(DISCORD_BOT_EVENTS.DISCONNECTED)
  detachListener(): void {
    this.listenerAttached = false;
  }

  async handleJoin(member: GuildMember): Promise<void> {
    await this.writeLog('member_join', member);

    const embed = new EmbedBuilder()
      .setTitle('🎮 Welcome to Maestros!')
      .setDescription(
        `Welcome ${member.toString()}! Check out the rules and introduce yourself!`,
      )
      .setColor(EMBED_COLORS.BRAND)
      .setThumbnail(member.displayAvatarURL());

    const channel = await this.resolveWelcomeChannel(member);
    if (!channel) {
      this.logger.debug('No welcome channel configured, skipping greeting');
      return;
    }
    await channel.send({ embeds: [embed] });
  }

  async handleLeave(member: GuildMember | PartialGuildMember): Promise<void> {
    await this.writeLog('member_leave', member);
  }

  private async resolveWelcomeChannel(member: GuildMember) {
    const welcomeId = this.config.get('WELCOME_CHANNEL_ID', { infer: true });
    if (welcomeId) {
      const channel = await member.guild.channels.fetch(welcomeId);
      if (channel?.isSendable()) return channel;
    }
    return member.guild.systemChannel;
  }

  private async writeLog(
    event: 'member_join' | 'member_leave',
    member: GuildMember | PartialGuildMember,
  ): Promise<void> {
    await this.db.collection<LogDocument>(COLLECTIONS.LOGS).insertOne({
      _id: new ObjectId(),
      event,
      level: 'info',
      metadata: {
        user_id: member.id,
        username: member.user.tag,
        guild_id: member.guild.id,
      },
      timestamp: new Date(),
    });
    this.logger.log(`${event}: ${member.user.tag} (${member.id})`);
  }
}

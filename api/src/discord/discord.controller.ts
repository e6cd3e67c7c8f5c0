import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  DiscordMessageSchema,
  InviteRequestSchema,
  type DiscordStatsDto,
  type DiscordStatusDto,
  type GuildChannelDto,
  type GuildMemberEntryDto,
  type GuildMembersResponseDto,
  type GuildSummaryDto,
  type MentionableRoleDto,
  type UserDto,
} from '@maestros/contract';
import { AdminGuard } from '../auth/admin.guard';
import { handleValidationError } from '../common/validation';
import { DiscordStatsService } from '../discord-bot/services/discord-stats.service';
import { GuildDirectoryService } from '../discord-bot/services/guild-directory.service';
import { DiscordService, type SendResult } from './discord.service';

@Controller('discord')
export class DiscordController {
  constructor(
    private readonly discordService: DiscordService,
    private readonly statsService: DiscordStatsService,
    private readonly directory: GuildDirectoryService,
  ) {}

  /** Live presence counts, refreshed by the bot every 10 seconds. */
  @Get('stats')
  stats(): DiscordStatsDto {
    return this.statsService.getStats();
  }

  @Get('status')
  status(): DiscordStatusDto {
    return this.discordService.status();
  }

  @Get('guild/members')
  guildMembers(): Promise<GuildMembersResponseDto> {
    return this.discordService.guildMembers();
  }

  @Get('user/:discordId')
  user(@Param('discordId') discordId: string): Promise<UserDto> {
    return this.discordService.userDetails(discordId);
  }

  @Get('guilds')
  @UseGuards(AuthGuard('jwt'), AdminGuard)
  guilds(): GuildSummaryDto[] {
    return this.directory.listGuilds();
  }

  @Get('guilds/:guildId/channels')
  @UseGuards(AuthGuard('jwt'), AdminGuard)
  channels(@Param('guildId') guildId: string): GuildChannelDto[] {
    return this.directory.listTextChannels(guildId);
  }

  @Get('guilds/:guildId/roles')
  @UseGuards(AuthGuard('jwt'), AdminGuard)
  roles(@Param('guildId') guildId: string): MentionableRoleDto[] {
    return this.directory.listRoles(guildId);
  }

  @Get('guilds/:guildId/members')
  @UseGuards(AuthGuard('jwt'), AdminGuard)
  members(@Param('guildId') guildId: string): GuildMemberEntryDto[] {
    return this.directory.listMembers(guildId);
  }

  @Post('send-announcement')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'), AdminGuard)
  async sendAnnouncement(@Body() body: unknown): Promise<SendResult> {
    try {
      const dto = DiscordMessageSchema.parse(body);
      return await this.discordService.sendAnnouncement(dto);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Post('send-invite-request')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'))
  async sendInviteRequest(@Body() body: unknown): Promise<SendResult> {
    try {
      const dto = InviteRequestSchema.parse(body);
      return await this.discordService.sendInviteRequest(dto);
    } catch (error) {
      handleValidationError(error);
    }
  }
}

import {
  Body,
  Controller,
  Get,
  Param,
  Post,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  AnnouncementLogQuerySchema,
  MemberSearchQuerySchema,
  SendAnnouncementSchema,
  type AnnouncementLogDto,
  type GuildChannelDto,
  type GuildSummaryDto,
  type MemberSearchResultDto,
  type MentionableRoleDto,
  type SendAnnouncementResultDto,
} from '@maestros/contract';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { Roles } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { handleValidationError } from '../common/validation';
import { GuildDirectoryService } from '../discord-bot/services/guild-directory.service';
import {
  AnnouncementsService,
  type AnnouncementLogPage,
} from './announcements.service';

@Controller('announcements')
@UseGuards(AuthGuard('jwt'), RolesGuard)
@Roles('manager', 'ceo')
export class AnnouncementsController {
  constructor(
    private readonly announcements: AnnouncementsService,
    private readonly directory: GuildDirectoryService,
  ) {}

  @Get('guilds')
  guilds(): { guilds: GuildSummaryDto[] } {
    return { guilds: this.directory.listGuilds() };
  }

  @Get('guilds/:guildId/channels')
  channels(@Param('guildId') guildId: string): { channels: GuildChannelDto[] } {
    return { channels: this.directory.listTextChannels(guildId) };
  }

  @Get('guilds/:guildId/roles')
  roles(@Param('guildId') guildId: string): { roles: MentionableRoleDto[] } {
    return { roles: this.directory.listRoles(guildId) };
  }

  @Get('guilds/:guildId/members/search')
  searchMembers(
    @Param('guildId') guildId: string,
    @Query() query: Record<string, string>,
  ): { members: MemberSearchResultDto[] } {
    try {
      const parsed = MemberSearchQuerySchema.parse(query);
      return {
        members: this.directory.searchMembers(guildId, parsed.query, parsed.limit),
      };
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Post('send')
  async send(
    @Req() req: AuthenticatedRequest,
    @Body() body: unknown,
  ): Promise<SendAnnouncementResultDto> {
    try {
      const dto = SendAnnouncementSchema.parse(body);
      return await this.announcements.send(dto, req.user);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('logs')
  async logs(@Query() query: Record<string, string>): Promise<AnnouncementLogPage> {
    try {
      const { page, limit } = AnnouncementLogQuerySchema.parse(query);
      return await this.announcements.listLogs(page, limit);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('logs/:id')
  log(@Param('id') id: string): Promise<AnnouncementLogDto> {
    return this.announcements.findLog(id);
  }
}

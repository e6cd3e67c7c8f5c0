import {
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  Post,
  Put,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  AddXpSchema,
  LeaderboardQuerySchema,
  UpdateUserSchema,
  type LeaderboardEntryDto,
  type UserDto,
} from '@maestros/contract';
import { AdminGuard } from '../auth/admin.guard';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { handleValidationError } from '../common/validation';
import { toUserDto } from './user.types';
import { UsersService, type DashboardDto } from './users.service';

@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get('me')
  @UseGuards(AuthGuard('jwt'))
  me(@Req() req: AuthenticatedRequest): UserDto {
    return toUserDto(req.user);
  }

  @Get('dashboard')
  @UseGuards(AuthGuard('jwt'))
  dashboard(@Req() req: AuthenticatedRequest): Promise<DashboardDto> {
    return this.usersService.dashboard(req.user);
  }

  @Put('update')
  @UseGuards(AuthGuard('jwt'))
  async update(
    @Req() req: AuthenticatedRequest,
    @Body() body: unknown,
  ): Promise<{ message: string; user: UserDto }> {
    try {
      const dto = UpdateUserSchema.parse(body);
      const user = await this.usersService.updateUsername(
        req.user.discord_id,
        dto.username,
      );
      return { message: 'Profile updated', user: toUserDto(user) };
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('leaderboard/xp')
  async leaderboard(
    @Query() query: Record<string, string>,
  ): Promise<{ leaderboard: LeaderboardEntryDto[] }> {
    try {
      const { limit } = LeaderboardQuerySchema.parse(query);
      return { leaderboard: await this.usersService.leaderboard(limit) };
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Post('add-xp')
  @UseGuards(AuthGuard('jwt'), AdminGuard)
  async addXp(
    @Body() body: unknown,
  ): Promise<{ message: string; xp: number; level: number }> {
    try {
      const dto = AddXpSchema.parse(body);
      const result = await this.usersService.awardXp(
        dto.user_id,
        dto.amount,
        dto.reason,
      );
      if (!result) {
        throw new NotFoundException('User not found');
      }
      return { message: `Added ${dto.amount} XP`, ...result };
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get(':userId')
  async getUser(
    @Param('userId') userId: string,
  ): Promise<
    Pick<UserDto, 'id' | 'discord_id' | 'username' | 'avatar' | 'level' | 'xp' | 'badges'>
  > {
    const user = toUserDto(await this.usersService.getByDiscordId(userId));
    return {
      id: user.id,
      discord_id: user.discord_id,
      username: user.username,
      avatar: user.avatar,
      level: user.level,
      xp: user.xp,
      badges: user.badges,
    };
  }
}

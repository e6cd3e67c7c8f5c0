import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Post,
  Put,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { z } from 'zod';
import {
  AdminPageQuerySchema,
  ApplicationStatusSchema,
  AwardBadgeSchema,
  AwardXpSchema,
  ReviewQuerySchema,
  type AdminStatsDto,
} from '@maestros/contract';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { AdminGuard } from '../auth/admin.guard';
import { handleValidationError } from '../common/validation';
import { AdminService } from './admin.service';
import type { LogDto } from './log.types';

const LogsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

@Controller('admin')
@UseGuards(AuthGuard('jwt'), AdminGuard)
export class AdminController {
  constructor(private readonly adminService: AdminService) {}

  @Get('users')
  async users(@Query() query: Record<string, string>) {
    try {
      const { skip, limit } = AdminPageQuerySchema.parse(query);
      return await this.adminService.listUsers(skip, limit);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('applications')
  async applications(@Query() query: Record<string, string>) {
    try {
      const { skip, limit } = AdminPageQuerySchema.parse(query);
      const status = ApplicationStatusSchema.optional().parse(query.status || undefined);
      return await this.adminService.listApplications(status, skip, limit);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Put('applications/:id/review')
  async review(
    @Param('id') id: string,
    @Query() query: Record<string, string>,
    @Req() req: AuthenticatedRequest,
  ) {
    try {
      return await this.adminService.review(id, ReviewQuerySchema.parse(query), req.user);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Post('users/:id/xp')
  async awardXp(
    @Param('id') id: string,
    @Body() body: unknown,
    @Req() req: AuthenticatedRequest,
  ) {
    try {
      const { amount, reason } = AwardXpSchema.parse(body);
      return await this.adminService.awardXp(id, amount, reason, req.user);
    } catch (error) {
      handleValidationError(error);
    }
  }

  /** The badge comes from `?badge=` or the JSON body. */
  @Post('users/:id/badge')
  async awardBadge(
    @Param('id') id: string,
    @Body() body: unknown,
    @Req() req: AuthenticatedRequest,
    @Query('badge') queryBadge?: string,
  ) {
    try {
      const { badge } = AwardBadgeSchema.parse(
        queryBadge ? { badge: queryBadge } : body,
      );
      return await this.adminService.awardBadge(id, badge, req.user);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Delete('users/:id/badge')
  removeBadge(
    @Param('id') id: string,
    @Query('badge') badge?: string,
  ): Promise<{ message: string }> {
    if (!badge) {
      throw new BadRequestException('Badge is required');
    }
    return this.adminService.removeBadge(id, badge);
  }

  @Get('logs')
  async logs(@Query() query: Record<string, string>): Promise<{ logs: LogDto[] }> {
    try {
      const { limit } = LogsQuerySchema.parse(query);
      return { logs: await this.adminService.logs(limit) };
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('stats')
  stats(): Promise<AdminStatsDto> {
    return this.adminService.stats();
  }
}

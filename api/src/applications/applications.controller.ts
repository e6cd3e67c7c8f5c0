import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  AcceptApplicationSchema,
  ApplicationFormSchema,
  ApplicationListQuerySchema,
  ApplicationStatusSchema,
  RejectApplicationSchema,
  type ApplicationStatsDto,
} from '@maestros/contract';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { Roles } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { handleValidationError } from '../common/validation';
import { validateApplication } from './application-scoring';
import type { ApplicationView } from './application.types';
import {
  ApplicationsService,
  type ApplicationPage,
  type ManagerApplicationView,
  type SubmissionResult,
} from './applications.service';

@Controller('applications')
export class ApplicationsController {
  constructor(private readonly applicationsService: ApplicationsService) {}

  /** Dry run: field errors without storing anything. */
  @Post('validate')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'))
  validate(@Body() body: unknown): { valid: boolean; errors: Record<string, string> } {
    try {
      const { valid, errors } = validateApplication(ApplicationFormSchema.parse(body));
      return { valid, errors };
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Post('submit')
  @UseGuards(AuthGuard('jwt'))
  async submit(
    @Req() req: AuthenticatedRequest,
    @Body() body: unknown,
  ): Promise<SubmissionResult> {
    try {
      const form = ApplicationFormSchema.parse(body);
      return await this.applicationsService.submit(req.user, form);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('list')
  @UseGuards(AuthGuard('jwt'))
  async list(
    @Req() req: AuthenticatedRequest,
    @Query('status') status?: string,
  ): Promise<{ applications: ApplicationView[] }> {
    try {
      const parsed = ApplicationStatusSchema.optional().parse(status || undefined);
      return {
        applications: await this.applicationsService.listMine(
          req.user.discord_id,
          parsed,
        ),
      };
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('status/:id')
  @UseGuards(AuthGuard('jwt'))
  async status(
    @Param('id') id: string,
    @Req() req: AuthenticatedRequest,
  ): Promise<{ application: ApplicationView }> {
    return {
      application: await this.applicationsService.getOwn(id, req.user.discord_id),
    };
  }

  @Get('manager/pending')
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  async pending(@Query() query: Record<string, string>): Promise<ApplicationPage> {
    try {
      const dto = ApplicationListQuerySchema.parse({ ...query, status: 'pending' });
      return await this.applicationsService.list(dto);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('manager/all')
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  async all(@Query() query: Record<string, string>): Promise<ApplicationPage> {
    try {
      const dto = ApplicationListQuerySchema.parse(query);
      return await this.applicationsService.list(dto);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('manager/stats')
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  stats(): Promise<ApplicationStatsDto> {
    return this.applicationsService.stats();
  }

  @Get('manager/:id')
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  findOne(@Param('id') id: string): Promise<ManagerApplicationView> {
    return this.applicationsService.getDetail(id);
  }

  @Post('manager/accept/:id')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  async accept(
    @Param('id') id: string,
    @Req() req: AuthenticatedRequest,
    @Body() body: unknown,
  ) {
    try {
      const { notes } = AcceptApplicationSchema.parse(body ?? {});
      return await this.applicationsService.approve(id, req.user, notes);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Post('manager/reject/:id')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  reject(
    @Param('id') id: string,
    @Req() req: AuthenticatedRequest,
    @Body() body: unknown,
  ) {
    const parsed = RejectApplicationSchema.safeParse(body ?? {});
    if (!parsed.success) {
      throw new BadRequestException(
        'Rejection reason must be at least 10 characters',
      );
    }
    return this.applicationsService.reject(id, req.user, parsed.data.reason);
  }

  @Delete('manager/:id')
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  remove(
    @Param('id') id: string,
    @Req() req: AuthenticatedRequest,
  ): Promise<{ message: string }> {
    return this.applicationsService.remove(id, req.user);
  }
}

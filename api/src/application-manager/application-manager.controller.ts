import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  AcceptApplicationSchema,
  ApplicationFormSchema,
  RejectApplicationSchema,
  type EligibilityDto,
} from '@maestros/contract';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { Roles } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { handleValidationError } from '../common/validation';
import {
  ApplicationManagerService,
  type DecisionResult,
  type DiscordSubmissionResult,
} from './application-manager.service';

@Controller('application-manager')
export class ApplicationManagerController {
  constructor(private readonly manager: ApplicationManagerService) {}

  @Post('check-eligibility')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'))
  checkEligibility(@Req() req: AuthenticatedRequest): Promise<EligibilityDto> {
    return this.manager.checkEligibility(req.user.discord_id);
  }

  @Post('ceo/grant-reapply/:userId')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  grantReapply(@Param('userId') userId: string, @Req() req: AuthenticatedRequest) {
    return this.manager.grantReapply(req.user, userId);
  }

  @Post('submit-with-discord')
  @UseGuards(AuthGuard('jwt'))
  async submit(
    @Req() req: AuthenticatedRequest,
    @Body() body: unknown,
  ): Promise<DiscordSubmissionResult> {
    try {
      const form = ApplicationFormSchema.parse(body);
      return await this.manager.submitWithDiscord(req.user, form);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Post('manager/accept/:id')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  async accept(
    @Param('id') id: string,
    @Req() req: AuthenticatedRequest,
    @Body() body: unknown,
  ): Promise<DecisionResult> {
    try {
      const { notes } = AcceptApplicationSchema.parse(body ?? {});
      return await this.manager.accept(id, req.user, notes);
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
  ): Promise<DecisionResult> {
    const parsed = RejectApplicationSchema.safeParse(body ?? {});
    if (!parsed.success) {
      throw new BadRequestException(
        'Rejection reason must be at least 10 characters',
      );
    }
    return this.manager.reject(id, req.user, parsed.data.reason);
  }
}

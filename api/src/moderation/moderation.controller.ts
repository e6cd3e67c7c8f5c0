import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  AnalyzeContentSchema,
  ApplicationReviewInputSchema,
  CreateWarningSchema,
  type ApplicationReviewDto,
  type ContentAnalysisDto,
  type WarningDto,
} from '@maestros/contract';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { Roles } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { handleValidationError } from '../common/validation';
import { analyzeContent, reviewApplicationAnswers } from './content-analysis';
import { ModerationService } from './moderation.service';

const WarningInputSchema = CreateWarningSchema.omit({ user_id: true });

@Controller('moderation')
@UseGuards(AuthGuard('jwt'), RolesGuard)
@Roles('manager', 'ceo')
export class ModerationController {
  constructor(private readonly moderationService: ModerationService) {}

  @Post('analyze')
  @HttpCode(HttpStatus.OK)
  analyze(@Body() body: unknown): ContentAnalysisDto {
    try {
      return analyzeContent(AnalyzeContentSchema.parse(body).content);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Post('warnings/:userId')
  async warn(
    @Param('userId') userId: string,
    @Req() req: AuthenticatedRequest,
    @Body() body: unknown,
  ) {
    try {
      const warning = WarningInputSchema.parse(body ?? {});
      return await this.moderationService.issueWarning(
        { ...warning, user_id: userId },
        req.user,
      );
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('warnings/:userId')
  async warnings(@Param('userId') userId: string): Promise<{ warnings: WarningDto[] }> {
    return { warnings: await this.moderationService.listWarnings(userId) };
  }

  @Post('analyze-application')
  @HttpCode(HttpStatus.OK)
  analyzeApplication(@Body() body: unknown): ApplicationReviewDto {
    try {
      return reviewApplicationAnswers(ApplicationReviewInputSchema.parse(body));
    } catch (error) {
      handleValidationError(error);
    }
  }
}

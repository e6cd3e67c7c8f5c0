import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Query,
  Req,
  Res,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import type { Response } from 'express';
import {
  ExchangeCodeSchema,
  type CurrentUserDto,
  type PermissionsDto,
  type TokenResponseDto,
} from '@maestros/contract';
import { RateLimit } from '../throttler/rate-limit.decorator';
import { handleValidationError } from '../common/validation';
import { toUserDto } from '../users/user.types';
import { AuthService } from './auth.service';
import type { AuthenticatedRequest } from './auth.types';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @RateLimit('auth')
  @Get('login')
  login(@Res() res: Response): void {
    res.redirect(this.authService.authorizeUrl());
  }

  /**
   * Discord redirects here. The JWT never appears in the URL: the frontend
   * gets a 30s one-time code to trade at POST /auth/exchange-code.
   */
  @RateLimit('auth')
  @Get('callback')
  async callback(
    @Query('code') code: string | undefined,
    @Res() res: Response,
  ): Promise<void> {
    res.redirect(await this.authService.completeLogin(code ?? ''));
  }

  @RateLimit('auth')
  @Post('exchange-code')
  @HttpCode(HttpStatus.OK)
  async exchangeCode(@Body() body: unknown): Promise<TokenResponseDto> {
    try {
      const { code } = ExchangeCodeSchema.parse(body);
      return await this.authService.redeemOneTimeCode(code);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('me')
  @UseGuards(AuthGuard('jwt'))
  me(@Req() req: AuthenticatedRequest): CurrentUserDto {
    const user = toUserDto(req.user);
    return {
      ...user,
      permissions: this.authService.permissionsFor(
        user.discord_id,
        user.guild_roles,
      ),
    };
  }

  @Post('sync-roles')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'))
  syncRoles(@Req() req: AuthenticatedRequest): Promise<{
    message: string;
    guild_roles: string[];
    permissions: PermissionsDto;
  }> {
    return this.authService.syncRoles(req.user);
  }

  /** Tokens are stateless; the client drops its copy. */
  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'))
  logout(): { message: string } {
    return { message: 'Logged out successfully' };
  }

  @RateLimit('auth')
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'))
  refresh(@Req() req: AuthenticatedRequest): TokenResponseDto {
    return this.authService.issueToken(req.user.discord_id);
  }
}

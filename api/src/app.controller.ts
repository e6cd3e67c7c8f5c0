import { Controller, Get, HttpCode, Post, Res, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { SkipThrottle } from '@nestjs/throttler';
import type { Response } from 'express';
import type { BotStatusDto, CacheStatusDto } from '@maestros/contract';
import { AppService, type RootStatus } from './app.service';
import { AdminGuard } from './auth/admin.guard';
import { CacheService } from './cache/cache.service';
import { DiscordBotService } from './discord-bot/discord-bot.service';

@Controller()
export class AppController {
  constructor(
    private readonly appService: AppService,
    private readonly discordBot: DiscordBotService,
    private readonly cache: CacheService,
  ) {}

  @Get()
  getRoot(): RootStatus {
    return this.appService.getRoot();
  }

  @SkipThrottle()
  @Get('health')
  async getHealth(@Res() res: Response): Promise<void> {
    const health = await this.appService.getHealth();
    res.status(health.status === 'healthy' ? 200 : 503).json(health);
  }

  @Get('bot/status')
  getBotStatus(): BotStatusDto {
    return this.discordBot.getStatus();
  }

  @Get('cache/status')
  getCacheStatus(): Promise<CacheStatusDto> {
    return this.cache.getStatus();
  }

  @Post('cache/clear')
  @HttpCode(200)
  @UseGuards(AuthGuard('jwt'), AdminGuard)
  async clearCache(): Promise<{ message: string; removed: number }> {
    const removed = await this.cache.clearAll();
    return { message: 'All caches cleared successfully', removed };
  }
}

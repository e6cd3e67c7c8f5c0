import { Module } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { AppConfigModule } from './config/app-config.module';
import { MongoModule } from './mongo/mongo.module';
import { RedisModule } from './redis/redis.module';
import { CacheModule } from './cache/cache.module';
import { RateLimitModule } from './throttler/throttler.module';
import { DiscordBotModule } from './discord-bot/discord-bot.module';
import { UsersModule } from './users/users.module';
import { AuthModule } from './auth/auth.module';
import { AdminModule } from './admin/admin.module';
import { ApplicationsModule } from './applications/applications.module';
import { ApplicationManagerModule } from './application-manager/application-manager.module';
import { EventsModule } from './events/events.module';
import { GamesModule } from './games/games.module';
import { RulesModule } from './rules/rules.module';
import { ModerationModule } from './moderation/moderation.module';
import { AnnouncementsModule } from './announcements/announcements.module';
import { DiscordModule } from './discord/discord.module';
import { MusicModule } from './music/music.module';

@Module({
  imports: [
    AppConfigModule,
    EventEmitterModule.forRoot(),
    ScheduleModule.forRoot(),
    RateLimitModule,
    MongoModule,
    RedisModule,
    CacheModule,
    DiscordBotModule,
    UsersModule,
    AuthModule,
    AdminModule,
    ApplicationsModule,
    ApplicationManagerModule,
    EventsModule,
    GamesModule,
    RulesModule,
    ModerationModule,
    AnnouncementsModule,
    DiscordModule,
    MusicModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}

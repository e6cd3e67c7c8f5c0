import { Global, Module } from '@nestjs/common';
import { EventsModule } from '../events/events.module';
import { MusicModule } from '../music/music.module';
import { DiscordBotService } from './discord-bot.service';
import { DiscordBotClientService } from './discord-bot-client.service';
import { DiscordBridgeService } from './discord-bridge.service';
import { DiscordStatsService } from './services/discord-stats.service';
import { GuildDirectoryService } from './services/guild-directory.service';
import { MemberListener } from './listeners/member.listener';
import { InteractionListener } from './listeners/interaction.listener';
import { BotTasksService } from './tasks/bot-tasks.service';
import { MusicQueueService } from './music/music-queue.service';
import { MusicPlayerService } from './music/music-player.service';
import { NowPlayingMessageService } from './music/now-playing-message.service';
import { MusicButtonHandler } from './music/music-button.handler';
import { RegisterCommandsService } from './commands/register-commands';
import { BOT_COMMANDS, type SlashCommandHandler } from './commands/slash-command';
import { PingCommand } from './commands/ping.command';
import { StatsCommand } from './commands/stats.command';
import { HelpCommand } from './commands/help.command';
import { ApplyCommand } from './commands/apply.command';
import { EventsCommand } from './commands/events.command';
import { AnnounceCommand } from './commands/announce.command';
import { PlayCommand } from './commands/play.command';
import { AlbumCommand, PlaylistCommand } from './commands/collection-play.command';
import { SkipCommand } from './commands/skip.command';
import { QueueCommand } from './commands/queue.command';
import { StopCommand } from './commands/stop.command';
import { LeaveCommand } from './commands/leave.command';

/** Registration order: general commands, then music. */
const COMMANDS = [
  PingCommand,
  StatsCommand,
  HelpCommand,
  ApplyCommand,
  EventsCommand,
  AnnounceCommand,
  PlayCommand,
  PlaylistCommand,
  AlbumCommand,
  SkipCommand,
  QueueCommand,
  StopCommand,
  LeaveCommand,
];

/**
 * The bot runs inside the API process. Global so HTTP modules can reach
 * the bridge and guild directory without importing this module.
 */
@Global()
@Module({
  imports: [EventsModule, MusicModule],
  providers: [
    DiscordBotService,
    DiscordBotClientService,
    DiscordBridgeService,
    DiscordStatsService,
    GuildDirectoryService,
    MemberListener,
    InteractionListener,
    BotTasksService,
    MusicQueueService,
    MusicPlayerService,
    NowPlayingMessageService,
    MusicButtonHandler,
    RegisterCommandsService,
    ...COMMANDS,
    {
      provide: BOT_COMMANDS,
      useFactory: (...commands: SlashCommandHandler[]) => commands,
      inject: COMMANDS,
    },
  ],
  exports: [
    DiscordBotService,
    DiscordBotClientService,
    DiscordBridgeService,
    DiscordStatsService,
    GuildDirectoryService,
  ],
})
export class DiscordBotModule {}

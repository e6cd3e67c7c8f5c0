import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  AudioPlayerStatus,
  NoSubscriberBehavior,
  VoiceConnectionStatus,
  createAudioPlayer,
  createAudioResource,
  entersState,
  joinVoiceChannel,
  type AudioPlayer,
  type VoiceConnection,
} from '@discordjs/voice';
import type { VoiceBasedChannel } from 'discord.js';
import { MUSIC_EVENTS } from '../discord-bot.constants';
import { MusicQueueService, type QueuedTrack } from './music-queue.service';

const READY_TIMEOUT_MS = 20_000;

export interface TrackStartedEvent {
  guildId: string;
  track: QueuedTrack;
  channelName: string;
}

interface VoiceSession {
  connection: VoiceConnection;
  player: AudioPlayer;
  channelName: string;
}

/**
 * Voice playback per guild. Streams each track's media URL through
 * ffmpeg and advances the queue whenever the player goes idle.
 */
@Injectable()
export class MusicPlayerService implements OnModuleDestroy {
  private readonly logger = new Logger(MusicPlayerService.name);
  private readonly sessions = new Map<string, VoiceSession>();

  constructor(
    private readonly queue: MusicQueueService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  onModuleDestroy(): void {
    for (const guildId of [...this.sessions.keys()]) {
      this.leave(guildId);
    }
  }

  /** Joins (or moves to) the channel and waits for the voice link. */
  async join(channel: VoiceBasedChannel): Promise<void> {
    const guildId = channel.guild.id;
    const existing = this.sessions.get(guildId);
    if (existing && existing.connection.joinConfig.channelId === channel.id) {
      return;
    }

    const connection = joinVoiceChannel({
      channelId: channel.id,
      guildId,
      adapterCreator: channel.guild.voiceAdapterCreator,
      selfDeaf: true,
    });

    // joinVoiceChannel hands back the guild's live connection on a move.
    const moved = connection === existing?.connection;

    try {
      await entersState(connection, VoiceConnectionStatus.Ready, READY_TIMEOUT_MS);
    } catch (error) {
      if (moved) {
        this.leave(guildId);
      } else {
        connection.destroy();
      }
      throw error;
    }

    const player = existing?.player ?? this.createPlayer(guildId);
    connection.subscribe(player);
    this.sessions.set(guildId, { connection, player, channelName: channel.name });
    if (moved) return;

    connection.on(VoiceConnectionStatus.Disconnected, () => {
      Promise.race([
        entersState(connection, VoiceConnectionStatus.Signalling, 5_000),
        entersState(connection, VoiceConnectionStatus.Connecting, 5_000),
      ]).catch(() => {
        this.logger.warn(`Voice connection lost in guild ${guildId}`);
        this.leave(guildId);
      });
    });
  }

  getChannelName(guildId: string): string | null {
    return this.sessions.get(guildId)?.channelName ?? null;
  }

  isConnected(guildId: string): boolean {
    return this.sessions.has(guildId);
  }

  /** True while a track is loaded, paused or not. */
  isPlaying(guildId: string): boolean {
    const status = this.sessions.get(guildId)?.player.state.status;
    return status !== undefined && status !== AudioPlayerStatus.Idle;
  }

  isPaused(guildId: string): boolean {
    const status = this.sessions.get(guildId)?.player.state.status;
    return (
      status === AudioPlayerStatus.Paused ||
      status === AudioPlayerStatus.AutoPaused
    );
  }

  /** Starts the next queued track unless something is already playing. */
  startIfIdle(guildId: string): QueuedTrack | null {
    if (this.isPlaying(guildId)) return null;
    return this.playNext(guildId);
  }

  /** Ends the current track; the idle handler starts the next one. */
  skip(guildId: string): boolean {
    const session = this.sessions.get(guildId);
    if (!session || !this.isPlaying(guildId)) return false;
    return session.player.stop(true);
  }

  pause(guildId: string): boolean {
    return this.sessions.get(guildId)?.player.pause() ?? false;
  }

  resume(guildId: string): boolean {
    return this.sessions.get(guildId)?.player.unpause() ?? false;
  }

  previous(guildId: string): QueuedTrack | null {
    const session = this.sessions.get(guildId);
    if (!session) return null;
    const track = this.queue.previous(guildId);
    if (!track) return null;
    if (this.play(session, guildId, track)) return track;
    this.queue.discardCurrent(guildId);
    return null;
  }

  /** Clears the queue and halts playback. False when nothing was playing. */
  stop(guildId: string): boolean {
    const session = this.sessions.get(guildId);
    if (!session || !this.isPlaying(guildId)) return false;
    this.queue.reset(guildId);
    session.player.stop(true);
    return true;
  }

  leave(guildId: string): boolean {
    const session = this.sessions.get(guildId);
    if (!session) return false;

    this.sessions.delete(guildId);
    this.queue.delete(guildId);
    session.player.stop(true);
    if (session.connection.state.status !== VoiceConnectionStatus.Destroyed) {
      session.connection.destroy();
    }
    return true;
  }

  private createPlayer(guildId: string): AudioPlayer {
    const player = createAudioPlayer({
      behaviors: { noSubscriber: NoSubscriberBehavior.Pause },
    });

    player.on(AudioPlayerStatus.Idle, () => {
      this.playNext(guildId);
    });
    player.on('error', (error) => {
      this.logger.error(
        `Playback error in guild ${guildId}: ${error.message}`,
      );
    });

    return player;
  }

  /**
   * Advances until a track starts. Tracks that fail to start are dropped,
   * so loop mode cannot bring them straight back.
   */
  private playNext(guildId: string): QueuedTrack | null {
    const session = this.sessions.get(guildId);
    if (!session) return null;

    for (
      let track = this.queue.advance(guildId);
      track;
      track = this.queue.advance(guildId)
    ) {
      if (this.play(session, guildId, track)) return track;
      this.queue.discardCurrent(guildId);
    }
    this.logger.debug(`Queue empty for guild ${guildId}`);
    return null;
  }

  private play(session: VoiceSession, guildId: string, track: QueuedTrack): boolean {
    try {
      session.player.play(createAudioResource(track.media_url));
    } catch (error) {
      this.logger.error(
        `Failed to play ${track.song}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }

    this.logger.log(`Now playing in ${guildId}: ${track.song}`);
    const event: TrackStartedEvent = {
      guildId,
      track,
      channelName: session.channelName,
    };
    this.eventEmitter.emit(MUSIC_EVENTS.TRACK_STARTED, event);
    return true;
  }
}

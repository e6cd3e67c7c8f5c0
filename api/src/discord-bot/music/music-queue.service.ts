import { Injectable } from '@nestjs/common';
import type { SongSummaryDto } from '@maestros/contract';

export const HISTORY_LIMIT = 10;

export interface QueuedTrack extends SongSummaryDto {
  /** Mention of the member who queued it */
  requestedBy: string;
}

export interface GuildMusicState {
  queue: QueuedTrack[];
  nowPlaying: QueuedTrack | null;
  history: QueuedTrack[];
  loop: boolean;
}

/**
 * Per-guild queues, held in bot memory only. Lost on restart.
 */
@Injectable()
export class MusicQueueService {
  private readonly states = new Map<string, GuildMusicState>();

  get(guildId: string): GuildMusicState {
    let state = this.states.get(guildId);
    if (!state) {
      state = { queue: [], nowPlaying: null, history: [], loop: false };
      this.states.set(guildId, state);
    }
    return state;
  }

  /** Appends tracks and returns the new queue length. */
  enqueue(guildId: string, ...tracks: QueuedTrack[]): number {
    const state = this.get(guildId);
    state.queue.push(...tracks);
    return state.queue.length;
  }

  /**
   * Retires the current track and promotes the head of the queue.
   * The retired track goes to history; with loop on it is also re-queued
   * at the tail.
   */
  advance(guildId: string): QueuedTrack | null {
    const state = this.get(guildId);
    const finished = state.nowPlaying;

    if (finished) {
      state.history.push(finished);
      if (state.history.length > HISTORY_LIMIT) {
        state.history.shift();
      }
      if (state.loop) {
        state.queue.push(finished);
      }
    }

    state.nowPlaying = state.queue.shift() ?? null;
    return state.nowPlaying;
  }

  /** Drops the current track without recording or re-queueing it. */
  discardCurrent(guildId: string): void {
    this.get(guildId).nowPlaying = null;
  }

  /**
   * Steps back one track. The interrupted track returns to the front of
   * the queue. Null when history is empty.
   */
  previous(guildId: string): QueuedTrack | null {
    const state = this.get(guildId);
    const prev = state.history.pop();
    if (!prev) return null;

    if (state.nowPlaying) {
      state.queue.unshift(state.nowPlaying);
    }
    state.nowPlaying = prev;
    return prev;
  }

  /** Fisher-Yates over the pending queue. Returns its length. */
  shuffle(guildId: string, random: () => number = Math.random): number {
    const { queue } = this.get(guildId);
    for (let i = queue.length - 1; i > 0; i--) {
      const j = Math.floor(random() * (i + 1));
      [queue[i], queue[j]] = [queue[j], queue[i]];
    }
    return queue.length;
  }

  toggleLoop(guildId: string): boolean {
    const state = this.get(guildId);
    state.loop = !state.loop;
    return state.loop;
  }

  /** Drops queue, history and the current track. */
  reset(guildId: string): void {
    const state = this.get(guildId);
    state.queue = [];
    state.history = [];
    state.nowPlaying = null;
  }

  delete(guildId: string): void {
    this.states.delete(guildId);
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import type { AppEnv } from '../config/env.schema';
import {
  AutocompleteSchema,
  LyricsResponseSchema,
  RawAlbumSchema,
  RawPlaylistSchema,
  RawSongSchema,
  type AutocompleteResult,
  type RawAlbum,
  type RawPlaylist,
  type RawSong,
} from './jiosaavn.types';
import { repairSaavnJson } from './saavn-formatter';

/** Thrown when JioSaavn answers with a non-2xx status or unreadable JSON. */
export class JioSaavnError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JioSaavnError';
  }
}

const SongDetailsSchema = z.record(z.unknown());

/**
 * Thin HTTP client over the public JioSaavn `api.php` endpoints.
 * Returns raw, unformatted records.
 */
@Injectable()
export class JioSaavnClient {
  private readonly logger = new Logger(JioSaavnClient.name);
  private readonly baseUrl: string;

  constructor(config: ConfigService<AppEnv, true>) {
    this.baseUrl = config.get('JIOSAAVN_API_URL', { infer: true });
  }

  async search(query: string): Promise<AutocompleteResult> {
    const body = await this.call({
      __call: 'autocomplete.get',
      _format: 'json',
      _marker: '0',
      cc: 'in',
      includeMetaTags: '1',
      query,
    });
    return AutocompleteSchema.parse(body);
  }

  /** Null when the id is unknown. */
  async getSong(songId: string): Promise<RawSong | null> {
    const body = await this.call({
      __call: 'song.getDetails',
      cc: 'in',
      _marker: '0',
      _format: 'json',
      pids: songId,
    });
    const record = SongDetailsSchema.safeParse(body);
    if (!record.success) return null;
    const song = RawSongSchema.safeParse(record.data[songId]);
    return song.success ? song.data : null;
  }

  async getAlbum(albumId: string): Promise<RawAlbum> {
    const body = await this.call({
      __call: 'content.getAlbumDetails',
      _format: 'json',
      cc: 'in',
      _marker: '0',
      albumid: albumId,
    });
    return RawAlbumSchema.parse(body);
  }

  async getPlaylist(listId: string): Promise<RawPlaylist> {
    const body = await this.call({
      __call: 'playlist.getDetails',
      _format: 'json',
      cc: 'in',
      _marker: '0',
      listid: listId,
    });
    return RawPlaylistSchema.parse(body);
  }

  async getLyrics(songId: string): Promise<string> {
    const body = await this.call({
      __call: 'lyrics.getLyrics',
      ctx: 'web6dot0',
      api_version: '4',
      _format: 'json',
      _marker: '0',
      lyrics_id: songId,
    });
    return LyricsResponseSchema.parse(body).lyrics;
  }

  /** Fetch a jiosaavn.com page so ids can be scraped from its markup. */
  async fetchPage(url: string): Promise<string> {
    const response = await fetch(url);
    if (!response.ok) {
      throw new JioSaavnError(
        `JioSaavn page ${url} returned ${response.status}`,
      );
    }
    return response.text();
  }

  private async call(params: Record<string, string>): Promise<unknown> {
    const url = `${this.baseUrl}?${new URLSearchParams(params).toString()}`;
    const response = await fetch(url);

    if (!response.ok) {
      this.logger.error(
        `JioSaavn ${params.__call} failed: ${response.status} ${response.statusText}`,
      );
      throw new JioSaavnError(
        `JioSaavn API error ${response.status}: ${response.statusText}`,
      );
    }

    const text = await response.text();
    try {
      const parsed: unknown = JSON.parse(repairSaavnJson(text));
      return parsed;
    } catch (error) {
      this.logger.warn(
        `JioSaavn ${params.__call} returned unreadable JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new JioSaavnError('JioSaavn returned an unreadable response');
    }
  }
}

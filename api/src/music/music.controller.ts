import { Controller, Get, Query } from '@nestjs/common';
import {
  MusicQuerySchema,
  SongIdQuerySchema,
  type SongListDto,
  type SongSummaryDto,
} from '@maestros/contract';
import { z } from 'zod';
import { handleValidationError } from '../common/validation';
import { RateLimit } from '../throttler/rate-limit.decorator';
import type { FormattedSong } from './jiosaavn.types';
import { MusicService, type MusicResult } from './music.service';

const LookupQuerySchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
});

/**
 * Public JioSaavn adapter. Trailing slashes are accepted on every route.
 */
@Controller('music')
@RateLimit('music')
export class MusicController {
  constructor(private readonly musicService: MusicService) {}

  @Get()
  home() {
    return {
      status: true,
      message: 'Maestros Community JioSaavn Music API',
      endpoints: {
        '/music/song/?query=': 'Search for a song',
        '/music/song/get/?id=': 'Get song details by ID',
        '/music/playlist/?query=': 'Search for a playlist',
        '/music/album/?query=': 'Search for an album',
        '/music/lyrics/?query=': 'Get lyrics by song link or ID',
        '/music/result/?query=':
          'Get result by song/album/playlist link or search term',
      },
    };
  }

  @Get('song')
  async searchSong(
    @Query() query: Record<string, string>,
  ): Promise<SongSummaryDto> {
    try {
      const dto = MusicQuerySchema.parse(query);
      return await this.musicService.findSongSummary(
        dto.query,
        dto.lyrics,
        dto.songdata,
      );
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('song/get')
  async getSong(@Query() query: Record<string, string>): Promise<FormattedSong> {
    try {
      const dto = SongIdQuerySchema.parse(query);
      return await this.musicService.getSongOrThrow(dto.id, dto.lyrics);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('playlist')
  async playlist(@Query() query: Record<string, string>): Promise<SongListDto> {
    try {
      const dto = LookupQuerySchema.parse(query);
      return await this.musicService.playlistSongs(dto.query);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('album')
  async album(@Query() query: Record<string, string>): Promise<SongListDto> {
    try {
      const dto = LookupQuerySchema.parse(query);
      return await this.musicService.albumSongs(dto.query);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('lyrics')
  async lyrics(
    @Query() query: Record<string, string>,
  ): Promise<{ status: true; lyrics: string }> {
    try {
      const dto = LookupQuerySchema.parse(query);
      return {
        status: true,
        lyrics: await this.musicService.getLyrics(dto.query),
      };
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('result')
  async result(
    @Query() query: Record<string, string>,
  ): Promise<MusicResult | null> {
    try {
      const dto = MusicQuerySchema.parse(query);
      return await this.musicService.getResult(dto.query, dto.lyrics);
    } catch (error) {
      handleValidationError(error);
    }
  }
}

import {
  BadRequestException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import type { SongListDto, SongSummaryDto } from '@maestros/contract';
import { JioSaavnClient } from './jiosaavn.client';
import type {
  FormattedAlbum,
  FormattedPlaylist,
  FormattedSong,
} from './jiosaavn.types';
import {
  extractAlbumId,
  extractPlaylistId,
  extractSongId,
  formatAlbum,
  formatPlaylist,
  formatSong,
  isSaavnUrl,
  saavnPageUrl,
  toSongSummary,
} from './saavn-formatter';

export type MusicResult =
  | FormattedSong
  | FormattedSong[]
  | FormattedAlbum
  | FormattedPlaylist;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class MusicService {
  private readonly logger = new Logger(MusicService.name);

  constructor(private readonly saavn: JioSaavnClient) {}

  /** Formatted song by id, or null when JioSaavn does not know it. */
  async getSong(songId: string, lyrics = false): Promise<FormattedSong | null> {
    try {
      const raw = await this.saavn.getSong(songId);
      if (!raw) return null;
      const song = formatSong(raw);
      if (lyrics) {
        song.lyrics =
          raw.has_lyrics === 'true' ? await this.saavn.getLyrics(raw.id) : null;
      }
      return song;
    } catch (error) {
      this.logger.warn(`Failed to load song ${songId}: ${describe(error)}`);
      return null;
    }
  }

  /**
   * Songs for a search term, or the single song behind a saavn link.
   * Ids that fail to resolve are dropped.
   */
  async searchSongs(query: string, lyrics = false): Promise<FormattedSong[]> {
    if (isSaavnUrl(query)) {
      const songId = extractSongId(await this.fetchSaavnPage(query));
      const song = songId ? await this.getSong(songId, lyrics) : null;
      return song ? [song] : [];
    }

    const result = await this.saavn.search(query);
    const ids = result.songs?.data.map((entry) => entry.id) ?? [];
    const songs = await Promise.all(ids.map((id) => this.getSong(id, lyrics)));
    return songs.filter((song): song is FormattedSong => song !== null);
  }

  /** Summary of the best match. `songdata=false` skips the detail lookups. */
  async findSongSummary(
    query: string,
    lyrics: boolean,
    songdata: boolean,
  ): Promise<SongSummaryDto> {
    if (!songdata && !isSaavnUrl(query)) {
      const result = await this.saavn.search(query);
      const first = result.songs?.data[0];
      if (first) {
        const text = (key: string): string => {
          const value = first[key];
          return typeof value === 'string' ? value : '';
        };
        return {
          song: text('title'),
          album: text('album'),
          image: text('image'),
          media_url: '',
          duration: 0,
          music: text('music'),
          singers: text('primary_artists') || text('singers'),
          year: text('year'),
        };
      }
      throw new NotFoundException('Song not found');
    }

    const [first] = await this.searchSongs(query, lyrics);
    if (!first) {
      throw new NotFoundException('Song not found');
    }
    return toSongSummary(first);
  }

  async getSongOrThrow(songId: string, lyrics: boolean): Promise<FormattedSong> {
    const song = await this.getSong(songId, lyrics);
    if (!song) {
      throw new NotFoundException('Invalid Song ID received!');
    }
    return song;
  }

  async getPlaylist(query: string): Promise<FormattedPlaylist> {
    const listId = isSaavnUrl(query)
      ? extractPlaylistId(await this.fetchSaavnPage(query))
      : await this.firstSearchId(query, 'playlists');
    if (!listId) {
      throw new NotFoundException('No playlist found for the given query!');
    }

    try {
      return formatPlaylist(await this.saavn.getPlaylist(listId));
    } catch (error) {
      this.logger.error(`Error fetching playlist ${listId}: ${describe(error)}`);
      throw new InternalServerErrorException('Failed to fetch playlist data!');
    }
  }

  async getAlbum(query: string): Promise<FormattedAlbum> {
    const albumId = isSaavnUrl(query)
      ? extractAlbumId(await this.fetchSaavnPage(query))
      : await this.firstSearchId(query, 'albums');
    if (!albumId) {
      throw new NotFoundException('No album found for the given query!');
    }

    try {
      return formatAlbum(await this.saavn.getAlbum(albumId));
    } catch (error) {
      this.logger.error(`Error fetching album ${albumId}: ${describe(error)}`);
      throw new InternalServerErrorException('Failed to fetch album data!');
    }
  }

  async playlistSongs(query: string): Promise<SongListDto> {
    return this.toSongList((await this.getPlaylist(query)).songs);
  }

  async albumSongs(query: string): Promise<SongListDto> {
    return this.toSongList((await this.getAlbum(query)).songs);
  }

  /** Lyrics by song id or saavn song link. */
  async getLyrics(query: string): Promise<string> {
    const link = isSaavnUrl(query) ? this.requireSaavnLink(query) : null;
    try {
      const songId = link
        ? extractSongId(await this.saavn.fetchPage(link.href))
        : query;
      if (!songId) {
        throw new Error('Could not find a song id in the given link');
      }
      return await this.saavn.getLyrics(songId);
    } catch (error) {
      throw new InternalServerErrorException(describe(error));
    }
  }

  /**
   * Search term gives songs; a saavn link dispatches on its path to a song,
   * album or playlist.
   */
  async getResult(query: string, lyrics: boolean): Promise<MusicResult | null> {
    if (!query.includes('saavn')) {
      return this.searchSongs(query, lyrics);
    }

    const link = this.requireSaavnLink(query);
    const isSong = link.pathname.includes('/song/');
    const isAlbum = link.pathname.includes('/album/');
    const isPlaylist =
      link.pathname.includes('/playlist/') ||
      link.pathname.includes('/featured/');
    if (!isSong && !isAlbum && !isPlaylist) {
      throw new BadRequestException('Invalid URL format');
    }

    try {
      const html = await this.saavn.fetchPage(link.href);
      if (isSong) {
        const songId = extractSongId(html);
        return songId ? this.getSong(songId, lyrics) : null;
      }
      if (isAlbum) {
        const albumId = extractAlbumId(html);
        return albumId ? formatAlbum(await this.saavn.getAlbum(albumId)) : null;
      }
      const listId = extractPlaylistId(html);
      return listId ? formatPlaylist(await this.saavn.getPlaylist(listId)) : null;
    } catch (error) {
      throw new InternalServerErrorException(describe(error));
    }
  }

  private requireSaavnLink(query: string): URL {
    const link = saavnPageUrl(query);
    if (!link) {
      throw new BadRequestException('Invalid URL format');
    }
    return link;
  }

  private fetchSaavnPage(query: string): Promise<string> {
    return this.saavn.fetchPage(this.requireSaavnLink(query).href);
  }

  private async firstSearchId(
    query: string,
    section: 'albums' | 'playlists',
  ): Promise<string | null> {
    const result = await this.saavn.search(query);
    return result[section]?.data[0]?.id ?? null;
  }

  private toSongList(songs: FormattedSong[]): SongListDto {
    const summaries = songs.map(toSongSummary);
    return { songs: summaries, count: summaries.length };
  }
}

import * as forge from 'node-forge';
import type { SongSummaryDto } from '@maestros/contract';
import type {
  FormattedAlbum,
  FormattedPlaylist,
  FormattedSong,
  RawAlbum,
  RawPlaylist,
  RawSong,
} from './jiosaavn.types';

const DES_KEY = '38346591';

/**
 * Decrypts `encrypted_media_url`: base64 DES-ECB with PKCS#5 padding.
 * The result is upgraded to the 320 kbps stream.
 */
export function decryptMediaUrl(encrypted: string): string {
  const decipher = forge.cipher.createDecipher(
    'DES-ECB',
    forge.util.createBuffer(DES_KEY),
  );
  decipher.start();
  decipher.update(forge.util.createBuffer(forge.util.decode64(encrypted.trim())));
  if (!decipher.finish()) {
    throw new Error('Could not decrypt media URL');
  }
  return forge.util
    .decodeUtf8(decipher.output.getBytes())
    .replaceAll('_96.mp4', '_320.mp4');
}

/** Undo the HTML entities JioSaavn leaves in text fields. */
export function formatText(value: string): string {
  return value
    .replace(/&quot;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/&#039;/g, "'");
}

export function upscaleImage(url: string): string {
  return url.replaceAll('150x150', '500x500');
}

function resolveMediaUrls(song: RawSong): {
  media_url: string;
  media_preview_url?: string;
} {
  const is320 = song['320kbps'] === 'true';

  if (song.encrypted_media_url) {
    try {
      let mediaUrl = decryptMediaUrl(song.encrypted_media_url);
      if (!is320) mediaUrl = mediaUrl.replaceAll('_320.mp4', '_160.mp4');
      const previewUrl = mediaUrl
        .replaceAll('_320.mp4', '_96_p.mp4')
        .replaceAll('_160.mp4', '_96_p.mp4')
        .replaceAll('//aac.', '//preview.');
      return { media_url: mediaUrl, media_preview_url: previewUrl };
    } catch {
      // fall through to the preview-derived URL
    }
  }

  const preview = song.media_preview_url ?? '';
  const mediaUrl = preview
    .replaceAll('preview', 'aac')
    .replaceAll('_96_p.mp4', is320 ? '_320.mp4' : '_160.mp4');
  return { media_url: mediaUrl, media_preview_url: song.media_preview_url };
}

export function formatSong(song: RawSong): FormattedSong {
  const formatted: FormattedSong = {
    ...song,
    ...resolveMediaUrls(song),
    song: formatText(song.song),
    music: formatText(song.music),
    singers: formatText(song.singers),
    starring: formatText(song.starring),
    album: formatText(song.album),
    primary_artists: formatText(song.primary_artists),
    image: upscaleImage(song.image),
  };
  if (song.copyright_text !== undefined) {
    formatted.copyright_text = song.copyright_text.replaceAll('&copy;', '©');
  }
  return formatted;
}

export function formatAlbum(album: RawAlbum): FormattedAlbum {
  return {
    ...album,
    image: upscaleImage(album.image),
    name: formatText(album.name),
    primary_artists: formatText(album.primary_artists),
    title: formatText(album.title),
    songs: album.songs.map(formatSong),
  };
}

export function formatPlaylist(playlist: RawPlaylist): FormattedPlaylist {
  return {
    ...playlist,
    firstname: formatText(playlist.firstname),
    listname: formatText(playlist.listname),
    songs: playlist.songs.map(formatSong),
  };
}

/** The eight-field summary. Duration is minutes to two decimals. */
export function toSongSummary(song: FormattedSong): SongSummaryDto {
  return {
    song: song.song,
    album: song.album,
    image: song.image,
    media_url: song.media_url,
    duration: Math.round((song.duration / 60) * 100) / 100,
    music: song.music,
    singers: song.singers,
    year: song.year,
  };
}

/**
 * JioSaavn occasionally emits `(From "Title")` inside JSON strings with the
 * inner quotes unescaped.
 */
export function repairSaavnJson(text: string): string {
  return text.replace(/\(From "([^"]+)"\)/g, "(From '$1')");
}

/** Whether the query is meant as a link rather than a search term. */
export function isSaavnUrl(query: string): boolean {
  return query.includes('http') && query.includes('saavn');
}

const SAAVN_HOST = 'jiosaavn.com';

/**
 * The normalized link when it is an https page on jiosaavn.com or one of
 * its subdomains, otherwise null.
 */
export function saavnPageUrl(query: string): URL | null {
  const text = query.trim();
  if (!URL.canParse(text)) return null;
  const url = new URL(text);
  const host = url.hostname.toLowerCase();
  if (
    url.protocol !== 'https:' ||
    url.port !== '' ||
    url.username !== '' ||
    url.password !== '' ||
    (host !== SAAVN_HOST && !host.endsWith(`.${SAAVN_HOST}`))
  ) {
    return null;
  }
  return url;
}

export function extractSongId(html: string): string | null {
  const pid = html.split('"pid":"')[1]?.split('","')[0];
  if (pid) return pid;
  const song = html.split('"song":{"type":"')[1]?.split('","image":')[0];
  return song?.split('"id":"').pop() ?? null;
}

export function extractAlbumId(html: string): string | null {
  return (
    html.split('"album_id":"')[1]?.split('"')[0] ??
    html.split('"page_id","')[1]?.split('","')[0] ??
    null
  );
}

export function extractPlaylistId(html: string): string | null {
  return (
    html.split('"type":"playlist","id":"')[1]?.split('"')[0] ??
    html.split('"page_id","')[1]?.split('","')[0] ??
    null
  );
}

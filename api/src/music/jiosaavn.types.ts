import { z } from 'zod';

/**
 * Song record as JioSaavn returns it. Only the fields we read are declared;
 * everything else passes through untouched to `/music/song/get/`.
 */
export const RawSongSchema = z
  .object({
    id: z.string(),
    song: z.string().default(''),
    album: z.string().default(''),
    image: z.string().default(''),
    music: z.string().default(''),
    singers: z.string().default(''),
    starring: z.string().default(''),
    primary_artists: z.string().default(''),
    year: z.coerce.string().default(''),
    duration: z.coerce.number().default(0),
    encrypted_media_url: z.string().optional(),
    media_preview_url: z.string().optional(),
    '320kbps': z.string().optional(),
    has_lyrics: z.string().optional(),
    copyright_text: z.string().optional(),
  })
  .passthrough();

export type RawSong = z.infer<typeof RawSongSchema>;

export type FormattedSong = RawSong & {
  media_url: string;
  media_preview_url?: string;
  lyrics?: string | null;
};

export const RawAlbumSchema = z
  .object({
    title: z.string().default(''),
    name: z.string().default(''),
    primary_artists: z.string().default(''),
    image: z.string().default(''),
    songs: z.array(RawSongSchema).default([]),
  })
  .passthrough();

export type RawAlbum = z.infer<typeof RawAlbumSchema>;

export const RawPlaylistSchema = z
  .object({
    listname: z.string().default(''),
    firstname: z.string().default(''),
    songs: z.array(RawSongSchema).default([]),
  })
  .passthrough();

export type RawPlaylist = z.infer<typeof RawPlaylistSchema>;

export type FormattedAlbum = Omit<RawAlbum, 'songs'> & { songs: FormattedSong[] };
export type FormattedPlaylist = Omit<RawPlaylist, 'songs'> & {
  songs: FormattedSong[];
};

const SearchSectionSchema = z
  .object({ data: z.array(z.object({ id: z.string() }).passthrough()) })
  .optional();

/** `autocomplete.get` response: one section per result kind. */
export const AutocompleteSchema = z
  .object({
    songs: SearchSectionSchema,
    albums: SearchSectionSchema,
    playlists: SearchSectionSchema,
  })
  .passthrough();

export type AutocompleteResult = z.infer<typeof AutocompleteSchema>;

export const LyricsResponseSchema = z.object({ lyrics: z.string() }).passthrough();

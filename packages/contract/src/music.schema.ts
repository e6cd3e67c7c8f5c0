import { z } from 'zod';

/** The eight-field song summary returned by /music/song/, /playlist/ and /album/. */
export const SongSummarySchema = z.object({
    song: z.string(),
    album: z.string(),
    image: z.string(),
    media_url: z.string(),
    /** Minutes, rounded to two decimals */
    duration: z.number(),
    music: z.string(),
    singers: z.string(),
    year: z.string(),
});

export type SongSummaryDto = z.infer<typeof SongSummarySchema>;

export const SongListSchema = z.object({
    songs: z.array(SongSummarySchema),
    count: z.number().int(),
});

export type SongListDto = z.infer<typeof SongListSchema>;

const booleanFlag = z.enum(['true', 'false']).default('false').transform((v) => v === 'true');

export const MusicQuerySchema = z.object({
    query: z.string().trim().min(1, 'query is required'),
    lyrics: booleanFlag,
    songdata: z.enum(['true', 'false']).default('true').transform((v) => v === 'true'),
});

export type MusicQueryDto = z.infer<typeof MusicQuerySchema>;

export const SongIdQuerySchema = z.object({
    id: z.string().trim().min(1, 'id is required'),
    lyrics: booleanFlag,
});

export type SongIdQueryDto = z.infer<typeof SongIdQuerySchema>;

import { Logger } from '@nestjs/common';

const logger = new Logger('DiscordHTTP');

const MAX_RETRIES = 3;
const BASE_BACKOFF_MS = 1_000;

export const DISCORD_API_BASE = 'https://discord.com/api/v10';

export interface DiscordFetchOptions {
  maxRetries?: number;
  /** Injected in tests to skip real waits. */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * `fetch()` for Discord REST calls made outside discord.js (OAuth and
 * bot-token lookups). A 429 waits for `Retry-After` seconds, or backs off
 * 1s, 2s, 4s when the header is missing, and the last 429 is returned.
 */
export async function discordFetch(
  url: string | URL,
  init?: RequestInit,
  options?: DiscordFetchOptions,
): Promise<Response> {
  const maxRetries = options?.maxRetries ?? MAX_RETRIES;
  const sleep = options?.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    const response = await fetch(url, init);
    if (response.status !== 429) {
      return response;
    }

    if (attempt >= maxRetries) {
      logger.error(
        `Discord API rate limit exhausted after ${maxRetries} retries: ${String(url)}`,
      );
      return response;
    }

    const retryAfter =
      response.headers.get('retry-after') ??
      response.headers.get('x-ratelimit-reset-after');
    const waitMs = retryAfter
      ? Math.ceil(parseFloat(retryAfter) * 1_000)
      : BASE_BACKOFF_MS * 2 ** attempt;

    logger.warn(
      `Discord 429 on ${String(url)}, retrying in ${waitMs}ms (attempt ${attempt + 1}/${maxRetries})`,
    );
    await sleep(waitMs);
  }
}

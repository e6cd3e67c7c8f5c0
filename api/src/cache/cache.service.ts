import { Inject, Injectable, Logger } from '@nestjs/common';
import type Redis from 'ioredis';
import {
  CacheNamespaceSchema,
  type CacheNamespace,
  type CacheStatusDto,
} from '@maestros/contract';
import { REDIS_CLIENT } from '../redis/redis.module';

export const CACHE_TTL_SECONDS: Record<CacheNamespace, number> = {
  user: 300,
  game: 600,
  discord: 300,
  general: 600,
};

const KEY_PREFIX = 'cache';

@Injectable()
export class CacheService {
  private readonly logger = new Logger(CacheService.name);

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  private key(namespace: CacheNamespace, key: string): string {
    return `${KEY_PREFIX}:${namespace}:${key}`;
  }

  async get<T>(namespace: CacheNamespace, key: string): Promise<T | null> {
    try {
      const raw = await this.redis.get(this.key(namespace, key));
      return raw === null ? null : (JSON.parse(raw) as T);
    } catch (error) {
      this.logger.warn(
        `Cache read failed for ${namespace}:${key}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return null;
    }
  }

  async set(namespace: CacheNamespace, key: string, value: unknown): Promise<void> {
    try {
      await this.redis.setex(
        this.key(namespace, key),
        CACHE_TTL_SECONDS[namespace],
        JSON.stringify(value),
      );
    } catch (error) {
      this.logger.warn(
        `Cache write failed for ${namespace}:${key}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  /** Read-through helper: return the cached value or load and store it. */
  async wrap<T>(
    namespace: CacheNamespace,
    key: string,
    load: () => Promise<T>,
  ): Promise<T> {
    const cached = await this.get<T>(namespace, key);
    if (cached !== null) return cached;

    const value = await load();
    if (value !== null && value !== undefined) {
      await this.set(namespace, key, value);
    }
    return value;
  }

  async invalidate(namespace: CacheNamespace, key?: string): Promise<number> {
    if (key !== undefined) {
      return this.redis.del(this.key(namespace, key));
    }
    const keys = await this.scanKeys(`${KEY_PREFIX}:${namespace}:*`);
    return keys.length > 0 ? this.redis.del(...keys) : 0;
  }

  async getStatus(): Promise<CacheStatusDto> {
    const caches = await Promise.all(
      CacheNamespaceSchema.options.map(async (name) => ({
        name,
        size: (await this.scanKeys(`${KEY_PREFIX}:${name}:*`)).length,
        ttlSeconds: CACHE_TTL_SECONDS[name],
      })),
    );
    return { caches };
  }

  async clearAll(): Promise<number> {
    const keys = await this.scanKeys(`${KEY_PREFIX}:*`);
    if (keys.length === 0) return 0;
    const removed = await this.redis.del(...keys);
    this.logger.log(`Cleared ${removed} cached entries`);
    return removed;
  }

  private async scanKeys(pattern: string): Promise<string[]> {
    const keys: string[] = [];
    let cursor = '0';
    do {
      const [next, batch] = await this.redis.scan(
        cursor,
        'MATCH',
        pattern,
        'COUNT',
        200,
      );
      keys.push(...batch);
      cursor = next;
    } while (cursor !== '0');
    return keys;
  }
}

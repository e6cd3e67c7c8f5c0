import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import type { AppEnv } from '../config/env.schema';

export const REDIS_CLIENT = 'REDIS_CLIENT';

/**
 * Global Redis client, used for response caching and one-time OAuth codes.
 */
@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppEnv, true>) => {
        const url = configService.get('REDIS_URL', { infer: true });
        // Unix socket path (e.g. /tmp/redis.sock) vs TCP URL
        return url.startsWith('/') ? new Redis({ path: url }) : new Redis(url);
      },
    },
  ],
  exports: [REDIS_CLIENT],
})
export class RedisModule {}

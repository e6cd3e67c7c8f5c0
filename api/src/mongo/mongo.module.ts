import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MongoClient, type Db } from 'mongodb';
import type { AppEnv } from '../config/env.schema';
import { MONGO_CLIENT, MONGO_DB } from './mongo.constants';
import { MongoService } from './mongo.service';

/**
 * One MongoClient shared for the process lifetime. The driver pools
 * connections internally, so every handler takes the same `Db`.
 * Undefined fields are dropped on write so partial updates can spread DTOs.
 */
@Global()
@Module({
  providers: [
    {
      provide: MONGO_CLIENT,
      inject: [ConfigService],
      useFactory: async (
        config: ConfigService<AppEnv, true>,
      ): Promise<MongoClient> => {
        const client = new MongoClient(
          config.get('MONGODB_URI', { infer: true }),
          { serverSelectionTimeoutMS: 10_000, ignoreUndefined: true },
        );
        await client.connect();
        return client;
      },
    },
    {
      provide: MONGO_DB,
      inject: [MONGO_CLIENT, ConfigService],
      useFactory: (
        client: MongoClient,
        config: ConfigService<AppEnv, true>,
      ): Db => client.db(config.get('MONGODB_DB_NAME', { infer: true })),
    },
    MongoService,
  ],
  exports: [MONGO_CLIENT, MONGO_DB, MongoService],
})
export class MongoModule {}

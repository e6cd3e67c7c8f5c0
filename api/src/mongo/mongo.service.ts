import {
  Inject,
  Injectable,
  Logger,
  type OnApplicationBootstrap,
  type OnApplicationShutdown,
} from '@nestjs/common';
import type { Db, MongoClient } from 'mongodb';
import { MONGO_CLIENT, MONGO_DB } from './mongo.constants';
import { ensureIndexes } from './mongo.indexes';

@Injectable()
export class MongoService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(MongoService.name);

  constructor(
    @Inject(MONGO_CLIENT) private readonly client: MongoClient,
    @Inject(MONGO_DB) private readonly db: Db,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const collections = await this.db.listCollections({}, { nameOnly: true }).toArray();
    this.logger.log(
      `Connected to MongoDB database "${this.db.databaseName}" (${collections.length} collections)`,
    );

    try {
      const count = await ensureIndexes(this.db);
      this.logger.log(`Ensured ${count} indexes`);
    } catch (error) {
      this.logger.error('Failed to create indexes:', error);
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.client.close();
    this.logger.log('MongoDB connection closed');
  }

  async ping(): Promise<{ connected: boolean; latencyMs: number }> {
    const start = Date.now();
    try {
      await this.db.command({ ping: 1 });
      return { connected: true, latencyMs: Date.now() - start };
    } catch {
      return { connected: false, latencyMs: Date.now() - start };
    }
  }
}

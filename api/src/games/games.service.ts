import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ObjectId, type Db, type Filter } from 'mongodb';
import type {
  CreateGameDto,
  GameDto,
  GameListQueryDto,
  UpdateGameDto,
} from '@maestros/contract';
import { COLLECTIONS, MONGO_DB } from '../mongo/mongo.constants';
import { CacheService } from '../cache/cache.service';
import { parseObjectId } from '../common/object-id';
import type { UserDocument } from '../users/user.types';
import { toGameDto, type GameDocument } from './game.types';

export interface GameList {
  games: GameDto[];
  count: number;
}

/**
 * Game catalogue. Reads go through the `game` cache namespace and every
 * write drops the whole namespace.
 */
@Injectable()
export class GamesService {
  private readonly logger = new Logger(GamesService.name);

  constructor(
    @Inject(MONGO_DB) private readonly db: Db,
    private readonly cache: CacheService,
  ) {}

  private get games() {
    return this.db.collection<GameDocument>(COLLECTIONS.GAMES);
  }

  list(query: GameListQueryDto): Promise<GameList> {
    const activeOnly = query.active_only === 'true';
    const key = `list:${activeOnly}:${query.limit}:${query.skip}`;

    return this.cache.wrap('game', key, async () => {
      const filter: Filter<GameDocument> = activeOnly ? { active: true } : {};
      const rows = await this.games
        .find(filter)
        .sort({ created_at: -1 })
        .skip(query.skip)
        .limit(query.limit)
        .toArray();
      const games = rows.map(toGameDto);
      return { games, count: games.length };
    });
  }

  async findById(id: string): Promise<GameDto> {
    const oid = parseObjectId(id, 'Invalid game ID');
    const game = await this.cache.wrap('game', oid.toHexString(), async () => {
      const doc = await this.games.findOne({ _id: oid });
      return doc ? toGameDto(doc) : null;
    });
    if (!game) {
      throw new NotFoundException('Game not found');
    }
    return game;
  }

  async create(
    dto: CreateGameDto,
    creator: UserDocument,
  ): Promise<{ message: string; game: GameDto }> {
    const now = new Date();
    const doc: GameDocument = {
      _id: new ObjectId(),
      name: dto.name,
      description: dto.description,
      image_url: dto.image_url ?? null,
      category: dto.category,
      platform: dto.platform ?? null,
      clan: dto.clan ?? null,
      active: dto.active,
      created_by: creator.discord_id,
      created_at: now,
      updated_at: now,
    };
    await this.games.insertOne(doc);
    await this.cache.invalidate('game');

    this.logger.log(`Game "${doc.name}" created by ${creator.username}`);
    return { message: 'Game created successfully', game: toGameDto(doc) };
  }

  async update(
    id: string,
    dto: UpdateGameDto,
    editor: UserDocument,
  ): Promise<{ message: string; game: GameDto }> {
    const updated = await this.games.findOneAndUpdate(
      { _id: parseObjectId(id, 'Invalid game ID') },
      {
        $set: {
          ...dto,
          updated_at: new Date(),
          updated_by: editor.discord_id,
        },
      },
      { returnDocument: 'after' },
    );
    if (!updated) {
      throw new NotFoundException('Game not found');
    }
    await this.cache.invalidate('game');
    return { message: 'Game updated successfully', game: toGameDto(updated) };
  }

  async remove(id: string): Promise<{ message: string }> {
    const result = await this.games.deleteOne({
      _id: parseObjectId(id, 'Invalid game ID'),
    });
    if (result.deletedCount === 0) {
      throw new NotFoundException('Game not found');
    }
    await this.cache.invalidate('game');
    return { message: 'Game deleted successfully' };
  }
}

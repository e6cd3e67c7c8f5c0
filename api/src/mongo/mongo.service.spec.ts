import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { MongoService } from './mongo.service';
import { MONGO_CLIENT, MONGO_DB } from './mongo.constants';
import { createDbMock, type DbMock } from '../common/testing/mongo-mock';

describe('MongoService', () => {
  let module: TestingModule;
  let service: MongoService;
  let db: DbMock;
  const client = { close: jest.fn().mockResolvedValue(undefined) };

  beforeEach(async () => {
    db = createDbMock();
    module = await Test.createTestingModule({
      providers: [
        MongoService,
        { provide: MONGO_CLIENT, useValue: client },
        { provide: MONGO_DB, useValue: db },
      ],
    }).compile();

    service = module.get(MongoService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    jest.clearAllMocks();
  });

  it('logs the connected collection count on bootstrap', async () => {
    const logSpy = jest
      .spyOn(Logger.prototype, 'log')
      .mockImplementation(() => undefined);
    db.listCursor.toArray.mockResolvedValue([
      { name: 'users' },
      { name: 'events' },
      { name: 'games' },
    ]);

    await service.onApplicationBootstrap();

    expect(logSpy).toHaveBeenCalledWith(
      'Connected to MongoDB database "maestros_community" (3 collections)',
    );
  });

  it('creates the indexes for every indexed collection', async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

    await service.onApplicationBootstrap();

    expect(db.getCollection('users').createIndexes).toHaveBeenCalledWith(
      expect.arrayContaining([{ key: { discord_id: 1 }, unique: true }]),
    );
    expect(db.getCollection('rules').createIndexes).toHaveBeenCalledTimes(1);
  });

  it('keeps booting when index creation fails', async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    const errorSpy = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);
    db.getCollection('users').createIndexes.mockRejectedValueOnce(
      new Error('not primary'),
    );

    await expect(service.onApplicationBootstrap()).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith(
      'Failed to create indexes:',
      expect.any(Error),
    );
  });

  it('reports a failed ping as disconnected', async () => {
    db.command.mockRejectedValueOnce(new Error('timeout'));

    const result = await service.ping();

    expect(result.connected).toBe(false);
  });

  it('closes the client on shutdown', async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    await service.onApplicationShutdown();
    expect(client.close).toHaveBeenCalled();
  });
});

import { Test, TestingModule } from '@nestjs/testing';
import { NotFoundException } from '@nestjs/common';
import { ObjectId } from 'mongodb';
import { RulesService } from './rules.service';
import { RulePublisherService } from './rule-publisher.service';
import { MONGO_DB } from '../mongo/mongo.constants';
import { createDbMock, type DbMock } from '../common/testing/mongo-mock';
import type { UserDocument } from '../users/user.types';
import type { RuleDocument } from './rule.types';

const RULE_ID = '65f0000000000000000000cc';

const manager: UserDocument = {
  _id: new ObjectId('65f000000000000000000002'),
  discord_id: '2002',
  username: 'manager',
  roles: [],
  guild_roles: [],
  xp: 0,
  level: 1,
  badges: [],
};

function makeRule(overrides: Partial<RuleDocument> = {}): RuleDocument {
  return {
    _id: new ObjectId(RULE_ID),
    title: 'Conduct',
    content: 'Be respectful to everyone',
    category: 'community',
    order: 0,
    active: true,
    discord_channel_id: null,
    discord_message_id: null,
    created_by: '2002',
    created_at: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('RulesService', () => {
  let service: RulesService;
  let db: DbMock;
  let publisher: { publish: jest.Mock; unpublish: jest.Mock; listChannels: jest.Mock };

  beforeEach(async () => {
    db = createDbMock();
    publisher = {
      publish: jest.fn().mockResolvedValue(null),
      unpublish: jest.fn().mockResolvedValue(undefined),
      listChannels: jest.fn().mockResolvedValue([]),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RulesService,
        { provide: MONGO_DB, useValue: db },
        { provide: RulePublisherService, useValue: publisher },
      ],
    }).compile();

    service = module.get(RulesService);
  });

  it('filters active rules by category, newest first', async () => {
    const rules = db.getCollection('rules');

    await service.list({ active_only: 'true', category: 'conduct' });

    expect(rules.find).toHaveBeenCalledWith({ active: true, category: 'conduct' });
    expect(rules.cursor.sort).toHaveBeenCalledWith({ created_at: -1 });
  });

  it('stores the message id when the post succeeds', async () => {
    const rules = db.getCollection('rules');
    publisher.publish.mockResolvedValue({ channelId: '555', messageId: '777' });

    const result = await service.create(
      {
        title: 'Conduct',
        content: 'Be respectful to everyone',
        category: 'community',
        order: 0,
        active: true,
      },
      manager,
    );

    expect(rules.updateOne).toHaveBeenCalledWith(
      { _id: expect.any(ObjectId) as unknown },
      { $set: { discord_channel_id: '555', discord_message_id: '777' } },
    );
    expect(result.rule.discord_message_id).toBe('777');
  });

  it('keeps the rule when the bot cannot post it', async () => {
    const rules = db.getCollection('rules');

    const result = await service.create(
      {
        title: 'Conduct',
        content: 'Be respectful to everyone',
        category: 'community',
        order: 0,
        active: true,
      },
      manager,
    );

    expect(rules.insertOne).toHaveBeenCalledTimes(1);
    expect(rules.updateOne).not.toHaveBeenCalled();
    expect(result.message).toBe('Rule created successfully');
    expect(result.rule.discord_message_id).toBeNull();
  });

  it('skips the write when an edit lands on the same message', async () => {
    const rules = db.getCollection('rules');
    rules.findOneAndUpdate.mockResolvedValue(
      makeRule({ discord_channel_id: '555', discord_message_id: '777' }),
    );
    publisher.publish.mockResolvedValue({ channelId: '555', messageId: '777' });

    await service.update(RULE_ID, { title: 'Conduct v2' }, manager);

    expect(rules.updateOne).not.toHaveBeenCalled();
  });

  it('removes the Discord copy after deleting', async () => {
    const rule = makeRule({ discord_channel_id: '555', discord_message_id: '777' });
    const rules = db.getCollection('rules');
    rules.findOne.mockResolvedValue(rule);

    const result = await service.remove(RULE_ID);

    expect(rules.deleteOne).toHaveBeenCalledWith({ _id: rule._id });
    expect(publisher.unpublish).toHaveBeenCalledWith(rule);
    expect(result).toEqual({ message: 'Rule deleted successfully' });
  });

  it('throws 404 for unknown rules', async () => {
    await expect(service.findById(RULE_ID)).rejects.toThrow(
      new NotFoundException('Rule not found'),
    );
  });
});

import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RulePublisherService, DEFAULT_RULE_CHANNELS } from './rule-publisher.service';
import { ObjectId } from 'mongodb';
import { DiscordBridgeService } from '../discord-bot/discord-bridge.service';

describe('RulePublisherService', () => {
  let service: RulePublisherService;
  let bridge: { isReady: jest.Mock; requireClient: jest.Mock };

  beforeEach(async () => {
    bridge = { isReady: jest.fn().mockReturnValue(false), requireClient: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RulePublisherService,
        { provide: DiscordBridgeService, useValue: bridge },
        { provide: ConfigService, useValue: { get: jest.fn().mockReturnValue('900') } },
      ],
    }).compile();

    service = module.get(RulePublisherService);
  });

  it('offers the default categories while the bot is offline', async () => {
    await expect(service.listChannels()).resolves.toEqual([
      { id: 'general', name: 'general', display_name: 'General' },
      { id: 'conduct', name: 'conduct', display_name: 'Conduct' },
      { id: 'gameplay', name: 'gameplay', display_name: 'Gameplay' },
    ]);
    expect(DEFAULT_RULE_CHANNELS).toHaveLength(3);
  });

  it('does not post while the bot is offline', async () => {
    const result = await service.publish({
      _id: new ObjectId(),
      title: 'Conduct',
      content: 'Be kind',
      category: 'general',
      order: 0,
      active: true,
      discord_channel_id: null,
      discord_message_id: null,
      created_by: null,
      created_at: new Date(),
    });

    expect(result).toBeNull();
    expect(bridge.requireClient).not.toHaveBeenCalled();
  });
});

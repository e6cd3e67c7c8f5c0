import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { DiscordBotService } from './discord-bot.service';
import { DiscordBotClientService } from './discord-bot-client.service';

describe('DiscordBotService', () => {
  let service: DiscordBotService;
  let clientService: {
    connect: jest.Mock;
    disconnect: jest.Mock;
    isConnected: jest.Mock;
    isConnecting: jest.Mock;
    getGuildCount: jest.Mock;
    getPing: jest.Mock;
  };
  let token: string | undefined;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();

    token = 'test-bot-token';
    clientService = {
      connect: jest.fn().mockResolvedValue(undefined),
      disconnect: jest.fn().mockResolvedValue(undefined),
      isConnected: jest.fn().mockReturnValue(false),
      isConnecting: jest.fn().mockReturnValue(false),
      getGuildCount: jest.fn().mockReturnValue(0),
      getPing: jest.fn().mockReturnValue(null),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DiscordBotService,
        { provide: DiscordBotClientService, useValue: clientService },
        { provide: ConfigService, useValue: { get: jest.fn(() => token) } },
      ],
    }).compile();

    service = module.get(DiscordBotService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('onApplicationBootstrap', () => {
    it('connects in the background with the configured token', () => {
      service.onApplicationBootstrap();

      expect(clientService.connect).toHaveBeenCalledWith('test-bot-token');
      expect(service.getState()).toBe('starting');
    });

    it('stays offline without a token', () => {
      token = undefined;

      service.onApplicationBootstrap();

      expect(clientService.connect).not.toHaveBeenCalled();
      expect(service.getState()).toBe('not_started');
    });

    it('returns to not_started when the connection fails', async () => {
      clientService.connect.mockRejectedValue(new Error('invalid token'));

      service.onApplicationBootstrap();
      await new Promise((resolve) => setImmediate(resolve));

      expect(service.getState()).toBe('not_started');
    });
  });

  it('reports guild count and latency once online', () => {
    clientService.isConnected.mockReturnValue(true);
    clientService.getGuildCount.mockReturnValue(1);
    clientService.getPing.mockReturnValue(38);

    expect(service.getStatus()).toEqual({
      status: 'online',
      guilds: 1,
      latency: 38,
    });
  });

  it('disconnects on shutdown', async () => {
    await service.onModuleDestroy();

    expect(clientService.disconnect).toHaveBeenCalled();
  });
});

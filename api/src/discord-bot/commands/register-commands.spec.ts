/* eslint-disable @typescript-eslint/unbound-method */
import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { REST, Routes } from 'discord.js';
import { RegisterCommandsService } from './register-commands';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { BOT_COMMANDS, type SlashCommandHandler } from './slash-command';

jest.mock('discord.js', () => {
  const actual = jest.requireActual<typeof import('discord.js')>('discord.js');
  return {
    ...actual,
    REST: jest.fn(),
    Routes: {
      applicationGuildCommands: jest.fn().mockReturnValue('/route'),
    },
  };
});

function fakeCommand(
  name: string,
  group: SlashCommandHandler['group'],
): SlashCommandHandler {
  return {
    commandName: name,
    group,
    getDefinition: jest.fn().mockReturnValue({ name, description: name }),
    handleInteraction: jest.fn(),
  };
}

describe('RegisterCommandsService', () => {
  let service: RegisterCommandsService;
  let mockRestPut: jest.Mock;
  let clientService: { getClientId: jest.Mock; getGuild: jest.Mock };
  let token: string | undefined;
  let logSpy: jest.SpyInstance;

  const commands = [
    fakeCommand('ping', 'general'),
    fakeCommand('help', 'general'),
    fakeCommand('play', 'music'),
  ];

  beforeEach(async () => {
    token = 'test-bot-token';
    mockRestPut = jest.fn().mockResolvedValue([]);
    (REST as unknown as jest.Mock).mockImplementation(() => ({
      setToken: jest.fn().mockReturnThis(),
      put: mockRestPut,
    }));
    clientService = {
      getClientId: jest.fn().mockReturnValue('client-456'),
      getGuild: jest.fn().mockReturnValue({ id: 'guild-123', name: 'Maestros' }),
    };
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RegisterCommandsService,
        { provide: DiscordBotClientService, useValue: clientService },
        {
          provide: ConfigService,
          useValue: { get: jest.fn(() => token) },
        },
        { provide: BOT_COMMANDS, useValue: commands },
      ],
    }).compile();

    service = module.get(RegisterCommandsService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('groups command names in registration order', () => {
    expect([...service.groups()]).toEqual([
      ['general', ['ping', 'help']],
      ['music', ['play']],
    ]);
  });

  it('puts every definition on the guild route', async () => {
    const count = await service.registerCommands();

    expect(count).toBe(3);
    expect(Routes.applicationGuildCommands).toHaveBeenCalledWith(
      'client-456',
      'guild-123',
    );
    expect(mockRestPut).toHaveBeenCalledWith('/route', {
      body: [
        { name: 'ping', description: 'ping' },
        { name: 'help', description: 'help' },
        { name: 'play', description: 'play' },
      ],
    });
  });

  it('logs each loaded group', async () => {
    await service.registerCommands();

    expect(logSpy).toHaveBeenCalledWith('Loaded general commands: /ping, /help');
    expect(logSpy).toHaveBeenCalledWith('Loaded music commands: /play');
    expect(logSpy).toHaveBeenCalledWith(
      'Registered 3 slash command(s) for guild guild-123',
    );
  });

  it('skips registration without a token', async () => {
    token = undefined;

    await expect(service.registerCommands()).resolves.toBe(0);
    expect(mockRestPut).not.toHaveBeenCalled();
  });

  it('skips registration when the bot has no guild', async () => {
    clientService.getGuild.mockReturnValue(null);

    await expect(service.registerCommands()).resolves.toBe(0);
    expect(mockRestPut).not.toHaveBeenCalled();
  });

  it('returns 0 when Discord rejects the request', async () => {
    mockRestPut.mockRejectedValue(new Error('Missing Access'));

    await expect(service.registerCommands()).resolves.toBe(0);
  });
});

import { Logger } from '@nestjs/common';
import type { ConfigService } from '@nestjs/config';
import { ChannelType, Collection, type Guild } from 'discord.js';
import type { Db } from 'mongodb';
import type { AppEnv } from '../../config/env.schema';
import { createDbMock, type DbMock } from '../../common/testing/mongo-mock';
import type { DiscordBotClientService } from '../discord-bot-client.service';
import type { DiscordStatsService } from '../services/discord-stats.service';
import { BotTasksService } from './bot-tasks.service';

const COUNT_CHANNEL_ID = '555';

function makeChannel(type: ChannelType, name: string) {
  return { id: COUNT_CHANNEL_ID, type, name, setName: jest.fn().mockResolvedValue(undefined) };
}

function makeGuild(
  channels: ReturnType<typeof makeChannel>[],
  members: { id: string; bot: boolean; roleIds: string[] }[] = [],
) {
  return {
    id: 'g1',
    memberCount: 128,
    channels: { cache: new Collection(channels.map((c) => [c.id, c] as const)) },
    members: {
      cache: new Collection(
        members.map((m) => [
          m.id,
          {
            id: m.id,
            user: { bot: m.bot, username: `user-${m.id}`, avatar: null },
            roles: {
              cache: new Collection(m.roleIds.map((roleId) => [roleId, { id: roleId }] as const)),
            },
          },
        ] as const),
      ),
    },
  };
}

describe('BotTasksService', () => {
  let db: DbMock;
  let env: Partial<Record<keyof AppEnv, unknown>>;
  let getGuild: jest.Mock;
  let service: BotTasksService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();

    db = createDbMock();
    env = { MEMBER_COUNT_CHANNEL_ID: COUNT_CHANNEL_ID };
    getGuild = jest.fn().mockReturnValue(null);
    service = new BotTasksService(
      { getGuild } as unknown as DiscordBotClientService,
      { refresh: jest.fn() } as unknown as DiscordStatsService,
      db as unknown as Db,
      { get: jest.fn((key: keyof AppEnv) => env[key]) } as unknown as ConfigService<
        AppEnv,
        true
      >,
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('updateMemberCount', () => {
    it('renames the voice channel to the member count', async () => {
      const channel = makeChannel(ChannelType.GuildVoice, '👥 Members: 127');
      getGuild.mockReturnValue(makeGuild([channel]) as unknown as Guild);

      await expect(service.updateMemberCount()).resolves.toBe('👥 Members: 128');
      expect(channel.setName).toHaveBeenCalledWith('👥 Members: 128');
    });

    it('leaves an up-to-date name alone', async () => {
      const channel = makeChannel(ChannelType.GuildVoice, '👥 Members: 128');
      getGuild.mockReturnValue(makeGuild([channel]) as unknown as Guild);

      await expect(service.updateMemberCount()).resolves.toBe('👥 Members: 128');
      expect(channel.setName).not.toHaveBeenCalled();
    });

    it('does nothing without a configured channel', async () => {
      env = {};

      await expect(service.updateMemberCount()).resolves.toBeNull();
      expect(getGuild).not.toHaveBeenCalled();
    });

    it('skips a channel that is not a voice channel', async () => {
      const channel = makeChannel(ChannelType.GuildText, 'general');
      getGuild.mockReturnValue(makeGuild([channel]) as unknown as Guild);

      await expect(service.updateMemberCount()).resolves.toBeNull();
      expect(channel.setName).not.toHaveBeenCalled();
    });

    it('reports a failed rename as null', async () => {
      const channel = makeChannel(ChannelType.GuildVoice, 'old');
      channel.setName.mockRejectedValue(new Error('rate limited'));
      getGuild.mockReturnValue(makeGuild([channel]) as unknown as Guild);

      await expect(service.updateMemberCount()).resolves.toBeNull();
    });
  });

  describe('syncRoles', () => {
    it('writes guild roles for humans only, without the @everyone role', async () => {
      getGuild.mockReturnValue(
        makeGuild(
          [],
          [
            { id: '1001', bot: false, roleIds: ['g1', 'r-member'] },
            { id: '9999', bot: true, roleIds: ['g1'] },
          ],
        ) as unknown as Guild,
      );
      db.getCollection('users').bulkWrite.mockResolvedValue({ matchedCount: 1 });

      await expect(service.syncRoles()).resolves.toBe(1);

      const [[ops]] = db.getCollection('users').bulkWrite.mock.calls as [
        [{ updateOne: { filter: unknown; update: { $set: { guild_roles: string[] } } } }[]],
      ];
      expect(ops).toHaveLength(1);
      expect(ops[0].updateOne.filter).toEqual({ discord_id: '1001' });
      expect(ops[0].updateOne.update.$set.guild_roles).toEqual(['r-member']);
    });
  });
});

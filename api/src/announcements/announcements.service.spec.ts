import { Test, TestingModule } from '@nestjs/testing';
import {
  ForbiddenException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import { ObjectId } from 'mongodb';
import { SendAnnouncementSchema } from '@maestros/contract';
import { AnnouncementsService } from './announcements.service';
import { GuildDirectoryService } from '../discord-bot/services/guild-directory.service';
import { MONGO_DB } from '../mongo/mongo.constants';
import { createDbMock, type DbMock } from '../common/testing/mongo-mock';
import type { UserDocument } from '../users/user.types';

const manager: UserDocument = {
  _id: new ObjectId('65f000000000000000000001'),
  discord_id: '500',
  username: 'boss',
  roles: [],
  guild_roles: [],
  xp: 0,
  level: 1,
  badges: [],
};

function makeChannel(allowed: Record<string, boolean>) {
  return {
    id: 'c1',
    name: 'news',
    guild: { members: { me: {} } },
    permissionsFor: jest.fn().mockReturnValue({
      has: jest.fn((flag: bigint) => allowed[flag.toString()] ?? true),
    }),
    send: jest.fn().mockResolvedValue({
      id: 'm1',
      url: 'https://discord.com/channels/g1/c1/m1',
    }),
  };
}

// PermissionFlagsBits.MentionEveryone
const MENTION_EVERYONE = (1n << 17n).toString();
// PermissionFlagsBits.EmbedLinks
const EMBED_LINKS = (1n << 14n).toString();

describe('AnnouncementsService', () => {
  let service: AnnouncementsService;
  let db: DbMock;
  let directory: { getGuild: jest.Mock; getTextChannel: jest.Mock };
  let channel: ReturnType<typeof makeChannel>;
  const guild = {
    id: 'g1',
    name: 'Maestros',
    roles: { cache: new Map([['r1', {}]]) },
  };
  const now = new Date('2026-03-01T00:00:00.000Z');

  async function setup(allowed: Record<string, boolean> = {}) {
    db = createDbMock();
    channel = makeChannel(allowed);
    directory = {
      getGuild: jest.fn().mockReturnValue(guild),
      getTextChannel: jest.fn().mockReturnValue(channel),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AnnouncementsService,
        { provide: MONGO_DB, useValue: db },
        { provide: GuildDirectoryService, useValue: directory },
      ],
    }).compile();
    service = module.get(AnnouncementsService);
  }

  const dto = SendAnnouncementSchema.parse({
    guild_id: 'g1',
    channel_id: 'c1',
    content: 'Tournament tonight',
    embed: { title: 'Tournament', description: 'Sign up now' },
    mentions: { everyone: true, role_ids: ['r1', 'gone'] },
  });

  describe('send', () => {
    it('sends mentions above the content and returns the message link', async () => {
      await setup();

      const result = await service.send(dto, manager, now);

      expect(result).toEqual({
        success: true,
        message_id: 'm1',
        channel_name: 'news',
        guild_name: 'Maestros',
        message_url: 'https://discord.com/channels/g1/c1/m1',
      });
      expect(channel.send).toHaveBeenCalledWith(
        expect.objectContaining({
          content: '@everyone <@&r1>\nTournament tonight',
        }) as unknown,
      );
    });

    it('logs a successful send with a summary', async () => {
      await setup();

      await service.send(dto, manager, now);

      expect(db.getCollection('announcement_logs').insertOne).toHaveBeenCalledWith(
        expect.objectContaining({
          manager_id: '500',
          manager_username: 'boss',
          guild_name: 'Maestros',
          channel_name: 'news',
          embed_summary: {
            title: 'Tournament',
            description: 'Sign up now',
            fields_count: 0,
          },
          mentions: { everyone: true, here: false, roles_count: 2, users_count: 0 },
          content: 'Tournament tonight',
          success: true,
          error_message: null,
          timestamp: now,
        }) as unknown,
      );
    });

    it('rejects when the bot cannot embed links', async () => {
      await setup({ [EMBED_LINKS]: false });

      await expect(service.send(dto, manager, now)).rejects.toThrow(
        new ForbiddenException(
          'Bot lacks required permissions (Send Messages, Embed Links)',
        ),
      );
      expect(channel.send).not.toHaveBeenCalled();
    });

    it('rejects @everyone without the mention permission', async () => {
      await setup({ [MENTION_EVERYONE]: false });

      await expect(service.send(dto, manager, now)).rejects.toThrow(
        new ForbiddenException('Bot lacks permission to mention @everyone/@here'),
      );
    });

    it('logs the failure and answers 500 when Discord errors', async () => {
      await setup();
      channel.send.mockRejectedValue(new Error('socket hang up'));

      await expect(service.send(dto, manager, now)).rejects.toThrow(
        new InternalServerErrorException('Failed to send message: socket hang up'),
      );
      expect(db.getCollection('announcement_logs').insertOne).toHaveBeenCalledWith(
        expect.objectContaining({
          success: false,
          error_message: 'Failed to send message: socket hang up',
          embed_summary: {},
          mentions: {},
        }) as unknown,
      );
    });
  });

  describe('listLogs', () => {
    it('pages newest first', async () => {
      await setup();
      const logs = db.getCollection('announcement_logs');
      logs.countDocuments.mockResolvedValue(45);

      const result = await service.listLogs(2, 20);

      expect(logs.cursor.sort).toHaveBeenCalledWith({ timestamp: -1 });
      expect(logs.cursor.skip).toHaveBeenCalledWith(20);
      expect(logs.cursor.limit).toHaveBeenCalledWith(20);
      expect(result).toEqual({ logs: [], total: 45, page: 2, pages: 3 });
    });
  });

  describe('findLog', () => {
    it('throws 404 for an unknown log', async () => {
      await setup();

      await expect(
        service.findLog('65f0000000000000000000ff'),
      ).rejects.toThrow(new NotFoundException('Log not found'));
    });
  });
});

import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, Logger, NotFoundException } from '@nestjs/common';
import { ObjectId } from 'mongodb';
import { EventsService, REGISTRATION_XP } from './events.service';
import { UsersService } from '../users/users.service';
import { ActivityService } from '../users/activity.service';
import { MONGO_DB } from '../mongo/mongo.constants';
import { createDbMock, type DbMock } from '../common/testing/mongo-mock';
import type { UserDocument } from '../users/user.types';
import type { EventDocument } from './event.types';

const EVENT_ID = '65f0000000000000000000ee';

const player: UserDocument = {
  _id: new ObjectId('65f000000000000000000001'),
  discord_id: '1001',
  username: 'player',
  roles: [],
  guild_roles: [],
  xp: 90,
  level: 0,
  badges: [],
};

function makeEvent(overrides: Partial<EventDocument> = {}): EventDocument {
  return {
    _id: new ObjectId(EVENT_ID),
    title: 'Friday Scrims',
    description: 'Five-versus-five practice scrims for the roster.',
    game: 'Valorant',
    date: new Date('2026-06-01T18:00:00Z'),
    max_participants: 10,
    prize: null,
    participants: [],
    winners: [],
    status: 'upcoming',
    created_by: '9009',
    created_at: new Date('2026-05-01T00:00:00Z'),
    ...overrides,
  };
}

describe('EventsService', () => {
  let service: EventsService;
  let db: DbMock;
  let usersService: { awardXp: jest.Mock };
  const now = new Date('2026-05-15T00:00:00Z');

  beforeEach(async () => {
    db = createDbMock();
    usersService = { awardXp: jest.fn().mockResolvedValue({ xp: 115, level: 1 }) };
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EventsService,
        ActivityService,
        { provide: MONGO_DB, useValue: db },
        { provide: UsersService, useValue: usersService },
      ],
    }).compile();

    service = module.get(EventsService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('findById', () => {
    it('rejects malformed ids with 400', async () => {
      await expect(service.findById('not-an-id')).rejects.toThrow(
        new BadRequestException('Invalid event ID'),
      );
    });

    it('throws 404 for unknown events', async () => {
      await expect(service.findById(EVENT_ID)).rejects.toThrow(
        new NotFoundException('Event not found'),
      );
    });
  });

  describe('register', () => {
    it('adds the participant and awards XP', async () => {
      const events = db.getCollection('events');
      events.findOne.mockResolvedValue(makeEvent({ participants: ['2002', '3003'] }));

      const result = await service.register(EVENT_ID, player, now);

      expect(events.updateOne).toHaveBeenCalledWith(
        {
          _id: new ObjectId(EVENT_ID),
          status: 'upcoming',
          participants: { $ne: '1001' },
          'participants.9': { $exists: false },
        },
        { $push: { participants: '1001' } },
      );
      expect(usersService.awardXp).toHaveBeenCalledWith(
        '1001',
        REGISTRATION_XP,
        'Registered for Friday Scrims',
      );
      expect(result).toEqual({
        message: 'Registered successfully',
        event_id: EVENT_ID,
        xp_awarded: 25,
        level_up: true,
        new_level: 1,
        participant_count: 3,
        spots_remaining: 7,
      });
    });

    it('awards nothing when a concurrent request registered the caller first', async () => {
      const events = db.getCollection('events');
      events.findOne
        .mockResolvedValueOnce(makeEvent({ max_participants: 2, participants: ['2002'] }))
        .mockResolvedValueOnce(
          makeEvent({ max_participants: 2, participants: ['2002', '1001'] }),
        );
      events.updateOne.mockResolvedValueOnce({ matchedCount: 0, modifiedCount: 0 });

      await expect(service.register(EVENT_ID, player, now)).rejects.toThrow(
        new BadRequestException('Already registered for this event'),
      );
      expect(usersService.awardXp).not.toHaveBeenCalled();
      expect(db.getCollection('activity').insertOne).not.toHaveBeenCalled();
    });

    it('refuses the last spot once another member has taken it', async () => {
      const events = db.getCollection('events');
      events.findOne
        .mockResolvedValueOnce(makeEvent({ max_participants: 2, participants: ['2002'] }))
        .mockResolvedValueOnce(
          makeEvent({ max_participants: 2, participants: ['2002', '3003'] }),
        );
      events.updateOne.mockResolvedValueOnce({ matchedCount: 0, modifiedCount: 0 });

      await expect(service.register(EVENT_ID, player, now)).rejects.toThrow(
        new BadRequestException('Event is full (2/2 participants)'),
      );
      expect(events.updateOne).toHaveBeenCalledWith(
        expect.objectContaining({ 'participants.1': { $exists: false } }),
        { $push: { participants: '1001' } },
      );
      expect(usersService.awardXp).not.toHaveBeenCalled();
    });

    it('rejects a second registration', async () => {
      db.getCollection('events').findOne.mockResolvedValue(
        makeEvent({ participants: ['1001'] }),
      );

      await expect(service.register(EVENT_ID, player, now)).rejects.toThrow(
        new BadRequestException('Already registered for this event'),
      );
    });

    it('rejects a full event with the current count', async () => {
      db.getCollection('events').findOne.mockResolvedValue(
        makeEvent({ max_participants: 2, participants: ['2002', '3003'] }),
      );

      await expect(service.register(EVENT_ID, player, now)).rejects.toThrow(
        new BadRequestException('Event is full (2/2 participants)'),
      );
    });

    it('rejects events that are not upcoming', async () => {
      db.getCollection('events').findOne.mockResolvedValue(
        makeEvent({ status: 'completed' }),
      );

      await expect(service.register(EVENT_ID, player, now)).rejects.toThrow(
        new BadRequestException('Event registration closed (status: completed)'),
      );
    });

    it('rejects events that have already started', async () => {
      db.getCollection('events').findOne.mockResolvedValue(
        makeEvent({ date: new Date('2026-05-14T00:00:00Z') }),
      );

      await expect(service.register(EVENT_ID, player, now)).rejects.toThrow(
        new BadRequestException('Event has already started'),
      );
      expect(usersService.awardXp).not.toHaveBeenCalled();
    });
  });

  describe('unregister', () => {
    it('fails when the caller is not registered', async () => {
      db.getCollection('events').findOne.mockResolvedValue(makeEvent());

      await expect(service.unregister(EVENT_ID, player)).rejects.toThrow(
        new BadRequestException('Not registered for this event'),
      );
    });

    it('pulls the participant', async () => {
      const events = db.getCollection('events');
      events.findOne.mockResolvedValue(makeEvent({ participants: ['1001'] }));

      const result = await service.unregister(EVENT_ID, player);

      expect(events.updateOne).toHaveBeenCalledWith(
        { _id: new ObjectId(EVENT_ID) },
        { $pull: { participants: '1001' } },
      );
      expect(result).toEqual({ message: 'Unregistered successfully' });
    });
  });

  describe('findUpcoming', () => {
    it('returns future upcoming events soonest first', async () => {
      const events = db.getCollection('events');
      events.cursor.toArray.mockResolvedValue([makeEvent()]);

      const result = await service.findUpcoming(5, now);

      expect(events.find).toHaveBeenCalledWith({
        status: 'upcoming',
        date: { $gte: now },
      });
      expect(events.cursor.sort).toHaveBeenCalledWith({ date: 1 });
      expect(events.cursor.limit).toHaveBeenCalledWith(5);
      expect(result[0]).toEqual(
        expect.objectContaining({ id: EVENT_ID, date: '2026-06-01T18:00:00.000Z' }) as unknown,
      );
    });
  });

  describe('remove', () => {
    it('throws 404 when nothing was deleted', async () => {
      db.getCollection('events').deleteOne.mockResolvedValue({ deletedCount: 0 });

      await expect(service.remove(EVENT_ID)).rejects.toThrow(
        new NotFoundException('Event not found'),
      );
    });
  });
});

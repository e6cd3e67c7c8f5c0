import { Test, TestingModule } from '@nestjs/testing';
import {
  BadRequestException,
  ForbiddenException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ObjectId } from 'mongodb';
import { ApplicationsService, APPROVAL_XP } from './applications.service';
import { AuditLogService } from './audit-log.service';
import { UsersService } from '../users/users.service';
import { ActivityService } from '../users/activity.service';
import { MONGO_DB } from '../mongo/mongo.constants';
import { createDbMock, type DbMock } from '../common/testing/mongo-mock';
import type { UserDocument } from '../users/user.types';
import type { ApplicationDocument } from './application.types';

const APP_ID = '65f0000000000000000000aa';

const applicant: UserDocument = {
  _id: new ObjectId('65f000000000000000000001'),
  discord_id: '4194304',
  username: 'applicant',
  roles: [],
  guild_roles: [],
  xp: 0,
  level: 0,
  badges: [],
};

const manager: UserDocument = {
  ...applicant,
  _id: new ObjectId('65f000000000000000000002'),
  discord_id: '2002',
  username: 'manager',
};

const form = {
  in_game_name: 'NightOwl',
  age: 19,
  country: 'India',
  primary_game: 'Valorant',
  gameplay_hours: 1200,
  rank: 'Diamond',
  experience: 'Three seasons of ranked play in a five stack.',
  reason: 'I want a competitive team where I can improve and learn every week.',
  contribution: 'I can help organize scrims and coach newer players.',
  availability: 25,
};

function pendingApplication(overrides: Partial<ApplicationDocument> = {}): ApplicationDocument {
  return {
    _id: new ObjectId(APP_ID),
    user_id: applicant.discord_id,
    username: applicant.username,
    form_type: 'membership',
    data: { ...form },
    status: 'pending',
    submitted_at: new Date('2026-03-01T00:00:00Z'),
    result_score: 75,
    ai_analysis: {
      score: 75,
      confidence: 0.5,
      recommendation: 'Recommended for approval',
      strengths: [],
      weaknesses: [],
      breakdown: { gameplay_hours: 40, reason: 10, contribution: 15, availability: 10 },
    },
    ...overrides,
  };
}

describe('ApplicationsService', () => {
  let service: ApplicationsService;
  let db: DbMock;
  let usersService: { awardXp: jest.Mock; findByDiscordId: jest.Mock };

  beforeEach(async () => {
    db = createDbMock();
    usersService = {
      awardXp: jest.fn().mockResolvedValue({ xp: 50, level: 0 }),
      findByDiscordId: jest.fn().mockResolvedValue(applicant),
    };
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ApplicationsService,
        AuditLogService,
        ActivityService,
        { provide: UsersService, useValue: usersService },
        { provide: MONGO_DB, useValue: db },
      ],
    }).compile();

    service = module.get(ApplicationsService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('submit', () => {
    it('stores a scored pending application and awards 50 XP', async () => {
      const result = await service.submit(applicant, form);

      const inserted = db.getCollection('applications').insertOne.mock
        .calls[0][0] as ApplicationDocument;
      expect(inserted.status).toBe('pending');
      expect(inserted.result_score).toBe(result.score);
      expect(inserted.data.age).toBe(19);
      expect(usersService.awardXp).toHaveBeenCalledWith(
        applicant.discord_id,
        50,
        'Application submitted',
      );
      expect(result.message).toBe('Application submitted successfully');
      expect(result.application_id).toBe(inserted._id.toHexString());
    });

    it('rejects a second pending application', async () => {
      db.getCollection('applications').findOne.mockResolvedValueOnce(pendingApplication());

      await expect(service.submit(applicant, form)).rejects.toThrow(
        new BadRequestException('You already have a pending application'),
      );
    });

    it('returns field errors for an invalid form', async () => {
      const error: unknown = await service
        .submit(applicant, { ...form, age: 10 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BadRequestException);
      if (error instanceof BadRequestException) {
        expect(error.getResponse()).toEqual({
          message: 'Validation failed',
          errors: { age: 'You must be at least 13 years old' },
        });
      }
    });
  });

  describe('approve', () => {
    it('marks the application approved and awards 100 XP', async () => {
      const applications = db.getCollection('applications');
      applications.findOne.mockResolvedValueOnce(pendingApplication());

      const result = await service.approve(APP_ID, manager, 'Great fit');

      expect(applications.updateOne).toHaveBeenCalledWith(
        { _id: new ObjectId(APP_ID) },
        {
          $set: expect.objectContaining({
            status: 'approved',
            reviewed_by: '2002',
            reviewer_name: 'manager',
            review_notes: 'Great fit',
          }) as unknown,
        },
      );
      expect(usersService.awardXp).toHaveBeenCalledWith(
        applicant.discord_id,
        APPROVAL_XP,
        'Application approved',
      );
      expect(db.getCollection('activity_logs').insertOne).toHaveBeenCalledWith(
        expect.objectContaining({ action: 'application_approved' }) as unknown,
      );
      expect(result.xp_awarded).toBe(100);
    });

    it('refuses applications that are not pending', async () => {
      db.getCollection('applications').findOne.mockResolvedValueOnce(
        pendingApplication({ status: 'rejected' }),
      );

      await expect(service.approve(APP_ID, manager)).rejects.toThrow(
        new BadRequestException('Application is not pending'),
      );
    });

    it('400s a malformed id and 404s an unknown one', async () => {
      await expect(service.approve('nope', manager)).rejects.toThrow(
        new BadRequestException('Invalid application ID'),
      );
      await expect(service.approve(APP_ID, manager)).rejects.toThrow(
        new NotFoundException('Application not found'),
      );
    });
  });

  describe('getOwn', () => {
    it("returns the caller's own application", async () => {
      db.getCollection('applications').findOne.mockResolvedValueOnce(pendingApplication());

      const application = await service.getOwn(APP_ID, applicant.discord_id);

      expect(application.status).toBe('pending');
      expect(db.getCollection('applications').findOne).toHaveBeenCalledWith({
        _id: new ObjectId(APP_ID),
      });
    });

    it("refuses someone else's application", async () => {
      db.getCollection('applications').findOne.mockResolvedValueOnce(pendingApplication());

      await expect(service.getOwn(APP_ID, manager.discord_id)).rejects.toThrow(
        new ForbiddenException('Access denied'),
      );
    });

    it('404s malformed and unknown ids', async () => {
      await expect(service.getOwn('nope', applicant.discord_id)).rejects.toThrow(
        new NotFoundException('Application not found'),
      );
      await expect(service.getOwn(APP_ID, applicant.discord_id)).rejects.toThrow(
        new NotFoundException('Application not found'),
      );
      expect(db.getCollection('applications').findOne).toHaveBeenCalledTimes(1);
    });
  });

  describe('list', () => {
    it('pages results and attaches applicant info', async () => {
      const applications = db.getCollection('applications');
      applications.cursor.toArray.mockResolvedValueOnce([pendingApplication()]);
      applications.countDocuments.mockResolvedValueOnce(41);

      const result = await service.list({ status: 'pending', page: 3, limit: 20 });

      expect(applications.cursor.skip).toHaveBeenCalledWith(40);
      expect(result.total).toBe(41);
      expect(result.pages).toBe(3);
      expect(result.applications[0].in_game_name).toBe('NightOwl');
      expect(result.applications[0].score).toBe(75);
      expect(result.applications[0].user_info?.account_created).toBe(
        '2015-01-01T00:00:00.001Z',
      );
    });
  });

  describe('stats', () => {
    it('computes the approval rate to two decimals', async () => {
      const applications = db.getCollection('applications');
      applications.countDocuments
        .mockResolvedValueOnce(3)
        .mockResolvedValueOnce(1)
        .mockResolvedValueOnce(1)
        .mockResolvedValueOnce(1)
        .mockResolvedValueOnce(2);

      await expect(service.stats()).resolves.toEqual({
        total: 3,
        pending: 1,
        approved: 1,
        rejected: 1,
        recent_week: 2,
        approval_rate: 33.33,
      });
    });
  });
});

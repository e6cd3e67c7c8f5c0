import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ObjectId, type Db, type Filter } from 'mongodb';
import type {
  CreateEventDto,
  EventDto,
  EventListQueryDto,
  EventRegistrationDto,
  UpdateEventDto,
} from '@maestros/contract';
import { COLLECTIONS, MONGO_DB } from '../mongo/mongo.constants';
import { parseObjectId } from '../common/object-id';
import { UsersService } from '../users/users.service';
import { ActivityService } from '../users/activity.service';
import type { UserDocument } from '../users/user.types';
import { toEventDto, type EventDocument } from './event.types';

export const REGISTRATION_XP = 25;
export const MANAGER_LIST_LIMIT = 100;

export interface RegistrationResult extends EventRegistrationDto {
  xp_awarded: number;
  level_up: boolean;
  new_level: number;
  participant_count: number;
}

export interface ManagerEventDto extends EventDto {
  participant_count: number;
}

@Injectable()
export class EventsService {
  private readonly logger = new Logger(EventsService.name);

  constructor(
    @Inject(MONGO_DB) private readonly db: Db,
    private readonly usersService: UsersService,
    private readonly activity: ActivityService,
  ) {}

  private get events() {
    return this.db.collection<EventDocument>(COLLECTIONS.EVENTS);
  }

  async create(dto: CreateEventDto, creator: UserDocument): Promise<{ message: string; event_id: string }> {
    const _id = new ObjectId();
    await this.events.insertOne({
      _id,
      title: dto.title,
      description: dto.description,
      game: dto.game,
      date: new Date(dto.date),
      max_participants: dto.max_participants,
      prize: dto.prize ?? null,
      participants: [],
      winners: [],
      status: 'upcoming',
      created_by: creator.discord_id,
      created_at: new Date(),
    });
    const eventId = _id.toHexString();

    await this.activity.log(
      creator.discord_id,
      'event_created',
      `Created event ${dto.title}`,
      { event_id: eventId, title: dto.title },
    );
    this.logger.log(`Event "${dto.title}" created by ${creator.username}`);
    return { message: 'Event created successfully', event_id: eventId };
  }

  /** Newest first, optionally filtered by status. */
  async list(query: EventListQueryDto): Promise<EventDto[]> {
    const filter: Filter<EventDocument> = query.status ? { status: query.status } : {};
    const rows = await this.events
      .find(filter)
      .sort({ date: -1 })
      .limit(query.limit)
      .toArray();
    return rows.map(toEventDto);
  }

  /** Upcoming events that have not started, soonest first. */
  async findUpcoming(limit: number, now = new Date()): Promise<EventDto[]> {
    const rows = await this.events
      .find({ status: 'upcoming', date: { $gte: now } })
      .sort({ date: 1 })
      .limit(limit)
      .toArray();
    return rows.map(toEventDto);
  }

  async findById(id: string): Promise<EventDocument> {
    const event = await this.events.findOne({
      _id: parseObjectId(id, 'Invalid event ID'),
    });
    if (!event) {
      throw new NotFoundException('Event not found');
    }
    return event;
  }

  async register(
    id: string,
    user: UserDocument,
    now = new Date(),
  ): Promise<RegistrationResult> {
    const event = await this.findById(id);
    const participants = event.participants ?? [];
    this.assertOpenFor(event, user.discord_id, now);

    // Capacity, duplicate and status are re-checked by the write itself.
    const result = await this.events.updateOne(
      {
        _id: event._id,
        status: 'upcoming',
        participants: { $ne: user.discord_id },
        [`participants.${event.max_participants - 1}`]: { $exists: false },
      },
      { $push: { participants: user.discord_id } },
    );
    if (result.modifiedCount === 0) {
      this.assertOpenFor(await this.findById(id), user.discord_id, now);
      throw new BadRequestException('Registration failed, please try again');
    }
    const participantCount = participants.length + 1;

    await this.activity.log(
      user.discord_id,
      'event_registered',
      `Registered for ${event.title}`,
      { event_id: id, event_title: event.title, participant_count: participantCount },
    );
    const award = await this.usersService.awardXp(
      user.discord_id,
      REGISTRATION_XP,
      `Registered for ${event.title}`,
    );
    const newLevel = award?.level ?? user.level;

    return {
      message: 'Registered successfully',
      event_id: id,
      xp_awarded: REGISTRATION_XP,
      level_up: newLevel > user.level,
      new_level: newLevel,
      participant_count: participantCount,
      spots_remaining: event.max_participants - participantCount,
    };
  }

  private assertOpenFor(event: EventDocument, discordId: string, now: Date): void {
    const participants = event.participants ?? [];
    if (participants.includes(discordId)) {
      throw new BadRequestException('Already registered for this event');
    }
    if (participants.length >= event.max_participants) {
      throw new BadRequestException(
        `Event is full (${participants.length}/${event.max_participants} participants)`,
      );
    }
    if (event.status !== 'upcoming') {
      throw new BadRequestException(
        `Event registration closed (status: ${event.status})`,
      );
    }
    if (event.date < now) {
      throw new BadRequestException('Event has already started');
    }
  }

  async unregister(id: string, user: UserDocument): Promise<{ message: string }> {
    const event = await this.findById(id);
    if (!(event.participants ?? []).includes(user.discord_id)) {
      throw new BadRequestException('Not registered for this event');
    }
    await this.events.updateOne(
      { _id: event._id },
      { $pull: { participants: user.discord_id } },
    );
    return { message: 'Unregistered successfully' };
  }

  async update(
    id: string,
    dto: UpdateEventDto,
    editor: UserDocument,
  ): Promise<{ message: string; event: EventDto }> {
    const { date, ...rest } = dto;
    const updated = await this.events.findOneAndUpdate(
      { _id: parseObjectId(id, 'Invalid event ID') },
      {
        $set: {
          ...rest,
          ...(date ? { date: new Date(date) } : {}),
          updated_at: new Date(),
          updated_by: editor.discord_id,
        },
      },
      { returnDocument: 'after' },
    );
    if (!updated) {
      throw new NotFoundException('Event not found');
    }
    return { message: 'Event updated successfully', event: toEventDto(updated) };
  }

  async remove(id: string): Promise<{ message: string }> {
    const result = await this.events.deleteOne({
      _id: parseObjectId(id, 'Invalid event ID'),
    });
    if (result.deletedCount === 0) {
      throw new NotFoundException('Event not found');
    }
    return { message: 'Event deleted successfully' };
  }

  async listForManager(): Promise<{ events: ManagerEventDto[]; count: number }> {
    const rows = await this.events
      .find({})
      .sort({ date: -1 })
      .limit(MANAGER_LIST_LIMIT)
      .toArray();
    const events = rows.map((row) => ({
      ...toEventDto(row),
      participant_count: (row.participants ?? []).length,
    }));
    return { events, count: events.length };
  }
}

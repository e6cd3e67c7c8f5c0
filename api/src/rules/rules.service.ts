import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { ObjectId, type Db, type Filter } from 'mongodb';
import type {
  CreateRuleDto,
  RuleChannelDto,
  RuleDto,
  RuleListQueryDto,
  UpdateRuleDto,
} from '@maestros/contract';
import { COLLECTIONS, MONGO_DB } from '../mongo/mongo.constants';
import { parseObjectId } from '../common/object-id';
import type { UserDocument } from '../users/user.types';
import { RulePublisherService } from './rule-publisher.service';
import { toRuleDto, type RuleDocument } from './rule.types';

export const RULE_LIST_LIMIT = 1000;

export interface RuleList {
  rules: RuleDto[];
  count: number;
}

@Injectable()
export class RulesService {
  constructor(
    @Inject(MONGO_DB) private readonly db: Db,
    private readonly publisher: RulePublisherService,
  ) {}

  private get rules() {
    return this.db.collection<RuleDocument>(COLLECTIONS.RULES);
  }

  async list(query: RuleListQueryDto): Promise<RuleList> {
    const filter: Filter<RuleDocument> = {};
    if (query.active_only === 'true') filter.active = true;
    if (query.category) filter.category = query.category;
    return this.findMany(filter);
  }

  listAll(): Promise<RuleList> {
    return this.findMany({});
  }

  channels(): Promise<RuleChannelDto[]> {
    return this.publisher.listChannels();
  }

  async findById(id: string): Promise<RuleDocument> {
    const rule = await this.rules.findOne({
      _id: parseObjectId(id, 'Invalid rule ID'),
    });
    if (!rule) {
      throw new NotFoundException('Rule not found');
    }
    return rule;
  }

  async create(
    dto: CreateRuleDto,
    creator: UserDocument,
  ): Promise<{ message: string; rule: RuleDto }> {
    const now = new Date();
    const doc: RuleDocument = {
      _id: new ObjectId(),
      title: dto.title,
      content: dto.content,
      category: dto.category,
      order: dto.order,
      active: dto.active,
      discord_channel_id: dto.channel_id ?? null,
      discord_message_id: null,
      created_by: creator.discord_id,
      created_at: now,
      updated_at: now,
    };
    await this.rules.insertOne(doc);

    const rule = await this.syncPost(doc);
    return { message: 'Rule created successfully', rule: toRuleDto(rule) };
  }

  async update(
    id: string,
    dto: UpdateRuleDto,
    editor: UserDocument,
  ): Promise<{ message: string; rule: RuleDto }> {
    const { channel_id: channelId, ...fields } = dto;
    const updated = await this.rules.findOneAndUpdate(
      { _id: parseObjectId(id, 'Invalid rule ID') },
      {
        $set: {
          ...fields,
          ...(channelId ? { discord_channel_id: channelId } : {}),
          updated_at: new Date(),
          updated_by: editor.discord_id,
        },
      },
      { returnDocument: 'after' },
    );
    if (!updated) {
      throw new NotFoundException('Rule not found');
    }

    const rule = await this.syncPost(updated);
    return { message: 'Rule updated successfully', rule: toRuleDto(rule) };
  }

  async remove(id: string): Promise<{ message: string }> {
    const rule = await this.findById(id);
    await this.rules.deleteOne({ _id: rule._id });
    await this.publisher.unpublish(rule);
    return { message: 'Rule deleted successfully' };
  }

  private async findMany(filter: Filter<RuleDocument>): Promise<RuleList> {
    const rows = await this.rules
      .find(filter)
      .sort({ created_at: -1 })
      .limit(RULE_LIST_LIMIT)
      .toArray();
    return { rules: rows.map(toRuleDto), count: rows.length };
  }

  /** Post or edit the Discord copy and remember where it landed. */
  private async syncPost(rule: RuleDocument): Promise<RuleDocument> {
    const posted = await this.publisher.publish(rule);
    if (
      !posted ||
      (posted.channelId === rule.discord_channel_id &&
        posted.messageId === rule.discord_message_id)
    ) {
      return rule;
    }
    await this.rules.updateOne(
      { _id: rule._id },
      {
        $set: {
          discord_channel_id: posted.channelId,
          discord_message_id: posted.messageId,
        },
      },
    );
    return {
      ...rule,
      discord_channel_id: posted.channelId,
      discord_message_id: posted.messageId,
    };
  }
}

import { Module } from '@nestjs/common';
import { RulesService } from './rules.service';
import { RulesController } from './rules.controller';
import { RulePublisherService } from './rule-publisher.service';

@Module({
  controllers: [RulesController],
  providers: [RulesService, RulePublisherService],
})
export class RulesModule {}

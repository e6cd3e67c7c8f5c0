import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { EventsService } from './events.service';
import { EventsController } from './events.controller';

@Module({
  imports: [UsersModule],
  controllers: [EventsController],
  providers: [EventsService],
  exports: [EventsService],
})
export class EventsModule {}

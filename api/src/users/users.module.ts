import { Module } from '@nestjs/common';
import { UsersService } from './users.service';
import { ActivityService } from './activity.service';
import { UsersController } from './users.controller';

@Module({
  controllers: [UsersController],
  providers: [UsersService, ActivityService],
  exports: [UsersService, ActivityService],
})
export class UsersModule {}

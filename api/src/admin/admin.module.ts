import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { ApplicationsModule } from '../applications/applications.module';
import { AdminController } from './admin.controller';
import { AdminService } from './admin.service';

@Module({
  imports: [UsersModule, ApplicationsModule],
  controllers: [AdminController],
  providers: [AdminService],
})
export class AdminModule {}

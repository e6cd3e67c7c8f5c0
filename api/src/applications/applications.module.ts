import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { ApplicationsService } from './applications.service';
import { ApplicationsController } from './applications.controller';
import { AuditLogService } from './audit-log.service';

@Module({
  imports: [UsersModule],
  controllers: [ApplicationsController],
  providers: [ApplicationsService, AuditLogService],
  exports: [ApplicationsService, AuditLogService],
})
export class ApplicationsModule {}

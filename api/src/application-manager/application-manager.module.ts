import { Module } from '@nestjs/common';
import { ApplicationsModule } from '../applications/applications.module';
import { ApplicationManagerController } from './application-manager.controller';
import { ApplicationManagerService } from './application-manager.service';

@Module({
  imports: [ApplicationsModule],
  controllers: [ApplicationManagerController],
  providers: [ApplicationManagerService],
})
export class ApplicationManagerModule {}

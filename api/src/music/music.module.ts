import { Module } from '@nestjs/common';
import { JioSaavnClient } from './jiosaavn.client';
import { MusicController } from './music.controller';
import { MusicService } from './music.service';

@Module({
  controllers: [MusicController],
  providers: [JioSaavnClient, MusicService],
  exports: [MusicService],
})
export class MusicModule {}

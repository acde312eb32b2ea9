import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ChatLog } from '@retail-insights/database';
import { ChatLogService } from './chat-log.service';

@Module({
  imports: [TypeOrmModule.forFeature([ChatLog])],
  providers: [ChatLogService],
  exports: [ChatLogService],
})
export class ChatLogModule {}

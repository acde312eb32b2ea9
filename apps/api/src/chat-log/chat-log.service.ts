import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ChatLog } from '@retail-insights/database';

export const DEFAULT_LOG_PAGE = 20;
export const MAX_LOG_PAGE = 100;

@Injectable()
export class ChatLogService {
  private readonly logger = new Logger(ChatLogService.name);

  constructor(
    @InjectRepository(ChatLog)
    private readonly chatLogRepository: Repository<ChatLog>,
  ) {}

  async append(query: string, response: string): Promise<ChatLog> {
    const entry = this.chatLogRepository.create({ query, response });
    const saved = await this.chatLogRepository.save(entry);
    this.logger.log(`Logged interaction ${saved.id}`);
    return saved;
  }

  recent(limit = DEFAULT_LOG_PAGE): Promise<ChatLog[]> {
    const requested = Number.isFinite(limit) ? Math.trunc(limit) : DEFAULT_LOG_PAGE;
    const take = Math.min(Math.max(requested, 1), MAX_LOG_PAGE);
    return this.chatLogRepository.find({ order: { timestamp: 'DESC', id: 'DESC' }, take });
  }
}

import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { DEFAULT_EMBEDDING_DIMENSIONS, DEFAULT_EMBEDDING_MODEL } from '@retail-insights/database';
import { describeError } from './common/generation-failed.exception';

@Controller('health')
export class HealthController {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
  ) {}

  @Get()
  health() {
    return { ok: true };
  }

  @Get('readiness')
  readiness() {
    const provider = (this.configService.get<string>('LLM_PROVIDER') || 'openai').toLowerCase();
    const keys = [
      { key: 'OPENAI_API_KEY', present: Boolean(this.configService.get<string>('OPENAI_API_KEY')) },
      { key: 'GROQ_API_KEY', present: Boolean(this.configService.get<string>('GROQ_API_KEY')) },
    ];
    const embedding = {
      model: this.configService.get<string>('EMBEDDING_MODEL') || DEFAULT_EMBEDDING_MODEL,
      dimensions: parseInt(this.configService.get<string>('EMBEDDING_DIMENSIONS') || String(DEFAULT_EMBEDDING_DIMENSIONS), 10),
      baseUrl: this.configService.get<string>('EMBEDDING_BASE_URL') || null,
    };
    // Embeddings always need OpenAI; completions need the selected provider's key
    const ok = keys[0].present && (provider !== 'groq' || keys[1].present);
    return { ok, provider, keys, embedding };
  }

  @Get('liveness')
  async liveness() {
    const start = Date.now();
    try {
      await this.dataSource.query('SELECT 1');
      return { ok: true, db: true, latencyMs: Date.now() - start };
    } catch (error) {
      return { ok: false, db: false, latencyMs: Date.now() - start, error: describeError(error) };
    }
  }
}

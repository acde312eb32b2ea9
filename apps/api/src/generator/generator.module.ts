import { Module } from '@nestjs/common';
import { LlmService } from './llm.service';
import { EmbeddingService } from './embedding.service';
import { InsightGeneratorService } from './insight-generator.service';

@Module({
  providers: [LlmService, EmbeddingService, InsightGeneratorService],
  exports: [InsightGeneratorService],
})
export class GeneratorModule {}

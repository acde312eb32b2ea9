import { Injectable } from '@nestjs/common';
import {
  DESCRIBE_MAX_TOKENS,
  DESCRIBE_TEMPERATURE,
  DESCRIPTION_MAX_WORDS,
  EXPLAIN_MAX_TOKENS,
  EXPLAIN_TEMPERATURE,
  GeneratedProductContent,
} from '@retail-insights/database';
import { GenerationFailedException } from '../common/generation-failed.exception';
import { EmbeddingService } from './embedding.service';
import { LlmService } from './llm.service';
import { buildDescribePrompt, buildExplainPrompt } from './prompts';
import { limitWords, normalizeGeneratedText } from './text.utils';

@Injectable()
export class InsightGeneratorService {
  constructor(
    private readonly llm: LlmService,
    private readonly embeddings: EmbeddingService,
  ) {}

  explainProduct(description: string, question?: string): Promise<string> {
    return this.llm.complete(buildExplainPrompt(description, question), {
      maxTokens: EXPLAIN_MAX_TOKENS,
      temperature: EXPLAIN_TEMPERATURE,
    });
  }

  /**
   * Short generated description for a new product, plus its embedding.
   * The description is cut to {@link DESCRIPTION_MAX_WORDS} words before it is embedded.
   */
  async describeNewProduct(productName: string): Promise<GeneratedProductContent> {
    const raw = await this.llm.complete(buildDescribePrompt(productName), {
      maxTokens: DESCRIBE_MAX_TOKENS,
      temperature: DESCRIBE_TEMPERATURE,
    });
    const description = limitWords(normalizeGeneratedText(raw), DESCRIPTION_MAX_WORDS);
    if (!description) {
      throw new GenerationFailedException('completion', 'model returned no usable description');
    }
    const embedding = await this.embeddings.embed(description);
    return { description, embedding };
  }

  embedDescription(description: string): Promise<number[]> {
    return this.embeddings.embed(description);
  }
}

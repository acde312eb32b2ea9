import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OpenAIEmbeddings } from '@langchain/openai';
import { DEFAULT_EMBEDDING_DIMENSIONS, DEFAULT_EMBEDDING_MODEL } from '@retail-insights/database';
import { GenerationFailedException, describeError } from '../common/generation-failed.exception';

@Injectable()
export class EmbeddingService {
  private readonly logger = new Logger(EmbeddingService.name);
  private embedder: OpenAIEmbeddings | null = null;

  constructor(private readonly configService: ConfigService) {}

  get dimensions(): number {
    const raw = this.configService.get<string>('EMBEDDING_DIMENSIONS');
    const parsed = raw ? parseInt(raw, 10) : NaN;
    return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_EMBEDDING_DIMENSIONS;
  }

  get model(): string {
    return this.configService.get<string>('EMBEDDING_MODEL') || DEFAULT_EMBEDDING_MODEL;
  }

  /** Vector for `text`; always exactly {@link dimensions} long. */
  async embed(text: string): Promise<number[]> {
    if (!text.trim()) {
      throw new GenerationFailedException('embedding', 'cannot embed empty text');
    }
    const vector = await this.getEmbedder()
      .embedQuery(text)
      .catch((error: unknown): never => {
        this.logger.warn(`Embedding failed: ${describeError(error)}`);
        throw new GenerationFailedException('embedding', describeError(error));
      });
    if (vector.length !== this.dimensions) {
      throw new GenerationFailedException(
        'embedding',
        `expected ${this.dimensions} dimensions from ${this.model}, got ${vector.length}`,
      );
    }
    return vector;
  }

  private getEmbedder(): OpenAIEmbeddings {
    if (this.embedder) return this.embedder;
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      throw new GenerationFailedException('embedding', 'OPENAI_API_KEY is not configured');
    }
    const baseURL = this.configService.get<string>('EMBEDDING_BASE_URL');
    this.embedder = new OpenAIEmbeddings({
      apiKey,
      model: this.model,
      dimensions: this.dimensions,
      ...(baseURL ? { configuration: { baseURL } } : {}),
    });
    return this.embedder;
  }
}

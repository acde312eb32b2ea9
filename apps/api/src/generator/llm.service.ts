import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { GenerationFailedException, describeError } from '../common/generation-failed.exception';
import { contentToText } from './text.utils';

export interface CompletionOptions {
  maxTokens: number;
  temperature: number;
}

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);
  // One client per sampling profile, built on first use
  private readonly clients = new Map<string, ChatOpenAI>();

  constructor(private readonly configService: ConfigService) {}

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const llm = this.clientFor(options);
    const res = await llm.invoke(prompt).catch((error: unknown): never => {
      this.logger.warn(`Completion failed: ${describeError(error)}`);
      throw new GenerationFailedException('completion', describeError(error));
    });
    const text = contentToText(res.content).trim();
    if (!text) {
      this.logger.warn('Completion returned no text');
      throw new GenerationFailedException('completion', 'model returned an empty response');
    }
    return text;
  }

  get provider(): 'openai' | 'groq' {
    const provider = (this.configService.get<string>('LLM_PROVIDER') || '').toLowerCase();
    return provider === 'groq' ? 'groq' : 'openai';
  }

  private clientFor(options: CompletionOptions): ChatOpenAI {
    const key = `${options.maxTokens}:${options.temperature}`;
    let client = this.clients.get(key);
    if (!client) {
      client = this.buildLlm(options);
      this.clients.set(key, client);
    }
    return client;
  }

  private buildLlm({ maxTokens, temperature }: CompletionOptions): ChatOpenAI {
    if (this.provider === 'groq') {
      const model = this.configService.get<string>('GROQ_MODEL') || 'llama-3.1-8b-instant';
      return new ChatOpenAI({
        model,
        temperature,
        maxTokens,
        apiKey: this.configService.get<string>('GROQ_API_KEY'),
        configuration: { baseURL: GROQ_BASE_URL },
      });
    }
    const model = this.configService.get<string>('OPENAI_MODEL') || 'gpt-4o-mini';
    return new ChatOpenAI({ model, temperature, maxTokens, apiKey: this.configService.get<string>('OPENAI_API_KEY') });
  }
}

import { BadGatewayException } from '@nestjs/common';

export type GenerationStage = 'completion' | 'embedding';

/**
 * Raised when the hosted language model or the embedding API fails,
 * times out, or returns something unusable. Maps to HTTP 502.
 */
export class GenerationFailedException extends BadGatewayException {
  constructor(
    readonly stage: GenerationStage,
    readonly detail: string,
  ) {
    super({
      statusCode: 502,
      error: 'Generation Failed',
      stage,
      message: `${stage === 'completion' ? 'Language model' : 'Embedding'} request failed: ${detail}`,
    });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}

import { ConfigService } from '@nestjs/config';

/** ConfigService stand-in that only sees the given values, never process.env. */
export function configWith(values: Record<string, string | undefined>): ConfigService {
  return {
    get: jest.fn((key: string) => values[key]),
  } as unknown as ConfigService;
}

import { ConfigService } from '@nestjs/config';
import { ThrottlerModuleOptions } from '@nestjs/throttler';

// Limits for the routes that call the hosted model or embedding API
export const MODEL_ROUTE_THROTTLE = { default: { limit: 30, ttl: 60000 } };

/** RATE_LIMIT_TTL is read in seconds; the throttler counts in milliseconds. */
export function throttlerOptions(config: ConfigService): ThrottlerModuleOptions {
  const ttlSeconds = parseInt(config.get<string>('RATE_LIMIT_TTL') || '60', 10);
  const limit = parseInt(config.get<string>('RATE_LIMIT_LIMIT') || '60', 10);
  return { throttlers: [{ ttl: ttlSeconds * 1000, limit }] };
}

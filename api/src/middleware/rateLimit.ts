/**
 * Rate Limiting Middleware
 *
 * Per-IP limits on the routes that reach the language-model or transcription
 * provider. Returns 429 Too Many Requests when the limit is exceeded.
 */

import type { Context, MiddlewareHandler, Next } from 'hono';
import type { HonoEnv } from '@/types/hono';
import {
  consumeRateLimit,
  getRateLimitKey,
  type RateLimitTier,
} from '@/services/rateLimit.service';

export function clientIp(c: Context): string | undefined {
  return c.req.header('x-forwarded-for')?.split(',')[0].trim() || c.req.header('x-real-ip');
}

export function rateLimit(tier: RateLimitTier): MiddlewareHandler<HonoEnv> {
  return async (c: Context<HonoEnv>, next: Next) => {
    const result = await consumeRateLimit(`${tier}:${getRateLimitKey(clientIp(c))}`, tier);

    c.header('X-RateLimit-Limit', String(result.limit));
    c.header('X-RateLimit-Remaining', String(result.remainingPoints));
    c.header('X-RateLimit-Reset', String(result.resetTime));

    if (!result.allowed) {
      c.header('Retry-After', String(result.retryAfter ?? 60));

      return c.json(
        {
          error: {
            code: 'RATE_LIMIT_EXCEEDED',
            message: 'Too many requests. Please try again later.',
            details: { retryAfter: result.retryAfter, tier },
          },
        },
        429,
      );
    }

    return next();
  };
}

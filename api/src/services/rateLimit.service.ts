/**
 * Rate Limiting Service
 *
 * Per-IP limits in front of the routes that cost a provider call.
 *
 * Strategy:
 * - In-memory store (single process; a shared store would be needed behind a balancer)
 * - One limiter per tier
 *
 * Rate Limits:
 * - Chat (text and voice replies): 30 req/min
 * - Audio (transcription uploads): 10 req/min
 * - General (history, quotes): 120 req/min
 */

import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { logger } from '@/utils/logger';

export enum RateLimitTier {
  CHAT = 'chat',
  AUDIO = 'audio',
  GENERAL = 'general',
}

const RATE_LIMIT_CONFIG: Record<RateLimitTier, { points: number; duration: number; blockDuration: number }> = {
  [RateLimitTier.CHAT]: {
    points: 30, // 30 requests
    duration: 60, // per 60 seconds
    blockDuration: 60, // block for 1 minute after violation
  },
  [RateLimitTier.AUDIO]: {
    points: 10,
    duration: 60,
    blockDuration: 120,
  },
  [RateLimitTier.GENERAL]: {
    points: 120,
    duration: 60,
    blockDuration: 30,
  },
};

function createLimiters(): Record<RateLimitTier, RateLimiterMemory> {
  return {
    [RateLimitTier.CHAT]: new RateLimiterMemory(RATE_LIMIT_CONFIG[RateLimitTier.CHAT]),
    [RateLimitTier.AUDIO]: new RateLimiterMemory(RATE_LIMIT_CONFIG[RateLimitTier.AUDIO]),
    [RateLimitTier.GENERAL]: new RateLimiterMemory(RATE_LIMIT_CONFIG[RateLimitTier.GENERAL]),
  };
}

let rateLimiters = createLimiters();

export interface RateLimitResult {
  allowed: boolean;
  tier: RateLimitTier;
  limit: number;
  remainingPoints: number;
  resetTime: number; // Unix timestamp when limit resets
  retryAfter?: number; // Seconds to wait before retry
}

/**
 * Consume a rate limit point for a given key and tier
 */
export async function consumeRateLimit(key: string, tier: RateLimitTier): Promise<RateLimitResult> {
  const config = RATE_LIMIT_CONFIG[tier];

  try {
    const result = await rateLimiters[tier].consume(key);

    return {
      allowed: true,
      tier,
      limit: config.points,
      remainingPoints: result.remainingPoints,
      resetTime: Math.floor((Date.now() + result.msBeforeNext) / 1000),
    };
  } catch (error) {
    if (error instanceof RateLimiterRes) {
      return {
        allowed: false,
        tier,
        limit: config.points,
        remainingPoints: 0,
        resetTime: Math.floor((Date.now() + error.msBeforeNext) / 1000),
        retryAfter: Math.ceil(error.msBeforeNext / 1000),
      };
    }

    // Unknown error - fail open (allow request but log)
    logger.error('Rate limiter error', { error: String(error) });
    return {
      allowed: true,
      tier,
      limit: config.points,
      remainingPoints: config.points,
      resetTime: Math.floor(Date.now() / 1000) + config.duration,
    };
  }
}

export function getRateLimitKey(ip: string | undefined): string {
  return `ip:${ip || 'unknown'}`;
}

/**
 * Reset all rate limiters (for testing only)
 */
export function resetAllRateLimits(): void {
  rateLimiters = createLimiters();
}

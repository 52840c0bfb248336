// rate-limiter.ts
// Reactive rate limiting for the market API: go fast until a 429, then wait out the window

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  resetTimestamp: number; // Unix timestamp in seconds
}

export type HeaderMap = Record<string, string | string[] | undefined>;

/**
 * Default fallback wait time when headers are missing (in seconds)
 */
export const DEFAULT_RATE_LIMIT_WAIT = 10;

function headerValue(headers: HeaderMap, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Parse rate limit headers from a 429 response
 */
export function parseRateLimitHeaders(headers: HeaderMap): RateLimitInfo | null {
  const limit = headerValue(headers, 'ratelimit-limit');
  const remaining = headerValue(headers, 'ratelimit-remaining');
  const reset = headerValue(headers, 'ratelimit-reset');

  if (limit === undefined || remaining === undefined || reset === undefined) {
    return null;
  }

  const info = {
    limit: parseInt(limit, 10),
    remaining: parseInt(remaining, 10),
    resetTimestamp: parseInt(reset, 10),
  };

  return Number.isNaN(info.resetTimestamp) ? null : info;
}

/**
 * Calculate how many seconds to wait based on rate limit info
 */
export function calculateWaitTime(rateLimitInfo: RateLimitInfo, nowMs: number = Date.now()): number {
  const nowSeconds = Math.floor(nowMs / 1000);
  const waitSeconds = rateLimitInfo.resetTimestamp - nowSeconds;
  // 1 second buffer, never less than 1 second
  return Math.max(1, waitSeconds + 1);
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

import type { Request, Response, NextFunction } from 'express';
import { RATE_LIMIT_CONFIG } from '../config.js';

// ============================================================================
// SIMPLE IN-MEMORY RATE LIMITER
// Sliding window per client IP, applied to ledger-mutating routes
// ============================================================================

const requestStore = new Map<string, number[]>(); // IP -> request timestamps

// Periodic cleanup of old entries; unref'd so it never keeps the process alive
const cleanupTimer = setInterval(() => {
  const cutoff = Date.now() - RATE_LIMIT_CONFIG.windowMs;

  for (const [ip, timestamps] of requestStore) {
    const recent = timestamps.filter(timestamp => timestamp > cutoff);
    if (recent.length === 0) {
      requestStore.delete(ip);
    } else {
      requestStore.set(ip, recent);
    }
  }
}, RATE_LIMIT_CONFIG.cleanupIntervalMs);
cleanupTimer.unref();

export function resetRateLimiter(): void {
  requestStore.clear();
}

/**
 * Rate limiting middleware
 * Limits requests per IP address using sliding window
 */
export function rateLimiter(req: Request, res: Response, next: NextFunction): void {
  const ip = req.ip || 'unknown';
  const now = Date.now();
  const windowStart = now - RATE_LIMIT_CONFIG.windowMs;

  const recent = (requestStore.get(ip) ?? []).filter(timestamp => timestamp > windowStart);

  if (recent.length >= RATE_LIMIT_CONFIG.maxRequests) {
    const retryAfterMs = recent[0] + RATE_LIMIT_CONFIG.windowMs - now;
    const retryAfterSec = Math.ceil(retryAfterMs / 1000);

    requestStore.set(ip, recent);
    res.status(429).json({
      error: 'Too many requests',
      message: `Rate limit exceeded. Maximum ${RATE_LIMIT_CONFIG.maxRequests} requests per ${RATE_LIMIT_CONFIG.windowMs / 1000} seconds.`,
      retryAfter: retryAfterSec,
    });
    return;
  }

  recent.push(now);
  requestStore.set(ip, recent);
  next();
}

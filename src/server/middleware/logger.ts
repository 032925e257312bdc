import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { RequestMetadata } from '../types/logging.js';

export const CALLER_HEADER = 'x-caller-address';

// Extend Express Request type to include metadata
declare global {
  namespace Express {
    interface Request {
      metadata?: RequestMetadata;
    }
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) return value[0];
  return value;
}

export function loggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  // Generate or retrieve session ID from cookie/header
  const cookies: Record<string, string | undefined> | undefined = req.cookies;
  let sessionId = cookies?.session_id || headerValue(req.headers['x-session-id']);

  if (!sessionId) {
    sessionId = uuidv4();
    // Set session cookie (expires in 24 hours)
    res.cookie('session_id', sessionId, {
      maxAge: 24 * 60 * 60 * 1000,
      httpOnly: true,
      sameSite: 'strict'
    });
  }

  // Extract IP address (handle proxies)
  const ip = (
    headerValue(req.headers['x-forwarded-for']) ||
    headerValue(req.headers['x-real-ip']) ||
    req.socket.remoteAddress ||
    'unknown'
  ).split(',')[0].trim();

  const userAgent = req.headers['user-agent'] || 'unknown';

  // Caller identity is resolved upstream (wallet gateway / relayer) and forwarded as a header
  const caller = headerValue(req.headers[CALLER_HEADER])?.trim() || undefined;

  req.metadata = {
    session_id: sessionId,
    ip_address: ip,
    user_agent: userAgent,
    caller,
  };

  next();
}

/**
 * Reject requests that carry no caller identity
 */
export function requireCaller(req: Request, res: Response, next: NextFunction): void {
  if (!req.metadata?.caller) {
    res.status(401).json({
      error: 'Unauthenticated',
      message: `Missing ${CALLER_HEADER} header`,
    });
    return;
  }
  next();
}

import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';
import { logger } from '../core/logger';

const getClientKey = (req: Request): string => {
  const userId = req.session?.user?.id;
  if (userId) {
    return `user:${userId}`;
  }
  return req.ip || 'unknown';
};

export const globalRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 300,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: getClientKey,
  validate: false,
  handler: (req: Request, res: Response) => {
    logger.warn(`[RateLimit] Global limit exceeded for ${getClientKey(req)} on ${req.path}`);
    res.status(429).json({ error: 'Too many requests. Please slow down.' });
  },
  skip: (req) => req.path === '/healthz' || !req.path.startsWith('/api'),
});

export const reservationRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 30,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: getClientKey,
  validate: false,
  handler: (req: Request, res: Response) => {
    logger.warn(`[RateLimit] Reservation limit exceeded for ${getClientKey(req)} on ${req.path}`);
    res.status(429).json({ error: 'Too many reservation requests. Please wait a moment.' });
  }
});

// Scanning is done by operators at the station; a burst usually means a stuck scanner
export const scanRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 60,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: getClientKey,
  validate: false,
  handler: (req: Request, res: Response) => {
    logger.warn(`[RateLimit] Scan limit exceeded for ${getClientKey(req)} on ${req.path}`);
    res.status(429).json({ error: 'Too many scan requests. Please wait.' });
  }
});

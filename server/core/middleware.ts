import session from 'express-session';
import connectPg from 'connect-pg-simple';
import type { RequestHandler } from 'express';
import type { UserRole } from '../../shared/constants/statuses';
import { getSessionUser } from '../types/session';
import { config, isProduction } from './config';
import { pool } from './db';
import { logger } from './logger';

const SESSION_TTL_SECONDS = 30 * 24 * 60 * 60;

export function getSession(): RequestHandler {
  const cookie = {
    httpOnly: true,
    secure: isProduction,
    sameSite: 'lax' as const,
    maxAge: SESSION_TTL_SECONDS * 1000,
  };

  if (!config.SESSION_SECRET) {
    if (isProduction) {
      throw new Error('[Session] FATAL: SESSION_SECRET is required in production.');
    }
    logger.warn('[Session] SESSION_SECRET is missing - using development fallback');
    return session({
      secret: `dev-only-fallback-secret-${Date.now()}`,
      resave: false,
      saveUninitialized: false,
      cookie,
    });
  }

  if (!config.DATABASE_URL) {
    logger.info('[Session] Using MemoryStore');
    return session({ secret: config.SESSION_SECRET, resave: false, saveUninitialized: false, cookie });
  }

  const PgStore = connectPg(session);
  logger.info('[Session] Using Postgres session store');
  return session({
    secret: config.SESSION_SECRET,
    store: new PgStore({
      pool,
      createTableIfMissing: true,
      ttl: SESSION_TTL_SECONDS,
      tableName: 'sessions',
      errorLog: (err: Error) => {
        logger.error('[Session Store] Error', { error: err });
      },
    }),
    resave: false,
    saveUninitialized: false,
    cookie,
  });
}

export const isAuthenticated: RequestHandler = (req, res, next) => {
  if (!getSessionUser(req)) {
    return res.status(401).json({ error: 'Unauthorized' });
  }
  return next();
};

/**
 * Admit only callers whose session role is one of `roles`.
 */
export function requireRoles(...roles: UserRole[]): RequestHandler {
  return (req, res, next) => {
    const user = getSessionUser(req);
    if (!user) {
      return res.status(401).json({ error: 'Unauthorized' });
    }
    if (!roles.includes(user.role)) {
      logger.warn('[Auth] Role not permitted for route', {
        requestId: req.requestId,
        path: req.path,
        userId: user.id,
        extra: { role: user.role, allowed: roles },
      });
      return res.status(403).json({ error: 'Forbidden: insufficient role' });
    }
    return next();
  };
}

export const requireAdmin = requireRoles('admin', 'backoffice');

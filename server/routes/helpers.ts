import type { Request, Response } from 'express';
import type { z, ZodTypeAny } from 'zod';
import { createErrorResponse, logAndRespond, logger } from '../core/logger';
import { isReservationError } from '../core/reservationService/errors';
import { getSessionUser, isAdminUser, type SessionUser } from '../types/session';

export type ParseOutcome<T> = { ok: true; data: T } | { ok: false; message: string };

export function parseInput<S extends ZodTypeAny>(schema: S, input: unknown): ParseOutcome<z.output<S>> {
  const parseResult = schema.safeParse(input);
  if (!parseResult.success) {
    const firstError = parseResult.error.issues[0];
    const field = firstError?.path.join('.');
    const message = firstError ? (field ? `${field}: ${firstError.message}` : firstError.message) : 'Invalid input';
    return { ok: false, message };
  }
  return { ok: true, data: parseResult.data };
}

/**
 * Translate an engine failure into its HTTP status; anything else is an
 * unexpected fault and is logged with the request context.
 */
export function respondWithServiceError(req: Request, res: Response, error: unknown, fallbackMessage: string) {
  if (isReservationError(error)) {
    if (error.kind === 'consistency') {
      logger.error(`[API Error] ${error.message}`, {
        requestId: req.requestId,
        method: req.method,
        path: req.path,
        error,
        extra: error.details,
      });
    }
    return res.status(error.statusCode).json(createErrorResponse(req, error.message, error.kind));
  }
  return logAndRespond(req, res, 500, fallbackMessage, error);
}

export function requireSessionUser(req: Request, res: Response): SessionUser | undefined {
  const user = getSessionUser(req);
  if (!user) {
    res.status(401).json(createErrorResponse(req, 'Authentication required'));
    return undefined;
  }
  return user;
}

export function canActForUser(user: SessionUser, userId: string): boolean {
  return isAdminUser(user) || user.id === userId;
}

export function respondForbidden(req: Request, res: Response, message = 'You do not have access to this resource') {
  return res.status(403).json(createErrorResponse(req, message, 'forbidden'));
}

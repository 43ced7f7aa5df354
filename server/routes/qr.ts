import { Router, type Request, type Response } from 'express';
import QRCode from 'qrcode';
import { z } from 'zod';
import { requireRoles } from '../core/middleware';
import { logger } from '../core/logger';
import type { ReservationEngine } from '../core/reservationService';
import { scanRateLimiter } from '../middleware/rateLimiting';
import { isAdminUser } from '../types/session';
import { getErrorMessage } from '../utils/errorUtils';
import { parseInput, requireSessionUser, respondForbidden, respondWithServiceError } from './helpers';

const scanRequestSchema = z.object({
  qrPayload: z.string().trim().min(1, 'qrPayload is required'),
});

/**
 * Render a scan token as a PNG data URI. The token is still usable without the image.
 */
export async function generateQrDataUri(token: string): Promise<string | null> {
  try {
    return await QRCode.toDataURL(token, {
      width: 300,
      margin: 2,
      color: { dark: '#000000', light: '#FFFFFF' },
    });
  } catch (error: unknown) {
    logger.error('[QR] Failed to render scan token image', { error: getErrorMessage(error) });
    return null;
  }
}

export function createQrRouter(engine: ReservationEngine): Router {
  const router = Router();
  const { scanTokens, sessions } = engine;
  const operatorOrStaff = requireRoles('admin', 'backoffice', 'station_operator');

  router.post('/api/qr/generate/:bookingId', requireRoles('ev_owner', 'admin', 'backoffice'), async (req: Request, res: Response) => {
    const user = requireSessionUser(req, res);
    if (!user) return;

    try {
      const booking = await sessions.getBooking(req.params.bookingId);
      if (!isAdminUser(user) && booking.userId !== user.id) {
        return respondForbidden(req, res, 'You can only generate a QR code for your own booking');
      }
      const issued = await scanTokens.issue(booking.id);
      const qrImage = await generateQrDataUri(issued.token);
      res.json({
        bookingId: issued.bookingId,
        qrPayload: issued.token,
        qrImage,
        generatedAt: issued.payload.generatedAt,
      });
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to generate QR code');
    }
  });

  router.post('/api/qr/scan', operatorOrStaff, scanRateLimiter, async (req: Request, res: Response) => {
    const parsed = parseInput(scanRequestSchema, req.body);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.message });
    }

    try {
      res.json(await scanTokens.scan(parsed.data.qrPayload));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to scan QR code');
    }
  });

  router.post('/api/qr/checkin', requireRoles('station_operator'), scanRateLimiter, async (req: Request, res: Response) => {
    const parsed = parseInput(scanRequestSchema, req.body);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.message });
    }

    try {
      const booking = await sessions.checkIn(parsed.data.qrPayload);
      res.json({
        success: true,
        bookingId: booking.id,
        status: booking.status,
        checkInTime: booking.checkInTime?.toISOString() ?? null,
      });
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to check in');
    }
  });

  return router;
}

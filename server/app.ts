import express, { type Express } from 'express';
import { getSession } from './core/middleware';
import { logger, logRequest, requestIdMiddleware } from './core/logger';
import { queryWithRetry } from './core/db';
import type { ReservationEngine } from './core/reservationService';
import { globalRateLimiter } from './middleware/rateLimiting';
import { createOperatorRouter } from './routes/operators';
import { createQrRouter } from './routes/qr';
import { createReservationRouter } from './routes/reservations';
import { createStationRouter } from './routes/stations';
import { getErrorMessage } from './utils/errorUtils';

export function createApp(engine: ReservationEngine): Express {
  const app = express();

  app.get('/healthz', (req, res) => {
    res.status(200).send('OK');
  });

  app.set('trust proxy', 1);
  app.disable('x-powered-by');
  app.use((req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'SAMEORIGIN');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    next();
  });

  app.use(requestIdMiddleware);
  app.use(logRequest);
  app.use(express.json({ limit: '100kb' }));
  app.use(getSession());
  app.use(globalRateLimiter);

  app.get('/api/health', async (req, res) => {
    try {
      const dbResult = await queryWithRetry<{ time: Date }>('SELECT NOW() as time');
      res.json({
        status: 'ok',
        database: 'connected',
        timestamp: dbResult.rows[0]?.time,
        uptime: process.uptime(),
      });
    } catch (error: unknown) {
      logger.error('[Health] Database check failed', { error: getErrorMessage(error) });
      res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  app.use(createReservationRouter(engine));
  app.use(createOperatorRouter(engine));
  app.use(createQrRouter(engine));
  app.use(createStationRouter(engine));

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'Not found', requestId: req.requestId });
  });

  return app;
}

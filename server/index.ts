import http from 'http';
import type { Server } from 'http';
import { config } from './core/config';
import { pool } from './core/db';
import { logger } from './core/logger';
import { createReservationEngine, DrizzleChargingStore } from './core/reservationService';
import { db } from './db';
import { createApp } from './app';
import { systemClock } from './utils/dateUtils';
import { getErrorMessage } from './utils/errorUtils';

let isShuttingDown = false;
let httpServer: Server | null = null;

process.on('uncaughtException', (error) => {
  logger.error('[Process] Uncaught Exception', { error });
  if (error.message.includes('EADDRINUSE')) {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason) => {
  logger.error('[Process] Unhandled Rejection', { error: getErrorMessage(reason) });
});

process.on('SIGTERM', () => {
  logger.info('[Process] Received SIGTERM signal');
  void gracefulShutdown('SIGTERM');
});

process.on('SIGINT', () => {
  logger.info('[Process] Received SIGINT signal');
  void gracefulShutdown('SIGINT');
});

async function closeServer(server: Server): Promise<void> {
  await new Promise<void>((resolve) => {
    server.close(() => resolve());
    setTimeout(resolve, 5000).unref();
  });
}

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info(`[Shutdown] Starting graceful shutdown (${signal})...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('[Shutdown] Timeout exceeded, forcing exit');
    process.exit(1);
  }, 30000);

  try {
    if (httpServer) {
      await closeServer(httpServer);
    }
    await pool.end();
    clearTimeout(shutdownTimeout);
    logger.info('[Shutdown] Complete');
    process.exit(0);
  } catch (error: unknown) {
    logger.error('[Shutdown] Error', { error: getErrorMessage(error) });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

const engine = createReservationEngine({
  store: new DrizzleChargingStore(db),
  clock: systemClock,
  timeZone: config.STATION_TIMEZONE,
});

httpServer = http.createServer(createApp(engine));

httpServer.listen(config.PORT, '0.0.0.0', () => {
  logger.info(`[Startup] HTTP server listening on port ${config.PORT}`, {
    extra: {
      environment: config.NODE_ENV,
      database: config.DATABASE_URL ? 'configured' : 'MISSING',
      stationTimeZone: config.STATION_TIMEZONE,
    },
  });
});

httpServer.on('error', (err: unknown) => {
  logger.error('[Startup] Server failed to start', { error: getErrorMessage(err) });
  process.exit(1);
});

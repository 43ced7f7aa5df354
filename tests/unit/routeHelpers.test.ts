import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import express from 'express';
import type { Server } from 'http';
import { z } from 'zod';

vi.mock('../../server/core/logger', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../server/core/logger')>();
  return {
    ...actual,
    logger: {
      info: vi.fn(),
      error: vi.fn(),
      warn: vi.fn()
    }
  };
});

import { logger } from '../../server/core/logger';
import { conflict, consistencyFailure, notFound } from '../../server/core/reservationService/errors';
import { canActForUser, parseInput, respondWithServiceError } from '../../server/routes/helpers';
import type { SessionUser } from '../../server/types/session';

describe('Route Input Parsing', () => {
  const schema = z.object({
    chargingStationId: z.string().min(1),
    window: z.object({ startTime: z.coerce.date() }),
  });

  it('should return the parsed data on success', () => {
    const outcome = parseInput(schema, { chargingStationId: 'station-a', window: { startTime: '2026-03-04T03:30:00.000Z' } });
    expect(outcome).toEqual({
      ok: true,
      data: { chargingStationId: 'station-a', window: { startTime: new Date('2026-03-04T03:30:00.000Z') } },
    });
  });

  it('should prefix the first issue with its field path', () => {
    const outcome = parseInput(schema, { chargingStationId: 'station-a', window: {} });
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.message.startsWith('window.startTime: ')).toBe(true);
    }
  });

  it('should report a root-level issue without a path', () => {
    const outcome = parseInput(z.string(), 42);
    expect(outcome).toEqual({ ok: false, message: 'Expected string, received number' });
  });
});

describe('Acting On Behalf Of Users', () => {
  const owner: SessionUser = { id: 'owner-1', email: 'owner-1@example.com', role: 'ev_owner' };
  const staff: SessionUser = { id: 'staff-1', email: 'staff-1@example.com', role: 'backoffice' };

  it('should let owners act only for themselves', () => {
    expect(canActForUser(owner, 'owner-1')).toBe(true);
    expect(canActForUser(owner, 'owner-2')).toBe(false);
  });

  it('should let staff act for anyone', () => {
    expect(canActForUser(staff, 'owner-2')).toBe(true);
  });
});

describe('Service Error Responses', () => {
  let server: Server;
  let baseUrl = '';

  beforeAll(async () => {
    const app = express();
    app.get('/missing', (req, res) => {
      respondWithServiceError(req, res, notFound('Reservation not found.'), 'Failed to load reservation');
    });
    app.get('/taken', (req, res) => {
      respondWithServiceError(req, res, conflict('The charging station is already reserved for the selected time period.'), 'Failed to create reservation');
    });
    app.get('/broken', (req, res) => {
      respondWithServiceError(req, res, consistencyFailure('Reservation was not persisted with its operator and booking.'), 'Failed to create reservation');
    });
    app.get('/crash', (req, res) => {
      respondWithServiceError(req, res, new Error('connection refused'), 'Failed to load reservation');
    });

    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address && typeof address === 'object') {
      baseUrl = `http://127.0.0.1:${address.port}`;
    }
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  });

  it('should map a missing record to 404 with its kind', async () => {
    const response = await fetch(`${baseUrl}/missing`);
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Reservation not found.', code: 'not_found' });
  });

  it('should map a conflict to 409', async () => {
    const response = await fetch(`${baseUrl}/taken`);
    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({
      error: 'The charging station is already reserved for the selected time period.',
      code: 'conflict',
    });
  });

  it('should log and return 500 for a consistency failure', async () => {
    const response = await fetch(`${baseUrl}/broken`);
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: 'Reservation was not persisted with its operator and booking.',
      code: 'consistency',
    });
    expect(logger.error).toHaveBeenCalledWith(
      '[API Error] Reservation was not persisted with its operator and booking.',
      expect.objectContaining({ method: 'GET', path: '/broken' })
    );
  });

  it('should hide unexpected errors behind the fallback message', async () => {
    const response = await fetch(`${baseUrl}/crash`);
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Failed to load reservation' });
  });
});

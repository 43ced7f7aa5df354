import { describe, it, expect, vi } from 'vitest';

vi.mock('../../server/core/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn()
  }
}));

import { createReservationEngine } from '../../server/core/reservationService';
import { ReservationError } from '../../server/core/reservationService/errors';
import {
  decodeScanToken,
  describeBookingValidity,
  encodeScanToken,
  type ScanTokenPayload,
} from '../../server/core/reservationService/scanToken';
import type { BookingStatus } from '../../shared/constants/statuses';
import { fixedClock } from '../../server/utils/dateUtils';
import { MemoryChargingStore } from '../helpers/memoryChargingStore';

const TZ = 'Asia/Colombo';
const NOW = new Date('2026-03-02T02:30:00.000Z');
const START = new Date('2026-03-04T09:00:00+05:30');
const END = new Date('2026-03-04T10:00:00+05:30');

async function setup() {
  const store = new MemoryChargingStore();
  store.addStation({ id: 'station-a', name: 'Harbour Road Charging Hub', address: '12 Harbour Road, Colombo' });
  store.addUser({ id: 'owner-1', name: 'Nimali Perera', nic: '199012345678V', phone: '0771234567' });
  store.addOperator({ id: 'op-a', stationId: 'station-a', userId: 'op-user-a' });
  const engine = createReservationEngine({ store, clock: fixedClock(NOW), timeZone: TZ });
  const engineAt = (instant: Date) => createReservationEngine({ store, clock: fixedClock(instant), timeZone: TZ });
  const reservation = await engine.reservations.createReservation({
    userId: 'owner-1',
    chargingStationId: 'station-a',
    startTime: START,
    endTime: END,
  });
  return { store, engine, engineAt, reservation };
}

function encoded(raw: string): string {
  return `QR_${Buffer.from(raw, 'utf8').toString('base64')}`;
}

async function failure(promise: Promise<unknown>): Promise<ReservationError> {
  try {
    await promise;
  } catch (error: unknown) {
    if (error instanceof ReservationError) return error;
    throw error;
  }
  throw new Error('Expected the operation to fail');
}

const samplePayload: ScanTokenPayload = {
  bookingId: 'booking-1',
  userId: 'owner-1',
  stationId: 'station-a',
  stationName: 'Harbour Road Charging Hub',
  stationAddress: '12 Harbour Road, Colombo',
  ownerName: 'Nimali Perera',
  ownerNic: '199012345678V',
  ownerPhone: '0771234567',
  reservationDateTime: '2026-03-04T03:30:00.000Z',
  status: 'approved',
  createdAt: '2026-03-02T02:30:00.000Z',
  generatedAt: '2026-03-02T02:30:00.000Z',
};

describe('Scan Token Encoding', () => {
  it('should prefix the encoded payload and append the issue time in unix seconds', () => {
    const token = encodeScanToken(samplePayload, NOW);
    expect(token.startsWith('QR_')).toBe(true);

    const raw = Buffer.from(token.slice(3), 'base64').toString('utf8');
    expect(raw).toBe(`${JSON.stringify(samplePayload)}_${Math.floor(NOW.getTime() / 1000)}`);
  });

  it('should decode a token back to its payload', () => {
    expect(decodeScanToken(encodeScanToken(samplePayload, NOW))).toEqual(samplePayload);
  });

  it.each([
    ['a token without the prefix', 'ABC123'],
    ['an empty body', 'QR_'],
    ['a body that is not base64', 'QR_not base64!'],
    ['a body without a timestamp suffix', encoded('{"bookingId":"booking-1"}')],
    ['a body with a non-numeric suffix', encoded('{"bookingId":"booking-1"}_later')],
  ])('should reject %s as a malformed token', (_label, token) => {
    expect(() => decodeScanToken(token)).toThrowError('Invalid scan token format');
  });

  it('should reject a body whose payload is not JSON', () => {
    expect(() => decodeScanToken(encoded('booking-1_1772418600'))).toThrowError('Invalid scan token data format');
  });

  it('should reject a payload missing required fields', () => {
    expect(() => decodeScanToken(encoded('{"bookingId":"booking-1"}_1772418600'))).toThrowError('Invalid scan token data format');
  });

  it.each<[BookingStatus, boolean, string]>([
    ['pending', true, 'Booking is awaiting confirmation'],
    ['approved', true, 'Booking is confirmed and ready'],
    ['in_progress', true, 'Charging session is already active'],
    ['cancelled', false, 'Booking has been cancelled'],
    ['completed', false, 'Booking has already been completed'],
    ['no_show', true, 'Booking status is valid'],
  ])('should describe a %s booking', (status, isValid, message) => {
    expect(describeBookingValidity(status)).toEqual({ isValid, message });
  });
});

describe('ScanTokenService', () => {
  it('should issue a token carrying a snapshot of the booking', async () => {
    const { engine } = await setup();

    const issued = await engine.scanTokens.issue('booking-1');

    expect(issued.bookingId).toBe('booking-1');
    expect(issued.payload).toEqual(samplePayload);
    expect(decodeScanToken(issued.token)).toEqual(samplePayload);
  });

  it('should record the token on the booking and on the reservation', async () => {
    const { store, engine, reservation } = await setup();

    const issued = await engine.scanTokens.issue('booking-1');

    expect((await store.findBookingById('booking-1'))?.qrCode).toBe(issued.token);
    expect((await store.findReservationById(reservation.id))?.qrCode).toBe(issued.token);
  });

  it('should report issuing for an unknown booking as not found', async () => {
    const { engine } = await setup();
    const error = await failure(engine.scanTokens.issue('booking-x'));
    expect(error.kind).toBe('not_found');
  });

  it('should validate a freshly issued token for an approved booking', async () => {
    const { engine } = await setup();
    const issued = await engine.scanTokens.issue('booking-1');

    const result = await engine.scanTokens.scan(issued.token);

    expect(result).toEqual({
      bookingId: 'booking-1',
      stationName: 'Harbour Road Charging Hub',
      stationAddress: '12 Harbour Road, Colombo',
      ownerName: 'Nimali Perera',
      ownerNic: '199012345678V',
      reservationDateTime: '2026-03-04T03:30:00.000Z',
      status: 'approved',
      isValid: true,
      validationMessage: 'Booking is confirmed and ready',
    });
  });

  it('should keep snapshot fields from issue time but read the status live', async () => {
    const { store, engine, reservation } = await setup();
    const issued = await engine.scanTokens.issue('booking-1');
    const station = store.stations.get('station-a');
    if (station) station.name = 'Renamed Hub';
    await engine.reservations.cancelReservation(reservation.id);

    const result = await engine.scanTokens.scan(issued.token);

    expect(result.stationName).toBe('Harbour Road Charging Hub');
    expect(result.status).toBe('cancelled');
    expect(result.isValid).toBe(false);
    expect(result.validationMessage).toBe('Booking has been cancelled');
  });

  it('should reject a token that has been replaced by a newer one', async () => {
    const { engine, engineAt } = await setup();
    const first = await engine.scanTokens.issue('booking-1');
    await engineAt(new Date(NOW.getTime() + 60 * 1000)).scanTokens.issue('booking-1');

    const error = await failure(engine.scanTokens.scan(first.token));
    expect(error.kind).toBe('validation');
    expect(error.message).toBe('Token does not match current booking record');
  });

  it('should report a token for a deleted booking as not found', async () => {
    const { engine, reservation } = await setup();
    const issued = await engine.scanTokens.issue('booking-1');
    await engine.reservations.deleteReservation(reservation.id);

    const error = await failure(engine.scanTokens.scan(issued.token));
    expect(error.kind).toBe('not_found');
    expect(error.message).toBe('Booking not found');
  });

  it('should report a malformed token as a validation failure', async () => {
    const { engine } = await setup();
    const error = await failure(engine.scanTokens.scan('QR_%%%'));
    expect(error.kind).toBe('validation');
  });
});

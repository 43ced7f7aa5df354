import { z } from 'zod';
import type { Booking } from '../../../shared/schema';
import { BOOKING_STATUSES, type BookingStatus } from '../../../shared/constants/statuses';
import { logger } from '../logger';
import type { Clock } from '../../utils/dateUtils';
import { notFound, validationFailure } from './errors';
import type { ChargingStore } from './store';

export const SCAN_TOKEN_PREFIX = 'QR_';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export const scanTokenPayloadSchema = z.object({
  bookingId: z.string().min(1),
  userId: z.string(),
  stationId: z.string(),
  stationName: z.string(),
  stationAddress: z.string(),
  ownerName: z.string(),
  ownerNic: z.string(),
  ownerPhone: z.string(),
  reservationDateTime: z.string().datetime(),
  status: z.enum(BOOKING_STATUSES),
  createdAt: z.string().datetime(),
  generatedAt: z.string().datetime(),
});

export type ScanTokenPayload = z.infer<typeof scanTokenPayloadSchema>;

export function encodeScanToken(payload: ScanTokenPayload, issuedAt: Date): string {
  const unixSeconds = Math.floor(issuedAt.getTime() / 1000);
  const raw = `${JSON.stringify(payload)}_${unixSeconds}`;
  return `${SCAN_TOKEN_PREFIX}${Buffer.from(raw, 'utf8').toString('base64')}`;
}

export function decodeScanToken(token: string): ScanTokenPayload {
  if (!token.startsWith(SCAN_TOKEN_PREFIX)) {
    throw validationFailure('Invalid scan token format');
  }
  const encoded = token.slice(SCAN_TOKEN_PREFIX.length);
  if (!encoded || !BASE64_PATTERN.test(encoded)) {
    throw validationFailure('Invalid scan token format');
  }

  const raw = Buffer.from(encoded, 'base64').toString('utf8');
  const separator = raw.lastIndexOf('_');
  if (separator <= 0 || !/^\d+$/.test(raw.slice(separator + 1))) {
    throw validationFailure('Invalid scan token format');
  }

  let json: unknown;
  try {
    json = JSON.parse(raw.slice(0, separator));
  } catch {
    throw validationFailure('Invalid scan token data format');
  }

  const parsed = scanTokenPayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw validationFailure('Invalid scan token data format');
  }
  return parsed.data;
}

export function describeBookingValidity(status: BookingStatus): { isValid: boolean; message: string } {
  switch (status) {
    case 'pending':
      return { isValid: true, message: 'Booking is awaiting confirmation' };
    case 'approved':
      return { isValid: true, message: 'Booking is confirmed and ready' };
    case 'in_progress':
      return { isValid: true, message: 'Charging session is already active' };
    case 'cancelled':
      return { isValid: false, message: 'Booking has been cancelled' };
    case 'completed':
      return { isValid: false, message: 'Booking has already been completed' };
    default:
      return { isValid: true, message: 'Booking status is valid' };
  }
}

export interface IssuedScanToken {
  bookingId: string;
  token: string;
  payload: ScanTokenPayload;
}

export interface ScanResult {
  bookingId: string;
  stationName: string;
  stationAddress: string;
  ownerName: string;
  ownerNic: string;
  reservationDateTime: string;
  status: BookingStatus;
  isValid: boolean;
  validationMessage: string;
}

export class ScanTokenService {
  constructor(private readonly deps: { store: ChargingStore; clock: Clock }) {}

  /**
   * Issue a fresh token for the booking, replacing any earlier one on the
   * booking and on its paired reservation.
   */
  async issue(bookingId: string, store: ChargingStore = this.deps.store): Promise<IssuedScanToken> {
    const booking = await store.findBookingById(bookingId);
    if (!booking) {
      throw notFound('Booking not found', { bookingId });
    }
    const station = await store.findStationById(booking.stationId);
    if (!station) {
      throw notFound('Charging station not found', { stationId: booking.stationId });
    }
    const owner = await store.findUserById(booking.userId);
    if (!owner) {
      throw notFound('EV owner not found', { userId: booking.userId });
    }

    const generatedAt = this.deps.clock.now();
    const payload: ScanTokenPayload = {
      bookingId: booking.id,
      userId: owner.id,
      stationId: station.id,
      stationName: station.name,
      stationAddress: station.address,
      ownerName: owner.name,
      ownerNic: owner.nic ?? '',
      ownerPhone: owner.phone ?? '',
      reservationDateTime: booking.reservationAt.toISOString(),
      status: booking.status,
      createdAt: booking.createdAt.toISOString(),
      generatedAt: generatedAt.toISOString(),
    };
    const token = encodeScanToken(payload, generatedAt);

    await store.updateBooking(booking.id, { qrCode: token, updatedAt: generatedAt });
    const reservation = await store.findReservationByBookingId(booking.id);
    if (reservation) {
      await store.updateReservation(reservation.id, { qrCode: token, updatedAt: generatedAt });
    }

    logger.info('[ScanToken] Issued scan token', {
      bookingId: booking.id,
      reservationId: reservation?.id,
      stationId: station.id,
    });
    return { bookingId: booking.id, token, payload };
  }

  /**
   * Validate a presented token against the live booking. Token-derived fields
   * describe the booking as it was at issue time; status is read live.
   */
  async scan(token: string): Promise<ScanResult> {
    const payload = decodeScanToken(token);
    const booking = await this.deps.store.findBookingById(payload.bookingId);
    if (!booking) {
      throw notFound('Booking not found', { bookingId: payload.bookingId });
    }

    const validity = describeBookingValidity(booking.status);
    if (booking.qrCode !== token) {
      throw validationFailure('Token does not match current booking record', { bookingId: booking.id });
    }

    return {
      bookingId: booking.id,
      stationName: payload.stationName,
      stationAddress: payload.stationAddress,
      ownerName: payload.ownerName,
      ownerNic: payload.ownerNic,
      reservationDateTime: payload.reservationDateTime,
      status: booking.status,
      isValid: validity.isValid,
      validationMessage: validity.message,
    };
  }

  /**
   * Resolve the booking a token refers to without requiring it to be the latest issued token.
   */
  async resolveBooking(token: string, store: ChargingStore = this.deps.store): Promise<Booking> {
    const payload = decodeScanToken(token);
    const booking = await store.findBookingById(payload.bookingId);
    if (!booking) {
      throw notFound('Booking not found', { bookingId: payload.bookingId });
    }
    return booking;
  }
}

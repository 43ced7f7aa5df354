import { DEFAULT_STATION_TIMEZONE, systemClock, type Clock } from '../../utils/dateUtils';
import { ReservationLifecycleService } from './lifecycle';
import { OperatorDirectory } from './operatorDirectory';
import { ScanTokenService } from './scanToken';
import { SessionService } from './sessionService';
import { SlotProjector } from './slotProjector';
import type { ChargingStore } from './store';

export * from './errors';
export * from './policy';
export type { ChargingStore } from './store';
export { DrizzleChargingStore } from './drizzleStore';
export { windowsOverlap, hasConflict } from './timeWindow';
export { findAvailableOperator } from './operatorMatcher';
export { encodeScanToken, decodeScanToken, describeBookingValidity } from './scanToken';
export type { ScanResult, ScanTokenPayload, IssuedScanToken } from './scanToken';
export type { CreateReservationInput, ReservationPatch, LifecycleOptions } from './lifecycle';
export { completeSessionSchema } from './sessionService';
export type { CompleteSessionInput, SessionCaller } from './sessionService';
export { createOperatorSchema, updateOperatorSchema } from './operatorDirectory';
export type { BookingSessionView } from './sessionView';
export type { StationSlot } from './slotProjector';

export interface ReservationEngine {
  reservations: ReservationLifecycleService;
  operators: OperatorDirectory;
  scanTokens: ScanTokenService;
  sessions: SessionService;
  slots: SlotProjector;
}

export interface ReservationEngineOptions {
  store: ChargingStore;
  clock?: Clock;
  timeZone?: string;
}

export function createReservationEngine(options: ReservationEngineOptions): ReservationEngine {
  const store = options.store;
  const clock = options.clock ?? systemClock;
  const timeZone = options.timeZone ?? DEFAULT_STATION_TIMEZONE;

  const scanTokens = new ScanTokenService({ store, clock });
  const reservations = new ReservationLifecycleService({ store, clock, timeZone, scanTokens });
  return {
    reservations,
    operators: new OperatorDirectory({ store, clock, timeZone }),
    scanTokens,
    sessions: new SessionService({ store, clock, scanTokens, lifecycle: reservations }),
    slots: new SlotProjector({ store, clock, timeZone }),
  };
}

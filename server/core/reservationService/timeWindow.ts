import type { Reservation } from '../../../shared/schema';
import { isTerminalReservationStatus } from '../../../shared/constants/statuses';
import type { ChargingStore } from './store';

export interface TimeWindow {
  start: Date;
  end: Date;
}

/**
 * Whether a candidate window collides with an existing one. A window may start
 * exactly where another ends, but a candidate ending exactly where an existing
 * window ends still counts, as does one that covers the existing window.
 */
export function windowsOverlap(candidate: TimeWindow, existing: TimeWindow): boolean {
  const cs = candidate.start.getTime();
  const ce = candidate.end.getTime();
  const es = existing.start.getTime();
  const ee = existing.end.getTime();

  const startsInside = cs >= es && cs < ee;
  const endsInside = ce > es && ce <= ee;
  const covers = cs <= es && ce >= ee;
  return startsInside || endsInside || covers;
}

export function findConflictingReservation(
  existing: Reservation[],
  stationId: string,
  candidate: TimeWindow,
  excludeReservationId?: string
): Reservation | undefined {
  return existing.find(reservation =>
    reservation.chargingStationId === stationId &&
    reservation.id !== excludeReservationId &&
    !isTerminalReservationStatus(reservation.status) &&
    windowsOverlap(candidate, { start: reservation.startTime, end: reservation.endTime })
  );
}

/**
 * Check a candidate window against every open reservation at the station.
 * Must be called under the station's exclusive section when the answer guards a write.
 */
export async function hasConflict(
  store: ChargingStore,
  stationId: string,
  candidateStart: Date,
  candidateEnd: Date,
  excludeReservationId?: string
): Promise<boolean> {
  const open = await store.listOpenReservationsAtStation(stationId);
  const conflicting = findConflictingReservation(
    open,
    stationId,
    { start: candidateStart, end: candidateEnd },
    excludeReservationId
  );
  return conflicting !== undefined;
}

import type { Operator } from '../../../shared/schema';
import { logger } from '../logger';
import { getZonedMinutesOfDay, formatZonedDateTime } from '../../utils/dateUtils';
import { isWithinWorkingHours } from './policy';
import type { ChargingStore } from './store';

/**
 * First active operator of the station, in creation order, who works at the
 * instant and holds no open booking starting at exactly that instant.
 */
export async function findAvailableOperator(
  store: ChargingStore,
  stationId: string,
  instant: Date,
  timeZone: string
): Promise<Operator | undefined> {
  const minutes = getZonedMinutesOfDay(instant, timeZone);
  if (!isWithinWorkingHours(minutes)) {
    logger.warn('[OperatorMatcher] Requested time is outside operator working hours', {
      stationId,
      extra: { localTime: formatZonedDateTime(instant, timeZone), timeZone },
    });
    return undefined;
  }

  const candidates = await store.listOperatorsByStation(stationId, { activeOnly: true });
  for (const candidate of candidates) {
    const openBookings = await store.countOpenBookingsForOperatorAt(candidate.id, instant);
    if (openBookings === 0) {
      return candidate;
    }
  }

  logger.warn('[OperatorMatcher] Every active operator is booked at the requested time', {
    stationId,
    extra: { candidates: candidates.length, instant: instant.toISOString() },
  });
  return undefined;
}

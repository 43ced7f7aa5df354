import type { Clock } from '../../utils/dateUtils';
import {
  addDaysToDate,
  createZonedDate,
  getDayName,
  isValidDateString,
  minutesToTime,
} from '../../utils/dateUtils';
import { notFound, validationFailure } from './errors';
import { SLOT_DURATION_MINUTES, WORKING_BLOCKS } from './policy';
import type { ChargingStore } from './store';

export interface SlotWindow {
  start: Date;
  end: Date;
}

export interface StationSlot extends SlotWindow {
  remainingCapacity: number;
  isBookable: boolean;
}

/**
 * One-hour slots covering the working blocks of a station-local date.
 */
export function buildSlotGrid(dateStr: string, timeZone: string): SlotWindow[] {
  const slots: SlotWindow[] = [];
  for (const block of WORKING_BLOCKS) {
    for (let minute = block.start; minute + SLOT_DURATION_MINUTES <= block.end; minute += SLOT_DURATION_MINUTES) {
      slots.push({
        start: createZonedDate(dateStr, minutesToTime(minute), timeZone),
        end: createZonedDate(dateStr, minutesToTime(minute + SLOT_DURATION_MINUTES), timeZone),
      });
    }
  }
  return slots;
}

export class SlotProjector {
  constructor(private readonly deps: { store: ChargingStore; clock: Clock; timeZone: string }) {}

  /**
   * Slots of a station for a local date. The station schedule only gates whether
   * the day is open; slot boundaries always follow the operator working blocks.
   */
  async getStationSlots(stationId: string, dateStr: string): Promise<StationSlot[]> {
    const { store, clock, timeZone } = this.deps;
    if (!isValidDateString(dateStr)) {
      throw validationFailure('Date must be in YYYY-MM-DD format.', { stationId });
    }

    const station = await store.findStationById(stationId);
    if (!station || !station.isActive) {
      throw notFound('Charging station not found.', { stationId });
    }

    const dayName = getDayName(dateStr).toLowerCase();
    const daySchedule = station.schedule.find(entry => entry.dayOfWeek.toLowerCase() === dayName);
    if (!daySchedule || !daySchedule.isOpen) {
      return [];
    }

    const dayStart = createZonedDate(dateStr, '00:00', timeZone);
    const dayEnd = createZonedDate(addDaysToDate(dateStr, 1), '00:00', timeZone);
    const booked = await store.listBookingsAtStation(station.id, dayStart, dayEnd);
    const now = clock.now().getTime();

    return buildSlotGrid(dateStr, timeZone).map(slot => {
      const bookedCount = booked.filter(booking => booking.reservationAt.getTime() === slot.start.getTime()).length;
      const remainingCapacity = station.totalSlots - bookedCount;
      return {
        ...slot,
        remainingCapacity,
        isBookable: remainingCapacity > 0 && slot.start.getTime() > now,
      };
    });
  }
}

import { parseTimeToMinutes } from '../../utils/dateUtils';

// Operator shift, in station wall-clock time
export const OPERATOR_WORKING_HOURS = {
  start: '09:00',
  end: '18:00',
  lunchStart: '12:00',
  lunchEnd: '13:00',
} as const;

export const MODIFICATION_LOCKOUT_HOURS = 12;
export const ADVANCE_BOOKING_DAYS = 7;
export const SLOT_DURATION_MINUTES = 60;
export const DEFAULT_SESSION_HOURS = 1;
export const MAX_SESSION_ENERGY_KWH = 1000;

export interface MinuteRange {
  start: number;
  end: number;
}

/**
 * Bookable working blocks of a day: the shift with the lunch break cut out.
 */
export const WORKING_BLOCKS: readonly MinuteRange[] = [
  { start: parseTimeToMinutes(OPERATOR_WORKING_HOURS.start), end: parseTimeToMinutes(OPERATOR_WORKING_HOURS.lunchStart) },
  { start: parseTimeToMinutes(OPERATOR_WORKING_HOURS.lunchEnd), end: parseTimeToMinutes(OPERATOR_WORKING_HOURS.end) },
];

export function isWithinWorkingHours(minutesOfDay: number): boolean {
  return WORKING_BLOCKS.some(block => minutesOfDay >= block.start && minutesOfDay < block.end);
}

export function describeWorkingHours(): string {
  const { start, end, lunchStart, lunchEnd } = OPERATOR_WORKING_HOURS;
  return `${start}-${end} (excluding ${lunchStart}-${lunchEnd} lunch break)`;
}

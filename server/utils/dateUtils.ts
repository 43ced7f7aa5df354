/**
 * Station Timezone Utilities
 *
 * Instants are stored in UTC. Working hours, lunch breaks and slot grids are
 * wall-clock rules, so every policy check converts through the station timezone.
 */

export const DEFAULT_STATION_TIMEZONE = 'Asia/Colombo';

export const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

const MS_PER_MINUTE = 60 * 1000;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * A clock frozen at the given instant
 */
export function fixedClock(instant: Date | string): Clock {
  const frozen = new Date(instant);
  return { now: () => new Date(frozen.getTime()) };
}

export interface ZonedDateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
}

/**
 * Get wall-clock date parts of an instant in the given timezone
 */
export function getZonedDateParts(instant: Date, timeZone: string): ZonedDateParts {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23'
  });
  const parts = formatter.formatToParts(instant);
  const get = (type: string) => parseInt(parts.find(p => p.type === type)?.value || '0', 10);
  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour'),
    minute: get('minute')
  };
}

/**
 * Minutes since local midnight (0-1439) of an instant in the given timezone
 */
export function getZonedMinutesOfDay(instant: Date, timeZone: string): number {
  const { hour, minute } = getZonedDateParts(instant, timeZone);
  return hour * 60 + minute;
}

/**
 * Format an instant as YYYY-MM-DD in the given timezone
 */
export function formatZonedDate(instant: Date, timeZone: string): string {
  return instant.toLocaleDateString('en-CA', { timeZone });
}

/**
 * Format an instant as "YYYY-MM-DD HH:MM" in the given timezone
 */
export function formatZonedDateTime(instant: Date, timeZone: string): string {
  const { year, month, day, hour, minute } = getZonedDateParts(instant, timeZone);
  const pad = (n: number) => n.toString().padStart(2, '0');
  return `${year}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}`;
}

/**
 * UTC offset ("+05:30", "-07:00") of a timezone on a given YYYY-MM-DD date.
 * Sampled at noon UTC so a midnight DST switch does not pick the wrong side.
 */
export function getZoneOffset(dateStr: string, timeZone: string): string {
  const [year, month, day] = dateStr.split('-').map(Number);
  const targetDate = new Date(Date.UTC(year, month - 1, day, 12, 0, 0));

  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    timeZoneName: 'shortOffset'
  });
  const offsetPart = formatter.formatToParts(targetDate).find(p => p.type === 'timeZoneName')?.value || 'GMT';

  // "GMT+5:30", "GMT-7" or plain "GMT"
  const offsetMatch = offsetPart.match(/GMT([+-])(\d{1,2})(?::(\d{2}))?/);
  if (!offsetMatch) {
    return '+00:00';
  }
  const sign = offsetMatch[1];
  const hours = offsetMatch[2].padStart(2, '0');
  const minutes = offsetMatch[3] ?? '00';
  return `${sign}${hours}:${minutes}`;
}

/**
 * ISO timestamp for a wall-clock date (YYYY-MM-DD) and time (HH:MM or HH:MM:SS) in a timezone
 */
export function getZonedISOString(dateStr: string, timeStr: string, timeZone: string): string {
  const normalizedTime = timeStr.length === 5 ? `${timeStr}:00` : timeStr;
  return `${dateStr}T${normalizedTime}${getZoneOffset(dateStr, timeZone)}`;
}

export function createZonedDate(dateStr: string, timeStr: string, timeZone: string): Date {
  return new Date(getZonedISOString(dateStr, timeStr, timeZone));
}

/**
 * Add days to a YYYY-MM-DD date string, returning a new YYYY-MM-DD string
 */
export function addDaysToDate(dateStr: string, days: number): string {
  const [year, month, day] = dateStr.split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day + days));
  return date.toISOString().split('T')[0];
}

export function isValidDateString(dateStr: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(dateStr)) return false;
  const [year, month, day] = dateStr.split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Day of week (0 = Sunday) for a YYYY-MM-DD date using Zeller's congruence (timezone-agnostic)
 */
export function getDayOfWeek(dateStr: string): number {
  const [y, m, day] = dateStr.split('-').map(Number);
  let year = y;
  let month = m;
  // Zeller counts January and February as months 13 and 14 of the previous year
  if (month < 3) {
    month += 12;
    year -= 1;
  }
  const k = year % 100;
  const j = Math.floor(year / 100);
  const h = (day + Math.floor(13 * (month + 1) / 5) + k + Math.floor(k / 4) + Math.floor(j / 4) - 2 * j) % 7;
  // Zeller: 0 = Saturday
  return ((h + 6) % 7);
}

export function getDayName(dateStr: string): typeof DAY_NAMES[number] {
  return DAY_NAMES[getDayOfWeek(dateStr)];
}

export function parseTimeToMinutes(time: string | null | undefined): number {
  if (!time) return 0;
  const parts = time.split(':').map(Number);
  return (parts[0] || 0) * 60 + (parts[1] || 0);
}

export function minutesToTime(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}`;
}

export function addHours(instant: Date, hours: number): Date {
  return new Date(instant.getTime() + hours * MS_PER_HOUR);
}

export function addDays(instant: Date, days: number): Date {
  return addHours(instant, days * 24);
}

/**
 * Whole minutes elapsed between two instants, never negative
 */
export function minutesBetween(from: Date, to: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / MS_PER_MINUTE));
}

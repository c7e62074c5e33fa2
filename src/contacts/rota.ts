import type { Contact } from '../config/loader.js';

export const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/**
 * Weekly duty rota from the `[schedule]` table: one contact per weekday, read
 * in `timeZone`. A weekday without an entry has nobody on duty.
 */
export interface DutyRota {
  readonly timeZone: string;
  readonly days: Readonly<Partial<Record<Weekday, Contact>>>;
}

export function parseWeekday(name: string): Weekday | undefined {
  const normalized = name.trim().toLowerCase();
  return WEEKDAYS.find((day) => day === normalized);
}

export function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

/**
 * Weekday of `date` on the wall clock of `timeZone`.
 */
export function weekdayIn(date: Date, timeZone: string): Weekday {
  const name = new Intl.DateTimeFormat('en-US', { weekday: 'long', timeZone }).format(date);
  const weekday = parseWeekday(name);
  if (!weekday) {
    throw new RangeError(`Unexpected weekday name "${name}" for ${timeZone}`);
  }
  return weekday;
}

export function rotaContactFor(rota: DutyRota, date: Date): Contact | undefined {
  return rota.days[weekdayIn(date, rota.timeZone)];
}

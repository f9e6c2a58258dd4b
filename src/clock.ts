const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that always reports the same instant
 */
export function fixedClock(date: Date): Clock {
  return { now: () => new Date(date.getTime()) };
}

/**
 * Move a date back by whole calendar days, keeping its local time of day
 */
export function subtractDays(date: Date, days: number): Date {
  const result = new Date(date.getTime());
  result.setDate(result.getDate() - days);
  return result;
}

export function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/**
 * Whole wall-clock days from `then` to `now`, floored
 */
export function ageInDays(now: Date, then: Date): number {
  return Math.floor((wallClockMs(now) - wallClockMs(then)) / MS_PER_DAY);
}

// Local components read as UTC so DST shifts do not change the day count
function wallClockMs(date: Date): number {
  const utc = new Date(0);
  utc.setUTCFullYear(date.getFullYear(), date.getMonth(), date.getDate());
  utc.setUTCHours(date.getHours(), date.getMinutes(), date.getSeconds(), date.getMilliseconds());
  return utc.getTime();
}

/**
 * ISO calendar-date helpers. All dates are `YYYY-MM-DD` strings in UTC.
 */

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export interface Clock {
  now: () => Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_RE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && toIsoDate(parsed) === value;
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function parseIsoDate(value: string): Date {
  return new Date(`${value}T00:00:00Z`);
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDate(new Date(parseIsoDate(isoDate).getTime() + days * DAY_MS));
}

/**
 * Every calendar day from `start` to `end`, both inclusive.
 */
export function dailyRange(start: string, end: string): string[] {
  const dates: string[] = [];
  const endTs = parseIsoDate(end).getTime();
  for (let ts = parseIsoDate(start).getTime(); ts <= endTs; ts += DAY_MS) {
    dates.push(toIsoDate(new Date(ts)));
  }
  return dates;
}

export function todayIso(clock: Clock = systemClock): string {
  return toIsoDate(clock.now());
}

/**
 * Calendar helpers. Dates travel as ISO `YYYY-MM-DD` strings and are
 * manipulated in UTC so that no host timezone leaks into the arithmetic.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

function toUtc(date: string): Date {
  if (!isIsoDate(date)) {
    throw new RangeError(`Invalid ISO date: ${date}`);
  }
  return new Date(`${date}T00:00:00Z`);
}

function fromUtc(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  return fromUtc(new Date(toUtc(date).getTime() + days * DAY_MS));
}

/** `2024-03-04` -> `20240304`, the form the upstream query parameters take. */
export function toCompactDate(date: string): string {
  return date.replaceAll('-', '');
}

export function firstOfMonth(date: string): string {
  return `${date.slice(0, 7)}-01`;
}

export function firstOfPreviousMonth(date: string): string {
  const d = toUtc(firstOfMonth(date));
  d.setUTCMonth(d.getUTCMonth() - 1);
  return fromUtc(d);
}

/** Inclusive list of every calendar day between `start` and `end`. */
export function eachDay(start: string, end: string): string[] {
  const days: string[] = [];
  for (let day = start; day <= end; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}

/** Mondays in `[start, end]`. */
export function eachMonday(start: string, end: string): string[] {
  return eachDay(start, end).filter((day) => toUtc(day).getUTCDay() === 1);
}

export interface MarketTime {
  date: string;
  hour: number;
}

/** Local calendar date and hour of `now` in `timeZone`. */
export function marketTime(now: Date, timeZone: string): MarketTime {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? '';

  return {
    date: `${part('year')}-${part('month')}-${part('day')}`,
    hour: Number(part('hour')),
  };
}

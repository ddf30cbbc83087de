/**
 * Default date-parsing collaborator. Turns short human date expressions into
 * absolute ISO timestamps, relative to an injected clock.
 *
 * Supports: now/today/tomorrow/yesterday, relative (+6h/+3d/+2w/+1m),
 * "in N minutes|hours|days|weeks", day-of-week names (mon-sunday),
 * month+day (jan15), yyyy-MM-dd and full ISO date-times. Calendar math is
 * done in UTC.
 */
import { ParseError } from '../errors.js';
import { systemClock, type Clock, type DateParser } from '../model.js';

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

const RELATIVE_RE = /^\+(\d+)([hdwm])$/;
const IN_RE = /^in (\d+) (minute|hour|day|week)s?$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)\s?(\d{1,2})$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATETIME_RE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

const DAY_MAP: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const MONTH_MAP: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3,
  may: 4, jun: 5, jul: 6, aug: 7,
  sep: 8, oct: 9, nov: 10, dec: 11,
};

const UNIT_MS: Record<string, number> = {
  minute: MINUTE_MS,
  hour: HOUR_MS,
  day: DAY_MS,
  week: 7 * DAY_MS,
};

function addMonths(ms: number, n: number): number {
  const d = new Date(ms);
  d.setUTCMonth(d.getUTCMonth() + n);
  return d.getTime();
}

function tryRelative(input: string, now: number): number | null {
  const m = RELATIVE_RE.exec(input);
  if (!m) return null;
  const count = Number(m[1]);
  switch (m[2]) {
    case 'h': return now + count * HOUR_MS;
    case 'd': return now + count * DAY_MS;
    case 'w': return now + count * 7 * DAY_MS;
    case 'm': return addMonths(now, count);
    default: return null;
  }
}

function tryIn(input: string, now: number): number | null {
  const m = IN_RE.exec(input);
  if (!m) return null;
  const unit = UNIT_MS[m[2]];
  return unit === undefined ? null : now + Number(m[1]) * unit;
}

function tryDayOfWeek(input: string, now: number): number | null {
  if (!Object.hasOwn(DAY_MAP, input)) return null;
  const target = DAY_MAP[input];
  let daysUntil = (target - new Date(now).getUTCDay() + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // next week if today
  return now + daysUntil * DAY_MS;
}

function tryMonthDay(input: string, now: number): number | null {
  const m = MONTH_DAY_RE.exec(input);
  if (!m) return null;
  const month = MONTH_MAP[m[1]];
  const day = Number(m[2]);
  if (month === undefined) return null;

  const year = new Date(now).getUTCFullYear();
  const candidate = new Date(Date.UTC(year, month, day));
  // rejects feb30 and friends
  if (candidate.getUTCMonth() !== month || candidate.getUTCDate() !== day) return null;

  const todayStart = Math.floor(now / DAY_MS) * DAY_MS;
  if (candidate.getTime() < todayStart) candidate.setUTCFullYear(year + 1);
  return candidate.getTime();
}

function tryIsoDate(input: string): number | null {
  const m = ISO_DATE_RE.exec(input);
  if (!m) return null;
  const [y, mo, d] = [Number(m[1]), Number(m[2]) - 1, Number(m[3])];
  const ms = Date.UTC(y, mo, d);
  const back = new Date(ms);
  if (back.getUTCFullYear() !== y || back.getUTCMonth() !== mo || back.getUTCDate() !== d) return null;
  return ms;
}

function tryIsoDateTime(input: string): number | null {
  const match = ISO_DATETIME_RE.exec(input);
  if (!match) return null;
  // no offset: read as UTC, not host-local
  const text = input.replace(' ', 'T') + (match[3] ? '' : 'Z');
  const ms = Date.parse(text);
  return Number.isNaN(ms) ? null : ms;
}

export function parseDateText(input: string, now: number): string {
  const normalized = input.trim().toLowerCase().replace(/\s+/g, ' ');

  let ms: number | null;
  switch (normalized) {
    case 'now':
    case 'today':
      ms = now;
      break;
    case 'tomorrow':
      ms = now + DAY_MS;
      break;
    case 'yesterday':
      ms = now - DAY_MS;
      break;
    default:
      ms =
        tryRelative(normalized, now) ??
        tryIn(normalized, now) ??
        tryDayOfWeek(normalized, now) ??
        tryMonthDay(normalized, now) ??
        tryIsoDate(normalized) ??
        tryIsoDateTime(input.trim());
  }

  // out-of-range results (e.g. +99999999d) are invalid Dates
  const date = ms === null ? null : new Date(ms);
  if (!date || Number.isNaN(date.getTime())) throw new ParseError(input);
  return date.toISOString();
}

export function createDateParser(opts: { clock?: Clock } = {}): DateParser {
  const clock = opts.clock ?? systemClock;
  return { parse: (text) => parseDateText(text, clock.now()) };
}

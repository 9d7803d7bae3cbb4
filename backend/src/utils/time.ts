import { InvalidInputError } from './errors.js';

export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

export interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const getZonedFormatter = (timeZone: string): Intl.DateTimeFormat => {
  const cached = formatterCache.get(timeZone);
  if (cached) {
    return cached;
  }
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  formatterCache.set(timeZone, formatter);
  return formatter;
};

export const isValidTimeZone = (value: string | null | undefined): value is string => {
  if (typeof value !== 'string' || !value.trim()) {
    return false;
  }
  try {
    getZonedFormatter(value.trim());
    return true;
  } catch {
    return false;
  }
};

export const wallClockInTimeZone = (epochMs: number, timeZone: string): WallClock => {
  const parts = getZonedFormatter(timeZone).formatToParts(new Date(epochMs));
  const pick = (type: Intl.DateTimeFormatPartTypes): number => Number(parts.find((part) => part.type === type)?.value);
  return {
    year: pick('year'),
    month: pick('month'),
    day: pick('day'),
    hour: pick('hour'),
    minute: pick('minute'),
    second: pick('second'),
  };
};

const wallClockAsUtcMs = ({ year, month, day, hour, minute, second }: WallClock): number =>
  Date.UTC(year, month - 1, day, hour, minute, second);

const zoneOffsetMs = (epochMs: number, timeZone: string): number => {
  const wholeSecondMs = epochMs - (((epochMs % 1000) + 1000) % 1000);
  return wallClockAsUtcMs(wallClockInTimeZone(wholeSecondMs, timeZone)) - wholeSecondMs;
};

// Wall-clock times inside a DST gap resolve forward; repeated wall-clock times resolve to the earlier instant.
export const zonedWallClockToUtcMs = (clock: WallClock, timeZone: string): number => {
  const naive = wallClockAsUtcMs(clock);
  const beforeOffset = zoneOffsetMs(naive - MS_PER_DAY, timeZone);
  const afterOffset = zoneOffsetMs(naive + MS_PER_DAY, timeZone);
  const candidates = [naive - beforeOffset, naive - afterOffset]
    .filter((candidate) => zoneOffsetMs(candidate, timeZone) === naive - candidate);
  if (candidates.length) {
    return Math.min(...candidates);
  }
  return naive - beforeOffset;
};

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

export const formatLocalDateKey = (clock: WallClock): string => `${pad(clock.year, 4)}/${pad(clock.month)}/${pad(clock.day)}`;

export const formatLocalHourKey = (clock: WallClock): string => pad(clock.hour);

export const formatLocalLabel = (epochMs: number, timeZone: string): string => {
  const clock = wallClockInTimeZone(epochMs, timeZone);
  return `${formatLocalDateKey(clock)} ${pad(clock.hour)}:${pad(clock.minute)}`;
};

// Zone offsets are whole minutes, so the sub-minute remainder is the same in UTC and local time.
export const floorToLocalHour = (epochMs: number, timeZone: string): number => {
  const subMinuteMs = ((epochMs % MS_PER_MINUTE) + MS_PER_MINUTE) % MS_PER_MINUTE;
  const { minute } = wallClockInTimeZone(epochMs, timeZone);
  return epochMs - subMinuteMs - minute * MS_PER_MINUTE;
};

export const ceilToLocalHour = (epochMs: number, timeZone: string): number => {
  const floored = floorToLocalHour(epochMs, timeZone);
  return floored === epochMs ? floored : floored + MS_PER_HOUR;
};

export const isLocalHourBoundary = (epochMs: number, timeZone: string): boolean =>
  floorToLocalHour(epochMs, timeZone) === epochMs;

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const isRealCalendarDate = ({ year, month, day }: CalendarDate): boolean => {
  const candidate = new Date(Date.UTC(year, month - 1, day));
  return candidate.getUTCFullYear() === year && candidate.getUTCMonth() === month - 1 && candidate.getUTCDate() === day;
};

// YYYYMMDD, as used in dataset directory names.
export const parseCompactDate = (value: string): CalendarDate => {
  const match = typeof value === 'string' ? value.trim().match(/^(\d{4})(\d{2})(\d{2})$/) : null;
  if (!match) {
    throw new InvalidInputError(`Invalid date ${value}. Expected YYYYMMDD.`, { date: value });
  }
  const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  if (!isRealCalendarDate(date)) {
    throw new InvalidInputError(`Invalid date ${value}. Not a calendar date.`, { date: value });
  }
  return date;
};

// YYYY-MM-DD, as used for local calendar dates.
export const parseIsoDate = (value: string): CalendarDate => {
  const match = typeof value === 'string' ? value.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/) : null;
  if (!match) {
    throw new InvalidInputError(`Invalid date ${value}. Expected YYYY-MM-DD.`, { date: value });
  }
  const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  if (!isRealCalendarDate(date)) {
    throw new InvalidInputError(`Invalid date ${value}. Not a calendar date.`, { date: value });
  }
  return date;
};

export const addDays = (date: CalendarDate, days: number): CalendarDate => {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return { year: shifted.getUTCFullYear(), month: shifted.getUTCMonth() + 1, day: shifted.getUTCDate() };
};

export const formatCompactDate = ({ year, month, day }: CalendarDate): string => `${pad(year, 4)}${pad(month)}${pad(day)}`;

export const formatIsoDate = ({ year, month, day }: CalendarDate): string => `${pad(year, 4)}-${pad(month)}-${pad(day)}`;

export const utcCalendarDate = (epochMs: number): CalendarDate => {
  const date = new Date(epochMs);
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() };
};

export const localCalendarDate = (epochMs: number, timeZone: string): CalendarDate => {
  const { year, month, day } = wallClockInTimeZone(epochMs, timeZone);
  return { year, month, day };
};

export const localMidnightUtcMs = (date: CalendarDate, timeZone: string): number =>
  zonedWallClockToUtcMs({ ...date, hour: 0, minute: 0, second: 0 }, timeZone);

// YYYYMMDDHH in UTC, the dataset timestamp format.
export const parseDatasetTimestamp = (value: string): number => {
  const match = typeof value === 'string' ? value.match(/^(\d{8})(\d{2})$/) : null;
  if (!match) {
    throw new InvalidInputError(`Invalid dataset timestamp ${value}. Expected YYYYMMDDHH.`, { timestamp: value });
  }
  const { year, month, day } = parseCompactDate(match[1]);
  const hour = Number(match[2]);
  if (hour > 23) {
    throw new InvalidInputError(`Invalid dataset timestamp ${value}. Hour out of range.`, { timestamp: value });
  }
  return Date.UTC(year, month - 1, day, hour);
};

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

export const formatLongMonthDay = ({ month, day }: CalendarDate): string => `${MONTH_NAMES[month - 1]} ${pad(day)}`;

export const formatShortMonthDay = ({ month, day }: CalendarDate): string => `${MONTH_NAMES[month - 1].slice(0, 3)} ${pad(day)}`;

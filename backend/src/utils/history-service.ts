import path from 'node:path';
import { readNpyCell } from './npy.js';
import { findGridIndex, type GridAssets, type GridIndex } from './grid.js';
import type { Location } from './location.js';
import { createEventSource, galacticCenterCrossesHorizon, maxAltitude, newMoonsBetween, type EventSource } from './ephemeris.js';
import { DataUnavailableError, InconsistentEphemerisError, InvalidInputError } from './errors.js';
import {
  addDays,
  formatIsoDate,
  formatLongMonthDay,
  formatShortMonthDay,
  localCalendarDate,
  localMidnightUtcMs,
  wallClockInTimeZone,
  type CalendarDate,
} from './time.js';

export const HISTORY_VARIABLES = ['transparency', 'cloud', 'humidity', 'aerosol'] as const;
export type HistoryVariable = (typeof HISTORY_VARIABLES)[number];
export type MonthlyValues = Record<number, number>;

export interface SeasonDate {
  date: string;
  label: string;
}

export interface MilkyWaySeason {
  start: SeasonDate;
  end: SeasonDate;
}

export interface HistoricalContext {
  location: Location;
  year: number;
  bortle: number;
  transparency: MonthlyValues;
  cloud: MonthlyValues;
  humidity: MonthlyValues;
  aerosol: MonthlyValues;
  milkyWaySeason: MilkyWaySeason;
  newMoonDates: string[];
  maxAltitude: number;
}

const readMonthlyValues = (historyRoot: string, variable: HistoryVariable, index: GridIndex): MonthlyValues => {
  const values: MonthlyValues = {};
  for (let month = 1; month <= 12; month += 1) {
    const filePath = path.join(historyRoot, String(month), `${variable}.npy`);
    try {
      const { value } = readNpyCell(filePath, [index.row, index.col]);
      values[month] = variable === 'transparency' ? Math.trunc(value) : value;
    } catch (error) {
      throw new DataUnavailableError(`Cannot read history grid ${filePath}.`, { file: filePath, month }, { cause: error });
    }
  }
  return values;
};

// Local time strictly after 18:00:00 and no later than 23:59:59.
const isEveningEvent = (epochMs: number, timeZone: string): boolean => {
  const { hour, minute, second } = wallClockInTimeZone(epochMs, timeZone);
  return hour >= 18 && !(hour === 18 && minute === 0 && second === 0);
};

const daysInYear = (year: number): CalendarDate[] => {
  const first = { year, month: 1, day: 1 };
  const days: CalendarDate[] = [];
  for (let date = first; date.year === year; date = addDays(date, 1)) {
    days.push(date);
  }
  return days;
};

const seasonDate = (epochMs: number, timeZone: string): SeasonDate => {
  const date = localCalendarDate(epochMs, timeZone);
  return { date: formatIsoDate(date), label: formatLongMonthDay(date) };
};

/**
 * The season opens on the first day of the year the galactic center rises
 * in the evening, and closes on the first later day it sets in the evening.
 */
export const findMilkyWaySeason = (location: Location, year: number, source: EventSource = createEventSource(location, 'galactic-center')): MilkyWaySeason => {
  const notFound = (): InconsistentEphemerisError => {
    const error = new InconsistentEphemerisError(`Milky Way season not found for (${location.lat}, ${location.lng}).`, {
      lat: location.lat,
      lng: location.lng,
      year,
    });
    console.error('[History] engine defect:', error.message);
    return error;
  };
  if (!galacticCenterCrossesHorizon(location, localMidnightUtcMs({ year, month: 1, day: 1 }, location.timeZone))) {
    throw notFound();
  }

  let start: SeasonDate | null = null;
  for (const day of daysInYear(year)) {
    const anchorMs = localMidnightUtcMs(day, location.timeZone);
    if (!start) {
      const riseMs = source.nextRise(anchorMs);
      if (isEveningEvent(riseMs, location.timeZone)) {
        start = seasonDate(riseMs, location.timeZone);
      }
      continue;
    }
    const setMs = source.nextSet(anchorMs);
    if (isEveningEvent(setMs, location.timeZone)) {
      return { start, end: seasonDate(setMs, location.timeZone) };
    }
  }
  throw notFound();
};

export const findNewMoonDates = (year: number, timeZone: string): string[] => {
  const startMs = localMidnightUtcMs({ year, month: 1, day: 1 }, timeZone);
  const endMs = localMidnightUtcMs({ year: year + 1, month: 1, day: 1 }, timeZone);
  return newMoonsBetween(startMs, endMs).map(({ epochMs }) => formatShortMonthDay(localCalendarDate(epochMs, timeZone)));
};

interface BuildHistoricalContextOptions {
  location: Location;
  bortle: number;
  year: number;
  historyRoot: string;
  assets: Pick<GridAssets, 'latitudes' | 'longitudes'>;
  source?: EventSource;
}

export const buildHistoricalContext = ({ location, bortle, year, historyRoot, assets, source }: BuildHistoricalContextOptions): HistoricalContext => {
  if (!Number.isInteger(year) || year < 1900 || year > 2100) {
    throw new InvalidInputError(`Invalid year ${year}. Expected 1900..2100.`, { year });
  }
  const index = findGridIndex(assets, location.lat, location.lng);
  return {
    location,
    year,
    bortle,
    transparency: readMonthlyValues(historyRoot, 'transparency', index),
    cloud: readMonthlyValues(historyRoot, 'cloud', index),
    humidity: readMonthlyValues(historyRoot, 'humidity', index),
    aerosol: readMonthlyValues(historyRoot, 'aerosol', index),
    milkyWaySeason: findMilkyWaySeason(location, year, source),
    newMoonDates: findNewMoonDates(year, location.timeZone),
    maxAltitude: Math.round(maxAltitude(location) * 100) / 100,
  };
};

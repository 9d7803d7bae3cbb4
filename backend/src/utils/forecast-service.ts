import { assembleSeries, mergeSeries } from './dataset.js';
import type { GridAssets } from './grid.js';
import type { Location } from './location.js';
import {
  astronomicalWindows,
  galacticCenterCrossesHorizon,
  maxAltitude,
  type EventSource,
  type RiseSetWindow,
  type SetRiseWindow,
} from './ephemeris.js';
import { classify, type ClassifiedHour, type TransparencyRating } from './transparency.js';
import {
  NO_AVAILABLE_SCORE,
  aggregateGrade,
  lightPollutionTier,
  scoreDarkWindows,
  type AggregateGrade,
  type LightPollutionTier,
  type MoonFreeCheck,
  type TransparencyLookup,
} from './scoring.js';
import { InsufficientDataError } from './errors.js';
import {
  MS_PER_HOUR,
  formatIsoDate,
  formatLocalDateKey,
  formatLocalHourKey,
  localCalendarDate,
  parseDatasetTimestamp,
  wallClockInTimeZone,
} from './time.js';
import { forecastLog } from './log.js';

export interface ForecastHourRecord {
  hour: string;
  utc: string;
  forecastHour: number;
  cloud: number;
  humidity: number;
  aerosol: number;
  transparency: TransparencyRating;
}

export interface LocalDay {
  date: string;
  hours: ForecastHourRecord[];
}

export interface ForecastWindows {
  sun: SetRiseWindow[];
  moon: SetRiseWindow[];
  galacticCenter: RiseSetWindow[];
}

export interface ForecastContext {
  location: Location;
  timestamp: string;
  bortle: number;
  lightPollutionTier: LightPollutionTier;
  days: LocalDay[];
  windows: ForecastWindows;
  maxAltitude: number;
  scoredHours: number;
  score: AggregateGrade | typeof NO_AVAILABLE_SCORE;
}

/**
 * Groups forecast hours by local calendar date and local hour. When a local
 * hour repeats (clocks falling back) the first occurrence is kept.
 */
export const groupByLocalDay = (timestamp: string, hours: readonly ClassifiedHour[], timeZone: string): LocalDay[] => {
  const baseMs = parseDatasetTimestamp(timestamp);
  const days = new Map<string, LocalDay>();
  for (const record of hours) {
    const epochMs = baseMs + record.hour * MS_PER_HOUR;
    const clock = wallClockInTimeZone(epochMs, timeZone);
    const date = formatLocalDateKey(clock);
    const hour = formatLocalHourKey(clock);
    let day = days.get(date);
    if (!day) {
      day = { date, hours: [] };
      days.set(date, day);
    }
    if (day.hours.some((existing) => existing.hour === hour)) {
      continue;
    }
    day.hours.push({
      hour,
      utc: new Date(epochMs).toISOString(),
      forecastHour: record.hour,
      cloud: record.cloud,
      humidity: record.humidity,
      aerosol: record.aerosol,
      transparency: record.transparency,
    });
  }
  return [...days.values()];
};

export const createTransparencyLookup = (days: readonly LocalDay[], timeZone: string): TransparencyLookup => {
  const byDate = new Map(days.map((day) => [day.date, new Map(day.hours.map((record) => [record.hour, record.transparency]))]));
  return (hourStartMs) => {
    const clock = wallClockInTimeZone(hourStartMs, timeZone);
    return byDate.get(formatLocalDateKey(clock))?.get(formatLocalHourKey(clock)) ?? null;
  };
};

export interface EventSources {
  sun?: EventSource;
  moon?: EventSource;
  galacticCenter?: EventSource;
}

interface BuildForecastContextOptions {
  location: Location;
  bortle: number;
  assets: GridAssets;
  dataRoot?: string;
  referenceDate?: string | null;
  now?: Date;
  moonFree?: MoonFreeCheck;
  eventSources?: EventSources;
}

export const buildForecastContext = ({
  location,
  bortle,
  assets,
  dataRoot,
  referenceDate = null,
  now = new Date(),
  moonFree,
  eventSources = {},
}: BuildForecastContextOptions): ForecastContext => {
  const tier = lightPollutionTier(bortle);

  const gfs = assembleSeries(location, 'gfs', { assets, dataRoot, referenceDate, now });
  const gefs = assembleSeries(location, 'gefs', { assets, dataRoot, referenceDate, now });
  const classified = classify(mergeSeries(gfs, gefs), assets.transparencyTable);
  const days = groupByLocalDay(classified.timestamp, classified.hours, location.timeZone);

  const startMs = parseDatasetTimestamp(classified.timestamp);
  const startDate = formatIsoDate(localCalendarDate(startMs, location.timeZone));
  forecastLog(`[Forecast] ${classified.timestamp} at (${location.lat}, ${location.lng}) ${location.timeZone}, windows from ${startDate}`);

  const windows: ForecastWindows = {
    sun: astronomicalWindows(location, 'sun', startDate, { source: eventSources.sun }),
    moon: astronomicalWindows(location, 'moon', startDate, { source: eventSources.moon }),
    galacticCenter: galacticCenterCrossesHorizon(location, startMs)
      ? astronomicalWindows(location, 'galactic-center', startDate, { source: eventSources.galacticCenter })
      : [],
  };

  const scores = scoreDarkWindows({
    sunWindows: windows.sun,
    location,
    tier,
    scoreTable: assets.scoreTable,
    lookupTransparency: createTransparencyLookup(days, location.timeZone),
    moonFree,
  });

  let score: ForecastContext['score'];
  try {
    score = aggregateGrade(scores);
  } catch (error) {
    if (!(error instanceof InsufficientDataError)) {
      throw error;
    }
    console.warn(`[Forecast] ${error.message} (${location.lat}, ${location.lng})`);
    score = NO_AVAILABLE_SCORE;
  }

  return {
    location,
    timestamp: classified.timestamp,
    bortle,
    lightPollutionTier: tier,
    days,
    windows,
    maxAltitude: maxAltitude(location),
    scoredHours: scores.length,
    score,
  };
};

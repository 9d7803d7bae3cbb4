import type { ScoreTable } from './grid.js';
import type { Location } from './location.js';
import type { SetRiseWindow } from './ephemeris.js';
import { moonAltitude } from './ephemeris.js';
import { InsufficientDataError, InvalidInputError } from './errors.js';
import type { TransparencyRating } from './transparency.js';
import { isTransparencyRating } from './transparency.js';
import { MS_PER_HOUR, ceilToLocalHour, floorToLocalHour, formatLocalLabel, isLocalHourBoundary } from './time.js';

export type LightPollutionTier = 0 | 1 | 2 | 3;
export type TransparencyIndex = 0 | 1 | 2 | 3 | 4;
export type HourlyScoreValue = 1 | 2 | 3 | 4;
export type AggregateGrade = 'S' | 'A' | 'B' | 'C';

export const MIN_SCORED_HOURS = 5;
export const NO_AVAILABLE_SCORE = 'No available score';
const MOON_SCORE: HourlyScoreValue = 1;

export const lightPollutionTier = (bortle: number): LightPollutionTier => {
  if (!Number.isInteger(bortle) || bortle < 1 || bortle > 9) {
    throw new InvalidInputError(`Invalid Bortle class ${bortle}. Expected an integer 1..9.`, { bortle });
  }
  if (bortle === 1) return 0;
  if (bortle <= 4) return 1;
  if (bortle === 5) return 2;
  return 3;
};

// Reverses the table rating: 5 (excellent) -> 0, 1 (poor) -> 4.
export const transparencyIndex = (rating: number): TransparencyIndex => {
  if (!isTransparencyRating(rating)) {
    throw new InvalidInputError(`Invalid transparency rating ${rating}. Expected an integer 1..5.`, { rating });
  }
  const index = 5 - rating;
  switch (index) {
    case 0:
    case 1:
    case 2:
    case 3:
    case 4:
      return index;
    default:
      throw new InvalidInputError(`Invalid transparency rating ${rating}.`, { rating });
  }
};

/**
 * True when the moon is at or below the horizon both at the start of the
 * local hour and one hour later.
 */
export const isMoonFree = (location: Location, hourStartMs: number): boolean => {
  if (!Number.isFinite(hourStartMs) || !isLocalHourBoundary(hourStartMs, location.timeZone)) {
    throw new InvalidInputError(`Instant ${hourStartMs} is not the start of a local hour in ${location.timeZone}.`, {
      instant: hourStartMs,
      timeZone: location.timeZone,
    });
  }
  return moonAltitude(location, hourStartMs) <= 0 && moonAltitude(location, hourStartMs + MS_PER_HOUR) <= 0;
};

export type TransparencyLookup = (hourStartMs: number) => TransparencyRating | null;
export type MoonFreeCheck = (location: Location, hourStartMs: number) => boolean;

export interface HourlyScoreInput {
  location: Location;
  hourStartMs: number;
  tier: LightPollutionTier;
  scoreTable: ScoreTable;
  lookupTransparency: TransparencyLookup;
  moonFree?: MoonFreeCheck;
}

export type HourlyScoreResult =
  | { kind: 'scored'; score: HourlyScoreValue }
  | { kind: 'skipped'; reason: 'missing-data' };

const isHourlyScoreValue = (value: number): value is HourlyScoreValue =>
  value === 1 || value === 2 || value === 3 || value === 4;

export const hourlyScore = ({
  location,
  hourStartMs,
  tier,
  scoreTable,
  lookupTransparency,
  moonFree = isMoonFree,
}: HourlyScoreInput): HourlyScoreResult => {
  if (!moonFree(location, hourStartMs)) {
    return { kind: 'scored', score: MOON_SCORE };
  }
  const rating = lookupTransparency(hourStartMs);
  if (rating === null) {
    return { kind: 'skipped', reason: 'missing-data' };
  }
  const score = scoreTable[tier][transparencyIndex(rating)];
  if (!isHourlyScoreValue(score)) {
    throw new InvalidInputError(`Score table returned ${score}. Expected 1..4.`, { tier, rating });
  }
  return { kind: 'scored', score };
};

interface ScoreDarkWindowsOptions extends Omit<HourlyScoreInput, 'hourStartMs'> {
  sunWindows: readonly SetRiseWindow[];
}

// Walks each whole local hour between sunset (rounded up) and sunrise (rounded down).
export const scoreDarkWindows = ({ sunWindows, ...scoreInput }: ScoreDarkWindowsOptions): HourlyScoreValue[] => {
  const { timeZone } = scoreInput.location;
  const scores: HourlyScoreValue[] = [];
  for (const window of sunWindows) {
    const endMs = floorToLocalHour(window.rise.epochMs, timeZone);
    for (let hourStartMs = ceilToLocalHour(window.set.epochMs, timeZone); hourStartMs < endMs; hourStartMs += MS_PER_HOUR) {
      const result = hourlyScore({ ...scoreInput, hourStartMs });
      if (result.kind === 'skipped') {
        console.warn(`[Score] No forecast for ${formatLocalLabel(hourStartMs, timeZone)} (${timeZone}); hour skipped.`);
        continue;
      }
      scores.push(result.score);
    }
  }
  return scores;
};

export const aggregateGrade = (scores: readonly number[]): AggregateGrade => {
  const outOfRange = scores.find((score) => !Number.isInteger(score) || score < 1 || score > 4);
  if (outOfRange !== undefined) {
    throw new InvalidInputError(`Invalid hourly score ${outOfRange}. Expected 1..4.`, { score: outOfRange });
  }
  if (scores.length < MIN_SCORED_HOURS) {
    throw new InsufficientDataError(`Only ${scores.length} scored hours; at least ${MIN_SCORED_HOURS} are needed.`, {
      scoredHours: scores.length,
    });
  }
  const countAtLeast = (minimum: number): number => scores.filter((score) => score >= minimum).length;
  if (countAtLeast(4) >= 3) return 'S';
  if (countAtLeast(3) >= 3) return 'A';
  if (countAtLeast(2) >= 5) return 'B';
  return 'C';
};

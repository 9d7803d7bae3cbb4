import path from 'node:path';
import {
  NO_AVAILABLE_SCORE,
  aggregateGrade,
  hourlyScore,
  isMoonFree,
  lightPollutionTier,
  scoreDarkWindows,
  transparencyIndex,
  type AggregateGrade,
} from '../src/utils/scoring.js';
import { InsufficientDataError, InvalidInputError } from '../src/utils/errors.js';
import { loadGridAssets } from '../src/utils/grid.js';
import type { SetRiseWindow } from '../src/utils/ephemeris.js';
import { MS_PER_MINUTE, formatLocalLabel, zonedWallClockToUtcMs } from '../src/utils/time.js';
import { ANN_ARBOR, REPO_DATA_ROOT } from './helpers/fixtures.js';

const { scoreTable } = loadGridAssets({ dataRoot: path.join(REPO_DATA_ROOT, 'missing-axes'), tablesRoot: REPO_DATA_ROOT });

const detroitMs = (month: number, day: number, hour: number, minute: number = 0) =>
  zonedWallClockToUtcMs({ year: 2023, month, day, hour, minute, second: 0 }, ANN_ARBOR.timeZone);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('light pollution tier', () => {
  test.each([
    [1, 0],
    [2, 1],
    [4, 1],
    [5, 2],
    [6, 3],
    [9, 3],
  ])('Bortle %s is tier %s', (bortle, tier) => {
    expect(lightPollutionTier(bortle)).toBe(tier);
  });

  test.each([0, 10, 2.5])('Bortle %s is rejected', (bortle) => {
    expect(() => lightPollutionTier(bortle)).toThrow(InvalidInputError);
  });
});

describe('transparency index', () => {
  test('reverses the rating', () => {
    expect([5, 4, 3, 2, 1].map(transparencyIndex)).toEqual([0, 1, 2, 3, 4]);
  });

  test.each([0, 6, 3.5])('rating %s is rejected', (rating) => {
    expect(() => transparencyIndex(rating)).toThrow(InvalidInputError);
  });
});

describe('moon-free hours', () => {
  test.each([
    [3, false],
    [4, true],
    [18, true],
    [20, false],
  ])('Ann Arbor on 2023-07-01 at %s:00 moon free is %s', (hour, free) => {
    expect(isMoonFree(ANN_ARBOR, detroitMs(7, 1, hour))).toBe(free);
  });

  test('instants off the local hour are rejected', () => {
    expect(() => isMoonFree(ANN_ARBOR, detroitMs(7, 1, 4) + 30 * MS_PER_MINUTE)).toThrow(InvalidInputError);
  });

  test('half-hour zones align to their own hour', () => {
    const adelaide = { lat: -34.93, lng: 138.6, timeZone: 'Australia/Adelaide' };
    const localHourStart = zonedWallClockToUtcMs({ year: 2023, month: 7, day: 1, hour: 2, minute: 0, second: 0 }, adelaide.timeZone);
    expect(() => isMoonFree(adelaide, localHourStart)).not.toThrow();
    expect(() => isMoonFree(adelaide, localHourStart + 30 * MS_PER_MINUTE)).toThrow(InvalidInputError);
  });
});

describe('hourly score', () => {
  const base = { location: ANN_ARBOR, hourStartMs: detroitMs(7, 1, 23), tier: 0 as const, scoreTable };

  test('a visible moon scores 1 before any data lookup', () => {
    const lookupTransparency = vi.fn(() => 5 as const);
    expect(hourlyScore({ ...base, lookupTransparency, moonFree: () => false })).toEqual({ kind: 'scored', score: 1 });
    expect(lookupTransparency).not.toHaveBeenCalled();
  });

  test('a missing forecast hour is skipped', () => {
    expect(hourlyScore({ ...base, lookupTransparency: () => null, moonFree: () => true })).toEqual({
      kind: 'skipped',
      reason: 'missing-data',
    });
  });

  test('Ann Arbor on 2023-07-01: the moon has set by 04:00 and is up at 20:00', () => {
    const lookupTransparency = () => 5 as const;
    expect(hourlyScore({ ...base, hourStartMs: detroitMs(7, 1, 4), lookupTransparency })).toEqual({ kind: 'scored', score: 4 });
    expect(hourlyScore({ ...base, hourStartMs: detroitMs(7, 1, 20), lookupTransparency })).toEqual({ kind: 'scored', score: 1 });
  });

  test('reads the score table by tier and transparency index', () => {
    expect(hourlyScore({ ...base, lookupTransparency: () => 5, moonFree: () => true })).toEqual({ kind: 'scored', score: 4 });
    expect(hourlyScore({ ...base, tier: 3, lookupTransparency: () => 3, moonFree: () => true })).toEqual({ kind: 'scored', score: 1 });
    expect(hourlyScore({ ...base, tier: 1, lookupTransparency: () => 4, moonFree: () => true })).toEqual({ kind: 'scored', score: 3 });
  });
});

describe('dark-window scoring', () => {
  const window = (setMs: number, riseMs: number): SetRiseWindow => ({
    set: { epochMs: setMs, utc: new Date(setMs).toISOString(), local: formatLocalLabel(setMs, ANN_ARBOR.timeZone) },
    rise: { epochMs: riseMs, utc: new Date(riseMs).toISOString(), local: formatLocalLabel(riseMs, ANN_ARBOR.timeZone) },
  });

  test('scores each whole local hour between sunset and sunrise', () => {
    const seen: string[] = [];
    const scores = scoreDarkWindows({
      sunWindows: [window(detroitMs(7, 1, 20, 30), detroitMs(7, 2, 2, 10))],
      location: ANN_ARBOR,
      tier: 0,
      scoreTable,
      lookupTransparency: (hourStartMs) => {
        seen.push(formatLocalLabel(hourStartMs, ANN_ARBOR.timeZone));
        return 5;
      },
      moonFree: () => true,
    });
    expect(seen).toEqual(['2023/07/01 21:00', '2023/07/01 22:00', '2023/07/01 23:00', '2023/07/02 00:00', '2023/07/02 01:00']);
    expect(scores).toEqual([4, 4, 4, 4, 4]);
  });

  test('a sunset on the hour starts the count at that hour', () => {
    const scores = scoreDarkWindows({
      sunWindows: [window(detroitMs(7, 1, 21), detroitMs(7, 1, 23))],
      location: ANN_ARBOR,
      tier: 0,
      scoreTable,
      lookupTransparency: () => 1,
      moonFree: () => true,
    });
    expect(scores).toEqual([1, 1]);
  });

  test('skipped hours are logged and left out', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const missing = detroitMs(7, 1, 23);
    const scores = scoreDarkWindows({
      sunWindows: [window(detroitMs(7, 1, 20, 30), detroitMs(7, 2, 2, 10))],
      location: ANN_ARBOR,
      tier: 2,
      scoreTable,
      lookupTransparency: (hourStartMs) => (hourStartMs === missing ? null : 4),
      moonFree: () => true,
    });
    expect(scores).toEqual([3, 3, 3, 3]);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith('[Score] No forecast for 2023/07/01 23:00 (America/Detroit); hour skipped.');
  });

  test('hours step across the autumn clock change', () => {
    const seen: string[] = [];
    scoreDarkWindows({
      sunWindows: [window(zonedWallClockToUtcMs({ year: 2023, month: 11, day: 4, hour: 23, minute: 30, second: 0 }, ANN_ARBOR.timeZone), detroitMs(11, 5, 3))],
      location: ANN_ARBOR,
      tier: 0,
      scoreTable,
      lookupTransparency: (hourStartMs) => {
        seen.push(new Date(hourStartMs).toISOString());
        return 5;
      },
      moonFree: () => true,
    });
    // 01:00 local happens twice; 03:00 EST is the end.
    expect(seen).toEqual(['2023-11-05T04:00:00.000Z', '2023-11-05T05:00:00.000Z', '2023-11-05T06:00:00.000Z', '2023-11-05T07:00:00.000Z']);
    expect(detroitMs(11, 5, 3)).toBe(Date.UTC(2023, 10, 5, 8));
  });
});

describe('aggregate grade', () => {
  test.each<[number[], AggregateGrade]>([
    [[4, 4, 4, 1, 1], 'S'],
    [[4, 4, 3, 1, 1], 'A'],
    [[3, 3, 3, 1, 1], 'A'],
    [[3, 3, 3, 3, 3, 3], 'A'],
    [[2, 2, 2, 2, 2], 'B'],
    [[4, 4, 2, 2, 2], 'B'],
    [[2, 2, 2, 2, 1], 'C'],
    [[1, 1, 1, 1, 1, 1, 1], 'C'],
  ])('%j grades %s', (scores, grade) => {
    expect(aggregateGrade(scores)).toBe(grade);
  });

  test('fewer than five hours cannot be graded', () => {
    expect(() => aggregateGrade([4, 4, 4, 4])).toThrow(InsufficientDataError);
    expect(NO_AVAILABLE_SCORE).toBe('No available score');
  });

  test.each([0, 5, 2.5, Number.NaN])('rejects hourly score %s', (bad) => {
    expect(() => aggregateGrade([4, 4, 4, 4, bad])).toThrow(InvalidInputError);
  });

  test('raising one hourly score never lowers the grade', () => {
    const rank: Record<AggregateGrade, number> = { C: 0, B: 1, A: 2, S: 3 };
    const samples = [
      [1, 1, 1, 1, 1],
      [2, 2, 2, 2, 1],
      [3, 3, 2, 2, 2, 1],
      [4, 4, 3, 3, 1, 1],
      [4, 3, 2, 1, 1, 2, 3],
    ];
    for (const scores of samples) {
      const before = rank[aggregateGrade(scores)];
      scores.forEach((score, idx) => {
        if (score === 4) return;
        const raised = scores.map((value, other) => (other === idx ? value + 1 : value));
        expect(rank[aggregateGrade(raised)]).toBeGreaterThanOrEqual(before);
      });
    }
  });
});

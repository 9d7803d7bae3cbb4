import * as Astronomy from 'astronomy-engine';
import { InconsistentEphemerisError, type ErrorContext } from './errors.js';
import type { Location } from './location.js';
import { assertCoordinates } from './location.js';
import { runPairing } from './pairing.js';
import {
  MS_PER_DAY,
  MS_PER_HOUR,
  addDays,
  formatLocalLabel,
  localMidnightUtcMs,
  parseIsoDate,
  type CalendarDate,
} from './time.js';

export type CelestialObject = 'sun' | 'moon' | 'galactic-center';

export const WINDOWS_PER_OBJECT = 4;
export const RISE_SET_SEARCH_DAYS = 2;
const TRANSIT_ANCHOR_OFFSETS_MS = [-12 * MS_PER_HOUR, 0, 12 * MS_PER_HOUR];

// Sagittarius A*, J2000.
export const GALACTIC_CENTER = {
  raHours: 17 + 58 / 60 + 3.47 / 3600,
  decDeg: -(26 + 6 / 60 + 4.6 / 3600),
  distanceLightYears: 26000,
};

const GALACTIC_CENTER_BODY = Astronomy.Body.Star1;
Astronomy.DefineStar(GALACTIC_CENTER_BODY, GALACTIC_CENTER.raHours, GALACTIC_CENTER.decDeg, GALACTIC_CENTER.distanceLightYears);

const BODY_ENUM: Record<CelestialObject, Astronomy.Body> = {
  sun: Astronomy.Body.Sun,
  moon: Astronomy.Body.Moon,
  'galactic-center': GALACTIC_CENTER_BODY,
};

export interface EventTime {
  epochMs: number;
  utc: string;
  local: string;
}

export interface SetRiseWindow {
  set: EventTime;
  rise: EventTime;
}

export interface RiseSetWindow {
  rise: EventTime;
  set: EventTime;
  transit: EventTime;
}

export interface EventSource {
  nextRise(fromMs: number): number;
  nextSet(fromMs: number): number;
  nextTransit(fromMs: number): number;
}

const observerFor = (location: Pick<Location, 'lat' | 'lng'>): Astronomy.Observer =>
  new Astronomy.Observer(location.lat, location.lng, 0);

export const createEventSource = (location: Location, object: CelestialObject): EventSource => {
  const observer = observerFor(location);
  const body = BODY_ENUM[object];

  const searchRiseSet = (direction: 1 | -1, fromMs: number): number => {
    const found = Astronomy.SearchRiseSet(body, observer, direction, new Date(fromMs), RISE_SET_SEARCH_DAYS);
    if (!found) {
      throw new InconsistentEphemerisError(
        `No ${object} ${direction === 1 ? 'rising' : 'setting'} within ${RISE_SET_SEARCH_DAYS} days of ${new Date(fromMs).toISOString()}.`,
        { object, lat: location.lat, lng: location.lng, from: new Date(fromMs).toISOString() },
      );
    }
    return found.date.getTime();
  };

  return {
    nextRise: (fromMs) => searchRiseSet(1, fromMs),
    nextSet: (fromMs) => searchRiseSet(-1, fromMs),
    nextTransit: (fromMs) => Astronomy.SearchHourAngle(body, observer, 0, new Date(fromMs)).time.date.getTime(),
  };
};

const toEventTime = (epochMs: number, timeZone: string): EventTime => ({
  epochMs,
  utc: new Date(epochMs).toISOString(),
  local: formatLocalLabel(epochMs, timeZone),
});

const windowAnchors = (startDate: CalendarDate, timeZone: string): number[] =>
  Array.from({ length: WINDOWS_PER_OBJECT }, (_, idx) => localMidnightUtcMs(addDays(startDate, idx), timeZone));

const failureContext = (location: Location, object: CelestialObject, anchorMs: number): ErrorContext => ({
  object,
  lat: location.lat,
  lng: location.lng,
  timeZone: location.timeZone,
  anchor: new Date(anchorMs).toISOString(),
});

export const setRiseWindows = (location: Location, object: CelestialObject, startDate: CalendarDate, source: EventSource): SetRiseWindow[] =>
  windowAnchors(startDate, location.timeZone).map((anchorMs) => {
    const setMs = source.nextSet(anchorMs);
    const riseMs = source.nextRise(anchorMs);
    const pair = runPairing(setMs, riseMs, () => source.nextRise(anchorMs + MS_PER_DAY));
    if (pair.status === 'failed') {
      const error = new InconsistentEphemerisError(
        `${object} rising ${new Date(pair.closing).toISOString()} precedes setting ${new Date(pair.opening).toISOString()} after one shift.`,
        failureContext(location, object, anchorMs),
      );
      console.error('[Ephemeris] engine defect:', error.message, error.context);
      throw error;
    }
    return { set: toEventTime(pair.opening, location.timeZone), rise: toEventTime(pair.closing, location.timeZone) };
  });

export const riseSetWindows = (location: Location, object: CelestialObject, startDate: CalendarDate, source: EventSource): RiseSetWindow[] =>
  windowAnchors(startDate, location.timeZone).map((anchorMs) => {
    const riseMs = source.nextRise(anchorMs);
    const setMs = source.nextSet(anchorMs);
    const pair = runPairing(riseMs, setMs, () => source.nextSet(anchorMs + MS_PER_DAY));
    if (pair.status === 'failed') {
      const error = new InconsistentEphemerisError(
        `${object} setting ${new Date(pair.closing).toISOString()} precedes rising ${new Date(pair.opening).toISOString()} after one shift.`,
        failureContext(location, object, anchorMs),
      );
      console.error('[Ephemeris] engine defect:', error.message, error.context);
      throw error;
    }

    const transitMs = TRANSIT_ANCHOR_OFFSETS_MS
      .map((offsetMs) => source.nextTransit(anchorMs + offsetMs))
      .filter((candidateMs) => candidateMs > pair.opening && candidateMs <= pair.closing)
      .reduce<number | null>((earliest, candidateMs) => (earliest === null || candidateMs < earliest ? candidateMs : earliest), null);
    if (transitMs === null) {
      const error = new InconsistentEphemerisError(
        `No ${object} transit between rising ${new Date(pair.opening).toISOString()} and setting ${new Date(pair.closing).toISOString()}.`,
        failureContext(location, object, anchorMs),
      );
      console.error('[Ephemeris] engine defect:', error.message, error.context);
      throw error;
    }

    return {
      rise: toEventTime(pair.opening, location.timeZone),
      set: toEventTime(pair.closing, location.timeZone),
      transit: toEventTime(transitMs, location.timeZone),
    };
  });

interface AstronomicalWindowsOptions {
  source?: EventSource;
}

export function astronomicalWindows(location: Location, object: 'sun' | 'moon', startDate: string, options?: AstronomicalWindowsOptions): SetRiseWindow[];
export function astronomicalWindows(location: Location, object: 'galactic-center', startDate: string, options?: AstronomicalWindowsOptions): RiseSetWindow[];
export function astronomicalWindows(
  location: Location,
  object: CelestialObject,
  startDate: string,
  options?: AstronomicalWindowsOptions,
): SetRiseWindow[] | RiseSetWindow[];
export function astronomicalWindows(
  location: Location,
  object: CelestialObject,
  startDate: string,
  { source = createEventSource(location, object) }: AstronomicalWindowsOptions = {},
): SetRiseWindow[] | RiseSetWindow[] {
  const start = parseIsoDate(startDate);
  return object === 'galactic-center'
    ? riseSetWindows(location, object, start, source)
    : setRiseWindows(location, object, start, source);
}

// Rise/set searches place a point source on the horizon at this geometric altitude.
const RISE_SET_ALTITUDE_DEG = -34 / 60;

/**
 * Whether the galactic center rises and sets at the location on the given
 * instant's date. Compares both culminations, using the declination of date,
 * with the altitude `SearchRiseSet` looks for, so a `true` here means the
 * rise/set searches find events.
 */
export const galacticCenterCrossesHorizon = (location: Pick<Location, 'lat' | 'lng'>, epochMs: number): boolean => {
  const { dec } = Astronomy.Equator(GALACTIC_CENTER_BODY, new Date(epochMs), observerFor(location), true, true);
  const upperCulmination = 90 - Math.abs(location.lat - dec);
  const lowerCulmination = Math.abs(location.lat + dec) - 90;
  return upperCulmination > RISE_SET_ALTITUDE_DEG && lowerCulmination < RISE_SET_ALTITUDE_DEG;
};

const MAX_ALTITUDE_EPOCH = new Date(Date.UTC(2000, 0, 1, 12));

export const maxAltitude = (location: Pick<Location, 'lat' | 'lng'>): number => {
  assertCoordinates(location.lat, location.lng);
  const culmination = Astronomy.SearchHourAngle(GALACTIC_CENTER_BODY, observerFor(location), 0, MAX_ALTITUDE_EPOCH);
  return culmination.hor.altitude;
};

export const moonAltitude = (location: Pick<Location, 'lat' | 'lng'>, epochMs: number): number => {
  const observer = observerFor(location);
  const date = new Date(epochMs);
  const equatorial = Astronomy.Equator(Astronomy.Body.Moon, date, observer, true, true);
  return Astronomy.Horizon(date, observer, equatorial.ra, equatorial.dec, 'normal').altitude;
};

export interface NewMoon {
  epochMs: number;
  utc: string;
}

export const newMoonsBetween = (startMs: number, endMs: number): NewMoon[] => {
  const moons: NewMoon[] = [];
  let cursorMs = startMs;
  while (cursorMs < endMs) {
    const found = Astronomy.SearchMoonPhase(0, new Date(cursorMs), 40);
    if (!found || found.date.getTime() >= endMs) {
      break;
    }
    const epochMs = found.date.getTime();
    moons.push({ epochMs, utc: found.date.toISOString() });
    cursorMs = epochMs + MS_PER_DAY;
  }
  return moons;
};

import tzlookup from 'tz-lookup';
import { InvalidInputError } from './errors.js';
import { isValidTimeZone } from './time.js';

export interface Location {
  readonly lat: number;
  readonly lng: number;
  readonly timeZone: string;
}

export const assertCoordinates = (lat: number, lng: number): void => {
  if (!Number.isFinite(lat) || lat < -90 || lat > 90) {
    throw new InvalidInputError(`Latitude out of range: ${lat}. -90 <= lat <= 90`, { lat });
  }
  if (!Number.isFinite(lng) || lng < -180 || lng > 180) {
    throw new InvalidInputError(`Longitude out of range: ${lng}. -180 <= lng <= 180`, { lng });
  }
};

interface ResolveLocationOptions {
  lat: number;
  lng: number;
  timeZone?: string | null;
}

export const resolveLocation = ({ lat, lng, timeZone = null }: ResolveLocationOptions): Location => {
  assertCoordinates(lat, lng);
  if (timeZone !== null && timeZone !== undefined) {
    if (!isValidTimeZone(timeZone)) {
      throw new InvalidInputError(`Unknown time zone ${timeZone}.`, { lat, lng, timeZone });
    }
    return Object.freeze({ lat, lng, timeZone: timeZone.trim() });
  }
  return Object.freeze({ lat, lng, timeZone: tzlookup(lat, lng) });
};

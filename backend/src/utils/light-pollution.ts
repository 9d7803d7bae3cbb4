import { readNpyCell } from './npy.js';
import { findGridIndex, type GridAssets } from './grid.js';
import { DataUnavailableError, InvalidInputError } from './errors.js';

export const MIN_BORTLE = 1;
export const MAX_BORTLE = 9;

export interface BortleSource {
  bortleAt(lat: number, lng: number): number;
}

const isBortleClass = (value: number): boolean => Number.isInteger(value) && value >= MIN_BORTLE && value <= MAX_BORTLE;

// A Bortle grid on the forecast grid; cell values are rounded to the nearest class.
export const createGridBortleSource = (gridPath: string, assets: Pick<GridAssets, 'latitudes' | 'longitudes'>): BortleSource => ({
  bortleAt: (lat, lng) => {
    const { row, col } = findGridIndex(assets, lat, lng);
    let value: number;
    try {
      value = readNpyCell(gridPath, [row, col]).value;
    } catch (error) {
      throw new DataUnavailableError(`Cannot read light pollution grid ${gridPath}.`, { file: gridPath, lat, lng }, { cause: error });
    }
    const bortle = Math.round(value);
    if (!isBortleClass(bortle)) {
      throw new DataUnavailableError(`Light pollution grid holds ${value} at (${lat}, ${lng}).`, { file: gridPath, lat, lng });
    }
    return bortle;
  },
});

interface ResolveBortleOptions {
  lat: number;
  lng: number;
  requested?: number | null;
  source?: BortleSource | null;
}

export const resolveBortleClass = ({ lat, lng, requested = null, source = null }: ResolveBortleOptions): number => {
  if (requested !== null) {
    if (!isBortleClass(requested)) {
      throw new InvalidInputError(`Invalid Bortle class ${requested}. Expected an integer ${MIN_BORTLE}..${MAX_BORTLE}.`, { bortle: requested });
    }
    return requested;
  }
  if (!source) {
    throw new InvalidInputError('No Bortle class given and no light pollution grid configured.', { lat, lng });
  }
  return source.bortleAt(lat, lng);
};

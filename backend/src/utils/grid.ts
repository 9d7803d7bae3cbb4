import fs from 'node:fs';
import path from 'node:path';
import { readNpyArray } from './npy.js';
import { InvalidInputError } from './errors.js';

export const GRID_STEP_DEG = 0.25;
export const GRID_ROWS = 721;
export const GRID_COLS = 1440;
// Grid longitudes run 0..360; requested longitudes are shifted by this before matching.
export const LONGITUDE_OFFSET_DEG = 180;

export const TRANSPARENCY_TABLE_FILE = 'sky-transparency-table.json';
export const SCORE_TABLE_FILE = 'score-table.json';
export const LATITUDES_FILE = 'lats.npy';
export const LONGITUDES_FILE = 'lngs.npy';

export type TransparencyTable = readonly (readonly (readonly number[])[])[];
export type ScoreTable = readonly (readonly number[])[];

export interface GridAssets {
  readonly latitudes: readonly number[];
  readonly longitudes: readonly number[];
  readonly transparencyTable: TransparencyTable;
  readonly scoreTable: ScoreTable;
}

export interface GridIndex {
  row: number;
  col: number;
}

export const buildGlobalLatitudes = (): number[] => Array.from({ length: GRID_ROWS }, (_, row) => 90 - row * GRID_STEP_DEG);

export const buildGlobalLongitudes = (): number[] => Array.from({ length: GRID_COLS }, (_, col) => col * GRID_STEP_DEG);

// First occurrence of the minimum distance wins, so exact half-steps go to the lower index.
const nearestIndex = (values: readonly number[], target: number): number => {
  let bestIdx = -1;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (let idx = 0; idx < values.length; idx += 1) {
    const distance = Math.abs(values[idx] - target);
    if (distance < bestDistance) {
      bestDistance = distance;
      bestIdx = idx;
    }
  }
  return bestIdx;
};

export const findLatitudeIndex = (assets: Pick<GridAssets, 'latitudes'>, lat: number): number => {
  if (!Number.isFinite(lat) || lat > 90 || lat < -90) {
    throw new InvalidInputError(`Latitude out of range: ${lat}. -90 <= lat <= 90`, { lat });
  }
  return nearestIndex(assets.latitudes, lat);
};

export const findLongitudeIndex = (assets: Pick<GridAssets, 'longitudes'>, lng: number): number => {
  if (!Number.isFinite(lng) || lng > 180 || lng < -180) {
    throw new InvalidInputError(`Longitude out of range: ${lng}. -180 <= lng <= 180`, { lng });
  }
  return nearestIndex(assets.longitudes, lng + LONGITUDE_OFFSET_DEG);
};

export const findGridIndex = (assets: Pick<GridAssets, 'latitudes' | 'longitudes'>, lat: number, lng: number): GridIndex => ({
  row: findLatitudeIndex(assets, lat),
  col: findLongitudeIndex(assets, lng),
});

const isIntegerInRange = (value: unknown, min: number, max: number): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max;

const toList = (value: unknown, length: number, fail: () => never): unknown[] => {
  if (!Array.isArray(value) || value.length !== length) {
    return fail();
  }
  return value.map((item: unknown) => item);
};

const toIntegerRow = (value: unknown, length: number, min: number, max: number, fail: () => never): number[] =>
  toList(value, length, fail).map((cell) => (isIntegerInRange(cell, min, max) ? cell : fail()));

export const parseTransparencyTable = (raw: unknown, source: string = 'transparency table'): TransparencyTable => {
  const fail = (): never => {
    throw new Error(`${source}: expected a 3x3x3 array of transparency ratings 1..5.`);
  };
  return toList(raw, 3, fail).map((plane) => toList(plane, 3, fail).map((row) => toIntegerRow(row, 3, 1, 5, fail)));
};

export const parseScoreTable = (raw: unknown, source: string = 'score table'): ScoreTable => {
  const fail = (): never => {
    throw new Error(`${source}: expected a 4x5 array of scores 1..4.`);
  };
  return toList(raw, 4, fail).map((row) => toIntegerRow(row, 5, 1, 4, fail));
};

const readJsonFile = (filePath: string): unknown => JSON.parse(fs.readFileSync(filePath, 'utf8'));

// lats.npy may be the full 721x1440 latitude mesh; only its first column is used.
const loadCoordinateAxis = (filePath: string, axis: 'lat' | 'lng'): number[] => {
  const { shape, data } = readNpyArray(filePath);
  if (shape.length === 1) {
    return data;
  }
  if (shape.length === 2 && axis === 'lat') {
    return Array.from({ length: shape[0] }, (_, row) => data[row * shape[1]]);
  }
  throw new Error(`${filePath}: unexpected coordinate array shape (${shape.join(', ')}).`);
};

interface LoadGridAssetsOptions {
  dataRoot: string;
  tablesRoot?: string;
}

export const loadGridAssets = ({ dataRoot, tablesRoot = dataRoot }: LoadGridAssetsOptions): GridAssets => {
  const latPath = path.join(dataRoot, LATITUDES_FILE);
  const lngPath = path.join(dataRoot, LONGITUDES_FILE);
  const latitudes = fs.existsSync(latPath) ? loadCoordinateAxis(latPath, 'lat') : buildGlobalLatitudes();
  const longitudes = fs.existsSync(lngPath) ? loadCoordinateAxis(lngPath, 'lng') : buildGlobalLongitudes();

  const transparencyPath = path.join(tablesRoot, TRANSPARENCY_TABLE_FILE);
  const scorePath = path.join(tablesRoot, SCORE_TABLE_FILE);

  return Object.freeze({
    latitudes: Object.freeze(latitudes),
    longitudes: Object.freeze(longitudes),
    transparencyTable: parseTransparencyTable(readJsonFile(transparencyPath), transparencyPath),
    scoreTable: parseScoreTable(readJsonFile(scorePath), scorePath),
  });
};

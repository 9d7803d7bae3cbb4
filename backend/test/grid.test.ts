import path from 'node:path';
import {
  buildGlobalLatitudes,
  buildGlobalLongitudes,
  findGridIndex,
  findLatitudeIndex,
  findLongitudeIndex,
  loadGridAssets,
  parseScoreTable,
  parseTransparencyTable,
} from '../src/utils/grid.js';
import { InvalidInputError } from '../src/utils/errors.js';
import { REPO_DATA_ROOT, loadTestAssets, makeTempDir, removeDir } from './helpers/fixtures.js';

const globalGrid = { latitudes: buildGlobalLatitudes(), longitudes: buildGlobalLongitudes() };

describe('grid indexer', () => {
  test.each([
    [90, 0],
    [89.875, 0],
    [89.874, 1],
    [-90, 720],
    [-89.875, 719],
    [-89.876, 720],
    [0, 360],
    [0.125, 359],
    [-0.125, 360],
  ])('latitude %s maps to row %s', (lat, row) => {
    expect(findLatitudeIndex(globalGrid, lat)).toBe(row);
  });

  test.each([
    [-180, 0],
    [-179.875, 0],
    [-179.874, 1],
    [180, 1439],
    [179.75, 1439],
    [179.625, 1438],
    [0, 720],
    [-0.125, 719],
    [0.125, 720],
    [-0.124, 720],
  ])('longitude %s maps to column %s', (lng, col) => {
    expect(findLongitudeIndex(globalGrid, lng)).toBe(col);
  });

  test('findGridIndex combines both axes', () => {
    expect(findGridIndex(globalGrid, 42.2776, -83.7409)).toEqual({ row: 191, col: 385 });
  });

  test.each([
    [90.01, 0],
    [-90.01, 0],
    [0, 180.01],
    [0, -180.01],
    [Number.NaN, 0],
  ])('rejects out-of-range coordinates (%s, %s)', (lat, lng) => {
    expect(() => findGridIndex(globalGrid, lat, lng)).toThrow(InvalidInputError);
  });

  test('global axes span the full grid', () => {
    expect(globalGrid.latitudes).toHaveLength(721);
    expect(globalGrid.latitudes[720]).toBe(-90);
    expect(globalGrid.longitudes).toHaveLength(1440);
    expect(globalGrid.longitudes[1439]).toBe(359.75);
  });
});

describe('lookup tables', () => {
  test('repository tables parse', () => {
    const assets = loadGridAssets({ dataRoot: path.join(REPO_DATA_ROOT, 'missing-axes'), tablesRoot: REPO_DATA_ROOT });
    expect(assets.transparencyTable[0][0][0]).toBe(5);
    expect(assets.transparencyTable[2][2][2]).toBe(1);
    expect(assets.scoreTable).toHaveLength(4);
    expect(assets.scoreTable[0]).toEqual([4, 4, 3, 2, 1]);
    expect(assets.latitudes).toHaveLength(721);
    expect(Object.isFrozen(assets)).toBe(true);
  });

  test('rejects malformed tables', () => {
    expect(() => parseTransparencyTable([[[1, 2, 3]]])).toThrow('expected a 3x3x3 array');
    expect(() => parseScoreTable([[4, 4, 3, 2, 1], [4, 3, 3, 2, 1], [3, 3, 2, 1, 1], [2, 2, 1, 1, 5]])).toThrow('expected a 4x5 array');
  });

  test('coordinate arrays on disk replace the generated grid', () => {
    const dir = makeTempDir('grid');
    try {
      const assets = loadTestAssets(dir);
      expect(assets.latitudes).toEqual([90, 45, 0, -45, -90]);
      expect(findGridIndex(assets, 42.2776, -83.7409)).toEqual({ row: 1, col: 2 });
    } finally {
      removeDir(dir);
    }
  });
});

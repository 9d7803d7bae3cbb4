import path from 'node:path';
import request from 'supertest';
import { buildStargazingApp } from '../index.js';
import { statusForError } from '../src/routes/http-errors.js';
import { createGridBortleSource } from '../src/utils/light-pollution.js';
import { DataUnavailableError, InconsistentEphemerisError, InvalidInputError } from '../src/utils/errors.js';
import type { GridAssets } from '../src/utils/grid.js';
import {
  ANN_ARBOR,
  TEST_COLS,
  TEST_ROWS,
  loadTestAssets,
  makeTempDir,
  markComplete,
  removeDir,
  writeDataset,
  writeHistory,
} from './helpers/fixtures.js';
import { writeFilledGrid } from './helpers/npy-writer.js';

let root: string;
let assets: GridAssets;

beforeEach(() => {
  root = makeTempDir('api');
  assets = loadTestAssets(root);
});

afterEach(() => {
  removeDir(root);
  vi.restoreAllMocks();
});

const testApp = () => buildStargazingApp({ assets, dataRoot: root, historyRoot: path.join(root, 'history') });

test('GET /healthz answers even without forecast data', async () => {
  const res = await request(testApp()).get('/healthz');
  expect(res.status).toBe(200);
  expect(res.body.ok).toBe(false);
  expect(res.body.service).toBe('stargazing-backend');
  expect(res.body.latestDataset).toBeNull();
  expect(res.body.lightPollutionGrid).toBe(false);
  expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
});

test('GET /health is unavailable until a complete forecast run exists', async () => {
  const res = await request(testApp()).get('/health');
  expect(res.status).toBe(503);
  expect(res.body.ok).toBe(false);
});

test('GET /api/health reports the latest complete run and the Bortle grid', async () => {
  markComplete(root, '20230701', '06');
  markComplete(root, '20230701', '12');
  const gridPath = path.join(root, 'bortle.npy');
  writeFilledGrid(gridPath, TEST_ROWS, TEST_COLS, 4);
  const ready = buildStargazingApp({
    assets,
    dataRoot: root,
    historyRoot: path.join(root, 'history'),
    bortleSource: createGridBortleSource(gridPath, assets),
    now: () => new Date('2023-07-01T20:00:00Z'),
  });

  const res = await request(ready).get('/api/health');

  expect(res.status).toBe(200);
  expect(res.body.ok).toBe(true);
  expect(res.body.latestDataset).toBe('2023070112');
  expect(res.body.lightPollutionGrid).toBe(true);
  expect(res.body.timestamp).toBe('2023-07-01T20:00:00.000Z');
  expect(res.headers['ratelimit-limit']).toBeUndefined();
});

test('data routes are rate limited', async () => {
  const res = await request(testApp()).get('/api/transparency-forecast?lng=-83.74');
  expect(res.headers['ratelimit-limit']).toBeDefined();
});

test('unknown paths answer in the error shape', async () => {
  const res = await request(testApp()).get('/api/meteor-showers');
  expect(res.status).toBe(404);
  expect(res.body).toEqual({ error: 'No route for GET /api/meteor-showers.', kind: 'NotFound' });
});

test('GET /api/transparency-forecast without coordinates is a bad request', async () => {
  const res = await request(testApp()).get('/api/transparency-forecast?lng=-83.74&bortle=3');
  expect(res.status).toBe(400);
  expect(res.body).toEqual({ error: "Query parameter 'lat' must be a number.", kind: 'InvalidInput' });
});

test('GET /api/transparency-forecast rejects an unknown time zone', async () => {
  const res = await request(testApp()).get('/api/transparency-forecast?lat=42.2776&lng=-83.7409&bortle=3&tz=Mars/Base');
  expect(res.status).toBe(400);
  expect(res.body).toEqual({ error: 'Unknown time zone Mars/Base.', kind: 'InvalidInput' });
});

test('GET /api/transparency-forecast needs a Bortle class when no grid is configured', async () => {
  const res = await request(testApp()).get('/api/transparency-forecast?lat=42.2776&lng=-83.7409');
  expect(res.status).toBe(400);
  expect(res.body.error).toBe('No Bortle class given and no light pollution grid configured.');
});

test('GET /api/transparency-forecast without datasets is unavailable', async () => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
  const res = await request(testApp()).get('/api/transparency-forecast?lat=42.2776&lng=-83.7409&bortle=3&date=20230701');
  expect(res.status).toBe(503);
  expect(res.body).toEqual({ error: 'Cannot find processed NOAA datasets.', kind: 'DataUnavailable' });
});

test('GET /api/transparency-forecast returns the forecast context', async () => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  writeDataset({ dataRoot: root, date: '20230701', updateHour: '12', cloud: 5, humidity: 10, aerosol: 0.05 });

  const res = await request(testApp()).get(`/api/transparency-forecast?lat=${ANN_ARBOR.lat}&lng=${ANN_ARBOR.lng}&bortle=3&date=20230701`);

  expect(res.status).toBe(200);
  expect(res.body.timestamp).toBe('2023070112');
  expect(res.body.location).toEqual(ANN_ARBOR);
  expect(res.body.days).toHaveLength(4);
  expect(res.body.windows.sun).toHaveLength(4);
  expect(['S', 'A', 'B', 'C', 'No available score']).toContain(res.body.score);
});

test('GET /api/historical-transparency uses the light pollution grid', async () => {
  writeHistory(path.join(root, 'history'), () => 2);
  const gridPath = path.join(root, 'bortle.npy');
  writeFilledGrid(gridPath, TEST_ROWS, TEST_COLS, 6);
  const withGrid = buildStargazingApp({
    assets,
    dataRoot: root,
    historyRoot: path.join(root, 'history'),
    bortleSource: createGridBortleSource(gridPath, assets),
  });

  const res = await request(withGrid).get(`/api/historical-transparency?lat=${ANN_ARBOR.lat}&lng=${ANN_ARBOR.lng}&year=2023`);

  expect(res.status).toBe(200);
  expect(res.body.bortle).toBe(6);
  expect(res.body.year).toBe(2023);
  expect(res.body.transparency['7']).toBe(2);
  expect(res.body.newMoonDates[0]).toBe('Jan 21');
});

test('error kinds map to status codes', () => {
  expect(statusForError(new InvalidInputError('bad'))).toBe(400);
  expect(statusForError(new DataUnavailableError('gone'))).toBe(503);
  expect(statusForError(new InconsistentEphemerisError('odd'))).toBe(500);
  expect(statusForError(new Error('boom'))).toBe(500);
});

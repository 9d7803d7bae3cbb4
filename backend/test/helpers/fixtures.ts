import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadGridAssets, type GridAssets } from '../../src/utils/grid.js';
import { AEROSOL_CADENCE_HOURS, COMPLETION_FLAG, HOURS_OF_PREDICTION, forecastFilename } from '../../src/utils/dataset.js';
import { writeFilledGrid, writeNpy } from './npy-writer.js';

export { makeTempDir } from './npy-writer.js';

export const REPO_DATA_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../data');

// 45-degree test grid: rows 90, 45, 0, -45, -90; columns 0, 45, ..., 315.
export const TEST_LATITUDES = [90, 45, 0, -45, -90];
export const TEST_LONGITUDES = [0, 45, 90, 135, 180, 225, 270, 315];
export const TEST_ROWS = TEST_LATITUDES.length;
export const TEST_COLS = TEST_LONGITUDES.length;

export const ANN_ARBOR = { lat: 42.2776, lng: -83.7409, timeZone: 'America/Detroit' };

export const writeTestAxes = (dataRoot: string) => {
  writeNpy(path.join(dataRoot, 'lats.npy'), [TEST_ROWS], TEST_LATITUDES);
  writeNpy(path.join(dataRoot, 'lngs.npy'), [TEST_COLS], TEST_LONGITUDES);
};

export const loadTestAssets = (dataRoot: string): GridAssets => {
  writeTestAxes(dataRoot);
  return loadGridAssets({ dataRoot, tablesRoot: REPO_DATA_ROOT });
};

type HourlyValue = number | ((forecastHour: number) => number);

interface WriteDatasetOptions {
  dataRoot: string;
  date: string;
  updateHour: string;
  cloud?: HourlyValue;
  humidity?: HourlyValue;
  aerosol?: HourlyValue;
  complete?: boolean;
  kinds?: Array<'gfs' | 'gefs'>;
  skipForecastHours?: number[];
}

const valueAt = (value: HourlyValue, forecastHour: number): number => (typeof value === 'function' ? value(forecastHour) : value);

// Every cell of a grid holds the same value; the fixtures only vary over forecast hours.
export const writeDataset = ({
  dataRoot,
  date,
  updateHour,
  cloud = 0,
  humidity = 0,
  aerosol = 0,
  complete = true,
  kinds = ['gfs', 'gefs'],
  skipForecastHours = [],
}: WriteDatasetOptions): string => {
  const directory = path.join(dataRoot, date, updateHour);
  fs.mkdirSync(directory, { recursive: true });
  for (let hour = 0; hour < HOURS_OF_PREDICTION; hour += 1) {
    if (skipForecastHours.includes(hour)) continue;
    if (kinds.includes('gfs')) {
      writeFilledGrid(path.join(directory, 'gfs', forecastFilename('cloud', hour)), TEST_ROWS, TEST_COLS, valueAt(cloud, hour));
      writeFilledGrid(path.join(directory, 'gfs', forecastFilename('humidity', hour)), TEST_ROWS, TEST_COLS, valueAt(humidity, hour));
    }
    if (kinds.includes('gefs') && hour % AEROSOL_CADENCE_HOURS === 0) {
      writeFilledGrid(path.join(directory, 'gefs', forecastFilename('aerosol', hour)), TEST_ROWS, TEST_COLS, valueAt(aerosol, hour));
    }
  }
  if (complete) {
    fs.writeFileSync(path.join(directory, COMPLETION_FLAG), '');
  }
  return directory;
};

export const markComplete = (dataRoot: string, date: string, updateHour: string) => {
  const directory = path.join(dataRoot, date, updateHour);
  fs.mkdirSync(directory, { recursive: true });
  fs.writeFileSync(path.join(directory, COMPLETION_FLAG), '');
};

export const writeHistory = (historyRoot: string, values: (variable: string, month: number) => number) => {
  for (let month = 1; month <= 12; month += 1) {
    for (const variable of ['transparency', 'cloud', 'humidity', 'aerosol']) {
      writeFilledGrid(path.join(historyRoot, String(month), `${variable}.npy`), TEST_ROWS, TEST_COLS, values(variable, month));
    }
  }
};

export const removeDir = (dir: string) => fs.rmSync(dir, { recursive: true, force: true });


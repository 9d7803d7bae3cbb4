import fs from 'node:fs';
import path from 'node:path';
import { readNpyCell } from './npy.js';
import { findGridIndex, type GridAssets, type GridIndex } from './grid.js';
import { DataUnavailableError, InvalidInputError } from './errors.js';
import { addDays, formatCompactDate, parseCompactDate, utcCalendarDate } from './time.js';
import { forecastLog } from './log.js';

export type DatasetKind = 'gfs' | 'gefs';

export const DATASET_KINDS: readonly DatasetKind[] = ['gfs', 'gefs'];
export const UPDATE_HOURS = ['18', '12', '06', '00'] as const;
export const DATA_RETENTION_DAYS = 3;
export const COMPLETION_FLAG = 'complete.flag';
export const HOURS_OF_PREDICTION = 72;
export const AEROSOL_CADENCE_HOURS = 3;

export interface DatasetWindow {
  path: string;
  timestamp: string;
}

const isDatasetKind = (value: unknown): value is DatasetKind => DATASET_KINDS.some((kind) => kind === value);

interface ResolveWindowOptions {
  dataRoot?: string;
  referenceDate?: string | null;
  now?: Date;
}

export const resolveWindow = (kind: DatasetKind, { dataRoot = 'data', referenceDate = null, now = new Date() }: ResolveWindowOptions = {}): DatasetWindow => {
  if (!isDatasetKind(kind)) {
    throw new InvalidInputError(`Invalid data_type: ${String(kind)}. Expected 'gfs' or 'gefs'`, { kind: String(kind) });
  }
  const reference = referenceDate ? parseCompactDate(referenceDate) : utcCalendarDate(now.getTime());

  for (let day = 0; day < DATA_RETENTION_DAYS; day += 1) {
    const dateStr = formatCompactDate(addDays(reference, -day));
    for (const updateHour of UPDATE_HOURS) {
      const directory = path.join(dataRoot, dateStr, updateHour);
      if (fs.existsSync(directory) && fs.existsSync(path.join(directory, COMPLETION_FLAG))) {
        forecastLog(`[Resolver] ${kind} -> ${directory}`);
        return { path: path.join(directory, kind), timestamp: `${dateStr}${updateHour}` };
      }
    }
  }

  throw new DataUnavailableError('Cannot find processed NOAA datasets.', {
    kind,
    referenceDate: formatCompactDate(reference),
    lookbackDays: DATA_RETENTION_DAYS,
  });
};

export const forecastFilename = (variable: string, forecastHour: number): string =>
  `${variable}.f${String(forecastHour).padStart(3, '0')}.npy`;

export interface CloudHumidityHour {
  hour: number;
  cloud: number;
  humidity: number;
}

export interface AerosolHour {
  hour: number;
  aerosol: number;
}

export interface CloudHumiditySeries {
  kind: 'gfs';
  timestamp: string;
  hours: CloudHumidityHour[];
}

export interface AerosolSeries {
  kind: 'gefs';
  timestamp: string;
  hours: AerosolHour[];
}

export type ForecastSeries = CloudHumiditySeries | AerosolSeries;

export interface AtmosphericHour {
  hour: number;
  cloud: number;
  humidity: number;
  aerosol: number;
}

export interface MergedSeries {
  timestamp: string;
  hours: AtmosphericHour[];
}

interface ReadVariableOptions {
  directory: string;
  variable: string;
  forecastHours: number[];
  index: GridIndex;
  assets: GridAssets;
}

const readVariable = ({ directory, variable, forecastHours, index, assets }: ReadVariableOptions): Map<number, number> => {
  const expectedShape = [assets.latitudes.length, assets.longitudes.length];
  const values = new Map<number, number>();
  for (const forecastHour of forecastHours) {
    const filePath = path.join(directory, forecastFilename(variable, forecastHour));
    let cell: { shape: number[]; value: number };
    try {
      cell = readNpyCell(filePath, [index.row, index.col]);
    } catch (error) {
      throw new DataUnavailableError(`Cannot read forecast grid ${filePath}.`, { file: filePath, forecastHour }, { cause: error });
    }
    if (cell.shape.length !== 2 || cell.shape[0] !== expectedShape[0] || cell.shape[1] !== expectedShape[1]) {
      throw new DataUnavailableError(
        `Forecast grid ${filePath} has shape (${cell.shape.join(', ')}), expected (${expectedShape.join(', ')}).`,
        { file: filePath, forecastHour },
      );
    }
    values.set(forecastHour, cell.value);
  }
  return values;
};

const hourRange = (count: number, step: number = 1): number[] =>
  Array.from({ length: Math.ceil(count / step) }, (_, idx) => idx * step);

// Fills a 3-hourly sample map forward: hour h takes the value sampled at floor(h / 3) * 3.
export const fillForward = (sampled: Map<number, number>, cadenceHours: number = AEROSOL_CADENCE_HOURS): number[] =>
  hourRange(HOURS_OF_PREDICTION).map((hour) => {
    const sourceHour = Math.floor(hour / cadenceHours) * cadenceHours;
    const value = sampled.get(sourceHour);
    if (value === undefined) {
      throw new DataUnavailableError(`No sample for forecast hour ${sourceHour}.`, { forecastHour: sourceHour });
    }
    return value;
  });

interface AssembleSeriesOptions {
  assets: GridAssets;
  dataRoot?: string;
  referenceDate?: string | null;
  now?: Date;
}

export function assembleSeries(location: { lat: number; lng: number }, kind: 'gfs', options: AssembleSeriesOptions): CloudHumiditySeries;
export function assembleSeries(location: { lat: number; lng: number }, kind: 'gefs', options: AssembleSeriesOptions): AerosolSeries;
export function assembleSeries(location: { lat: number; lng: number }, kind: DatasetKind, options: AssembleSeriesOptions): ForecastSeries;
export function assembleSeries(
  location: { lat: number; lng: number },
  kind: DatasetKind,
  { assets, dataRoot, referenceDate, now }: AssembleSeriesOptions,
): ForecastSeries {
  const index = findGridIndex(assets, location.lat, location.lng);
  const window = resolveWindow(kind, { dataRoot, referenceDate, now });

  if (kind === 'gfs') {
    const forecastHours = hourRange(HOURS_OF_PREDICTION);
    const cloud = readVariable({ directory: window.path, variable: 'cloud', forecastHours, index, assets });
    const humidity = readVariable({ directory: window.path, variable: 'humidity', forecastHours, index, assets });
    return {
      kind,
      timestamp: window.timestamp,
      hours: forecastHours.map((hour) => ({
        hour,
        cloud: cloud.get(hour) ?? Number.NaN,
        humidity: humidity.get(hour) ?? Number.NaN,
      })),
    };
  }

  const sampled = readVariable({
    directory: window.path,
    variable: 'aerosol',
    forecastHours: hourRange(HOURS_OF_PREDICTION, AEROSOL_CADENCE_HOURS),
    index,
    assets,
  });
  return {
    kind,
    timestamp: window.timestamp,
    hours: fillForward(sampled).map((aerosol, hour) => ({ hour, aerosol })),
  };
}

// The aerosol source's timestamp is canonical when the two sources disagree.
export const mergeSeries = (cloudHumidity: CloudHumiditySeries, aerosol: AerosolSeries): MergedSeries => {
  if (cloudHumidity.timestamp !== aerosol.timestamp) {
    console.error('[Forecast] GFS and GEFS data have different timestamps:', cloudHumidity.timestamp, aerosol.timestamp);
  }
  return {
    timestamp: aerosol.timestamp,
    hours: cloudHumidity.hours.map(({ hour, cloud, humidity }) => ({
      hour,
      cloud,
      humidity,
      aerosol: aerosol.hours[hour].aerosol,
    })),
  };
};

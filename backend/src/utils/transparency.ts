import type { AtmosphericHour, MergedSeries } from './dataset.js';
import type { TransparencyTable } from './grid.js';
import { InvalidInputError } from './errors.js';

export type Bucket = 0 | 1 | 2;

// Rating stored in the conversion table: 1 (poor) .. 5 (excellent).
export type TransparencyRating = 1 | 2 | 3 | 4 | 5;

export interface ClassifiedHour extends AtmosphericHour {
  transparency: TransparencyRating;
}

export interface ClassifiedSeries {
  timestamp: string;
  hours: ClassifiedHour[];
}

/**
 * Cloud cover and relative humidity share one scale:
 * [0, 20) low, [20, 40) moderate, [40, 100] high.
 */
export const cloudHumidityBucket = (percentage: number): Bucket => {
  if (!Number.isFinite(percentage) || percentage < 0 || percentage > 100) {
    throw new InvalidInputError(`Invalid cloud/humidity input ${percentage}. Should be between 0 and 100.`, { value: percentage });
  }
  if (percentage < 20) return 0;
  if (percentage < 40) return 1;
  return 2;
};

/**
 * Total aerosol optical thickness: [0, 0.1) low, [0.1, 0.3) moderate, [0.3, inf) high.
 */
export const aerosolBucket = (aerosol: number): Bucket => {
  if (!Number.isFinite(aerosol) || aerosol < 0) {
    throw new InvalidInputError(`Invalid aerosol input ${aerosol}. Should be a finite non-negative number.`, { value: aerosol });
  }
  if (aerosol < 0.1) return 0;
  if (aerosol < 0.3) return 1;
  return 2;
};

export const isTransparencyRating = (value: number): value is TransparencyRating =>
  Number.isInteger(value) && value >= 1 && value <= 5;

export const lookupTransparency = (table: TransparencyTable, hour: Pick<AtmosphericHour, 'cloud' | 'humidity' | 'aerosol'>): TransparencyRating => {
  const rating = table[cloudHumidityBucket(hour.cloud)][cloudHumidityBucket(hour.humidity)][aerosolBucket(hour.aerosol)];
  if (!isTransparencyRating(rating)) {
    throw new InvalidInputError(`Transparency table returned ${rating}. Expected a rating 1..5.`, { rating });
  }
  return rating;
};

export const classify = (series: MergedSeries, table: TransparencyTable): ClassifiedSeries => ({
  timestamp: series.timestamp,
  hours: series.hours.map((hour) => {
    try {
      return { ...hour, transparency: lookupTransparency(table, hour) };
    } catch (error) {
      if (error instanceof InvalidInputError) {
        throw new InvalidInputError(`${error.message} (forecast hour ${hour.hour} of ${series.timestamp})`, {
          ...error.context,
          forecastHour: hour.hour,
          timestamp: series.timestamp,
        });
      }
      throw error;
    }
  }),
});

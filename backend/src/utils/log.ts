import { DEBUG_FORECAST } from '../server/runtime.js';

export const forecastLog = (...args: unknown[]): void => {
  if (DEBUG_FORECAST) {
    console.log(...args);
  }
};

export type StargazingErrorKind = 'DataUnavailable' | 'InvalidInput' | 'InconsistentEphemeris' | 'InsufficientData';

export type ErrorContext = Record<string, string | number | null>;

export class StargazingError extends Error {
  constructor(
    public readonly kind: StargazingErrorKind,
    message: string,
    public readonly context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StargazingError';
  }
}

// No complete dataset inside the lookback window, or a grid file of a complete dataset is unreadable.
export class DataUnavailableError extends StargazingError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super('DataUnavailable', message, context, options);
    this.name = 'DataUnavailableError';
  }
}

export class InvalidInputError extends StargazingError {
  constructor(message: string, context: ErrorContext = {}) {
    super('InvalidInput', message, context);
    this.name = 'InvalidInputError';
  }
}

export class InconsistentEphemerisError extends StargazingError {
  constructor(message: string, context: ErrorContext = {}) {
    super('InconsistentEphemeris', message, context);
    this.name = 'InconsistentEphemerisError';
  }
}

export class InsufficientDataError extends StargazingError {
  constructor(message: string, context: ErrorContext = {}) {
    super('InsufficientData', message, context);
    this.name = 'InsufficientDataError';
  }
}

export const isStargazingError = (error: unknown): error is StargazingError => error instanceof StargazingError;

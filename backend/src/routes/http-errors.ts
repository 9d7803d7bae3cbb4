import type { Response } from 'express';
import { InvalidInputError, isStargazingError, type StargazingErrorKind } from '../utils/errors.js';

const STATUS_BY_KIND: Record<StargazingErrorKind, number> = {
  InvalidInput: 400,
  DataUnavailable: 503,
  InconsistentEphemeris: 500,
  InsufficientData: 500,
};

export const statusForError = (error: unknown): number => (isStargazingError(error) ? STATUS_BY_KIND[error.kind] : 500);

export const sendError = (res: Response, error: unknown, tag: string) => {
  const status = statusForError(error);
  const kind = isStargazingError(error) ? error.kind : 'Internal';
  const message = error instanceof Error ? error.message : String(error);
  if (status >= 500) {
    console.error(`[${tag}] ${kind}:`, message, isStargazingError(error) ? error.context : '');
  }
  res.status(status).json({ error: status === 500 && kind === 'Internal' ? 'Internal server error.' : message, kind });
};

const firstQueryValue = (value: unknown): string | null => {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (Array.isArray(value) && value.length) {
    return firstQueryValue(value[0]);
  }
  return null;
};

export const requiredNumber = (query: Record<string, unknown>, name: string): number => {
  const raw = firstQueryValue(query[name]);
  const value = raw === null ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`Query parameter '${name}' must be a number.`, { [name]: raw });
  }
  return value;
};

export const optionalInteger = (query: Record<string, unknown>, name: string): number | null => {
  const raw = firstQueryValue(query[name]);
  if (raw === null) {
    return null;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidInputError(`Query parameter '${name}' must be an integer.`, { [name]: raw });
  }
  return value;
};

export const optionalString = (query: Record<string, unknown>, name: string): string | null => firstQueryValue(query[name]);

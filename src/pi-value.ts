import type { PIScalar } from './pi-types.js';

/** Sentinel used when the caller does not supply a timestamp. */
export const MIN_TIMESTAMP = new Date('0001-01-01T00:00:00.000Z');

/**
 * A single value to write to a PI point.
 *
 * Pass a `Date` for `timestamp`, e.g. `new Date('2025-11-13T21:00:00Z')`.
 */
export interface PIValue {
  timestamp?: Date;
  unitsAbbreviation?: string;
  good?: boolean;
  questionable?: boolean;
  value?: PIScalar;
}

export interface PIValuePayload {
  Timestamp: string;
  UnitsAbbreviation?: string;
  Good?: boolean;
  Questionable?: boolean;
  Value?: PIScalar;
}

/** Wire form of a value. Only the fields the caller set are emitted, plus `Timestamp`. */
export function toPayload(value: PIValue): PIValuePayload {
  const payload: PIValuePayload = {
    Timestamp: (value.timestamp ?? MIN_TIMESTAMP).toISOString(),
  };
  if (value.unitsAbbreviation !== undefined) payload.UnitsAbbreviation = value.unitsAbbreviation;
  if (value.good !== undefined) payload.Good = value.good;
  if (value.questionable !== undefined) payload.Questionable = value.questionable;
  if (value.value !== undefined) payload.Value = value.value;
  return payload;
}

export function serializePIValue(value: PIValue): string {
  return JSON.stringify(toPayload(value));
}

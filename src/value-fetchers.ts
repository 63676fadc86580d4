import { z } from 'zod';
import { EmptyResultError, NotFoundError } from './errors.js';
import type { PIConnection } from './pi-connection.js';
import type { RetrievalMode } from './pi-consts.js';
import {
  type PIDigitalState,
  type PIScalar,
  type PITimedValue,
  digitalStateSchema,
  isSuccess,
  itemsEnvelope,
  piScalarSchema,
} from './pi-types.js';

export type TableRow = Record<string, unknown>;

/** Row-oriented table; columns are whatever fields the server returned. */
export interface ValueTable {
  columns: string[];
  rows: TableRow[];
}

export interface InterpolatedQuery {
  startTime?: string;
  endTime?: string;
  interval?: string;
}

/** A non-Exact recorded value as the server sent it: normally a timed value object, sometimes a bare scalar. */
export type RecordedPayload = PITimedValue | PIScalar | Record<string, unknown> | unknown[];

export type RecordedValue =
  | { kind: 'scalar'; mode: 'Exact'; value: PIScalar | PIDigitalState }
  | { kind: 'timed'; mode: Exclude<RetrievalMode, 'Exact'>; value: RecordedPayload };

const interpolatedSchema = itemsEnvelope(z.record(z.unknown()));
const recordedEnvelopeSchema = z.object({ Value: z.unknown() }).passthrough();
const exactValueSchema = z.union([piScalarSchema, digitalStateSchema]);

export function toTable(items: TableRow[]): ValueTable {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const item of items) {
    for (const key of Object.keys(item)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return { columns, rows: items };
}

export async function fetchInterpolated(
  connection: PIConnection,
  webId: string,
  query?: InterpolatedQuery
): Promise<ValueTable> {
  const path = `/streams/${encodeURIComponent(webId)}/interpolated`;
  const res = query
    ? await connection.get(path, {
        startTime: query.startTime,
        endTime: query.endTime,
        interval: query.interval,
      })
    : await connection.get(path);

  if (!isSuccess(res.status)) {
    throw new NotFoundError(`Interpolated values for WebId ${webId} unavailable`, res);
  }

  const parsed = interpolatedSchema.safeParse(res.data);
  if (!parsed.success) {
    throw new NotFoundError(`Interpolated values for WebId ${webId} returned malformed items`, res);
  }
  const items = parsed.data.Items ?? [];
  if (items.length === 0) {
    throw new EmptyResultError(`No interpolated values returned for WebId ${webId}. Please check the WebId`);
  }
  return toTable(items);
}

/**
 * Fetch the recorded value at `time` (absolute or PI relative time, passed through).
 *
 * `Exact` answers carry the sample inside a nested envelope; it is unwrapped to the
 * bare value. All other modes return `Value` as sent, usually an object with its quality flags.
 */
export async function fetchRecordedAtTime(
  connection: PIConnection,
  webId: string,
  time: string,
  mode: RetrievalMode
): Promise<RecordedValue> {
  const res = await connection.get(`/streams/${encodeURIComponent(webId)}/recordedattime`, {
    retrievalMode: mode,
    time,
  });

  if (!isSuccess(res.status)) {
    throw new NotFoundError(`Recorded value at "${time}" for WebId ${webId} unavailable`, res);
  }

  const envelope = recordedEnvelopeSchema.safeParse(res.data);
  const payload = envelope.success ? envelope.data.Value : undefined;
  if (isEmpty(payload)) {
    throw new EmptyResultError(`No recorded value returned for WebId ${webId}. Please check the WebId`);
  }

  if (mode === 'Exact') {
    const inner = isRecord(payload) && 'Value' in payload ? payload.Value : payload;
    const scalar = exactValueSchema.safeParse(inner);
    if (!scalar.success) {
      throw new EmptyResultError(`Recorded value for WebId ${webId} carries no scalar value`);
    }
    return { kind: 'scalar', mode, value: scalar.data };
  }

  if (!isRecordedPayload(payload)) {
    throw new NotFoundError(`Recorded value for WebId ${webId} is malformed`, res);
  }
  return { kind: 'timed', mode, value: payload };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRecordedPayload(value: unknown): value is RecordedPayload {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    Array.isArray(value) ||
    isRecord(value)
  );
}

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isRecord(value)) return Object.keys(value).length === 0;
  return false;
}

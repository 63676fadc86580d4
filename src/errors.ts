import { describeResponseBody } from './error-sanitizer.js';
import type { PIResponse } from './pi-types.js';

/** Base class for every failure raised by this client. */
export class PIClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PIClientError';
  }
}

/** Catalog or discovery endpoint (`/`, `/dataservers`) answered with a non-success status. */
export class ConnectionFailedError extends PIClientError {
  readonly status?: number;
  constructor(message: string, status?: number) {
    super(message);
    this.name = 'ConnectionFailedError';
    this.status = status;
  }
}

/** Point search, stream or write endpoint answered with a non-success status. */
export class NotFoundError extends PIClientError {
  readonly response: PIResponse;
  constructor(message: string, response: PIResponse) {
    super(`${message} (HTTP ${response.status}: ${describeResponseBody(response.data)})`);
    this.name = 'NotFoundError';
    this.response = response;
  }
}

/** The request succeeded but the payload the caller needs is missing or empty. */
export class EmptyResultError extends PIClientError {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyResultError';
  }
}

export class AmbiguousTagError extends PIClientError {
  readonly pattern: string;
  readonly names: string[];
  constructor(pattern: string, names: string[]) {
    super(
      `Tag "${pattern}" matched ${names.length} points: ${names.join(', ')}. ` +
        'Use the multi-tag variant (getValues / getRecordedValues) to read all of them.'
    );
    this.name = 'AmbiguousTagError';
    this.pattern = pattern;
    this.names = names;
  }
}

export class InvalidArgumentError extends PIClientError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class WriteFailedError extends PIClientError {
  readonly response: PIResponse;
  constructor(message: string, response: PIResponse) {
    super(`${message} (HTTP ${response.status}: ${describeResponseBody(response.data)})`);
    this.name = 'WriteFailedError';
    this.response = response;
  }
}

export class TimeoutError extends PIClientError {
  readonly timeoutMs: number;
  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

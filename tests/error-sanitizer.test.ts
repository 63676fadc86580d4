import { describe, it, expect } from '@jest/globals';
import { describeResponseBody, sanitizeErrorMessage } from '../src/error-sanitizer';
import { AmbiguousTagError, NotFoundError, WriteFailedError } from '../src/errors';

describe('sanitizeErrorMessage', () => {
  it('redacts auth headers', () => {
    expect(sanitizeErrorMessage('Authorization: Basic dXNlcjpwYXNz')).toBe('Authorization: [redacted]');
    expect(sanitizeErrorMessage(new Error('rejected Negotiate YIIabc=='))).toBe('rejected [redacted]');
  });

  it('redacts password values', () => {
    expect(sanitizeErrorMessage('login failed password=test-secret')).toBe('login failed [redacted]');
  });

  it('truncates long messages', () => {
    const result = sanitizeErrorMessage('x'.repeat(300));
    expect(result).toBe('x'.repeat(256) + '...');
  });

  it('falls back when nothing useful remains', () => {
    expect(sanitizeErrorMessage('')).toBe('No details returned');
    expect(sanitizeErrorMessage('ok', 'fallback')).toBe('fallback');
  });
});

describe('describeResponseBody', () => {
  it('joins PI Web API Errors arrays', () => {
    expect(describeResponseBody({ Errors: ['Unknown point', 'Access denied'] })).toBe(
      'Unknown point; Access denied'
    );
  });

  it('uses Message when present', () => {
    expect(describeResponseBody({ Message: 'Not found' })).toBe('Not found');
  });

  it('stringifies other bodies', () => {
    expect(describeResponseBody({ foo: 1 })).toBe('{"foo":1}');
    expect(describeResponseBody(undefined)).toBe('No details returned');
    expect(describeResponseBody('')).toBe('No details returned');
  });
});

describe('error classes', () => {
  it('NotFoundError carries the response and a summary', () => {
    const res = { status: 404, data: { Message: 'Not found' }, headers: {} };
    const err = new NotFoundError('Point lookup for "X" failed', res);

    expect(err.message).toBe('Point lookup for "X" failed (HTTP 404: Not found)');
    expect(err.response).toBe(res);
    expect(err.name).toBe('NotFoundError');
  });

  it('WriteFailedError carries the response', () => {
    const res = { status: 409, data: { Errors: ['Conflict'] }, headers: {} };
    const err = new WriteFailedError('Failed to write value to WebId W1', res);

    expect(err.message).toBe('Failed to write value to WebId W1 (HTTP 409: Conflict)');
    expect(err.response.status).toBe(409);
  });

  it('AmbiguousTagError lists the matches and points to the multi-tag variant', () => {
    const err = new AmbiguousTagError('SINU*', ['SINUSOID', 'SINUSOIDU']);

    expect(err.names).toEqual(['SINUSOID', 'SINUSOIDU']);
    expect(err.message).toBe(
      'Tag "SINU*" matched 2 points: SINUSOID, SINUSOIDU. ' +
        'Use the multi-tag variant (getValues / getRecordedValues) to read all of them.'
    );
  });
});

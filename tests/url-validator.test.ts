import { describe, it, expect } from '@jest/globals';
import { buildBaseUrl, validateUrlMatchesHost } from '../src/url-validator';
import { ConnectionFailedError, InvalidArgumentError } from '../src/errors';

describe('buildBaseUrl', () => {
  it('adds https and /piwebapi to a bare host', () => {
    expect(buildBaseUrl('piwebapi.example.com')).toBe('https://piwebapi.example.com/piwebapi');
    expect(buildBaseUrl('piwebapi.example.com:8443')).toBe(
      'https://piwebapi.example.com:8443/piwebapi'
    );
  });

  it('keeps an existing /piwebapi path and drops trailing slashes', () => {
    expect(buildBaseUrl('https://piwebapi.example.com/piwebapi/')).toBe(
      'https://piwebapi.example.com/piwebapi'
    );
  });

  it('allows plain http', () => {
    expect(buildBaseUrl('http://piwebapi.example.com')).toBe('http://piwebapi.example.com/piwebapi');
  });

  it('rejects non-HTTP(S) protocols', () => {
    expect(() => buildBaseUrl('ftp://piwebapi.example.com')).toThrow(
      'Blocked protocol "ftp:" for PI server; only https:, http: allowed'
    );
    expect(() => buildBaseUrl('file:///etc/passwd')).toThrow('Blocked protocol');
  });

  it('rejects empty and unparsable servers', () => {
    expect(() => buildBaseUrl('   ')).toThrow(new InvalidArgumentError('PI server must not be empty'));
    expect(() => buildBaseUrl('https://')).toThrow('Invalid PI server: https://');
  });
});

describe('validateUrlMatchesHost', () => {
  const base = 'https://piwebapi.example.com/piwebapi';

  it('accepts links on the same host, ignoring case', () => {
    expect(() =>
      validateUrlMatchesHost('https://PIWEBAPI.example.com/piwebapi/dataservers', base)
    ).not.toThrow();
  });

  it('rejects links to another host', () => {
    expect(() => validateUrlMatchesHost('https://evil.example.net/piwebapi', base)).toThrow(
      ConnectionFailedError
    );
  });

  it('rejects links that are not URLs', () => {
    expect(() => validateUrlMatchesHost('not a url', base)).toThrow(
      'Invalid link returned by PI Web API: not a url'
    );
  });
});

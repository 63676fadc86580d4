import { InvalidArgumentError, ConnectionFailedError } from './errors.js';

/**
 * Build the PI Web API base URL from a configured server.
 *
 * Accepts a bare host (`piwebapi.example.com`, `piwebapi.example.com:8443`) or a
 * full URL. A trailing `/piwebapi` is added when missing.
 */
export function buildBaseUrl(server: string): string {
  const trimmed = server.trim();
  if (!trimmed) throw new InvalidArgumentError('PI server must not be empty');

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    throw new InvalidArgumentError(`Invalid PI server: ${server}`);
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new InvalidArgumentError(
      `Blocked protocol "${parsed.protocol}" for PI server; only https:, http: allowed`
    );
  }

  let url = `${parsed.origin}${parsed.pathname}`.replace(/\/+$/, '');
  if (!url.endsWith('/piwebapi')) {
    url += '/piwebapi';
  }
  return url;
}

/**
 * Check that a link returned by the server stays on the server we connected to.
 * Links.* URLs are followed verbatim, so a mismatching host is refused.
 */
export function validateUrlMatchesHost(url: string, expectedServerUrl: string): void {
  let parsedUrl: URL;
  try {
    parsedUrl = new URL(url);
  } catch {
    throw new ConnectionFailedError(`Invalid link returned by PI Web API: ${url}`);
  }
  const expectedHost = new URL(expectedServerUrl).hostname.toLowerCase();

  if (parsedUrl.hostname.toLowerCase() !== expectedHost) {
    throw new ConnectionFailedError(
      `Link hostname "${parsedUrl.hostname}" does not match PI server "${expectedHost}"`
    );
  }
}

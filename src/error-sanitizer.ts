/**
 * Strips credentials and other internals out of text that ends up in error messages.
 */

const SENSITIVE_PATTERNS = [
  /Basic\s+[A-Za-z0-9+/=]+/g,          // Basic auth headers
  /Negotiate\s+[A-Za-z0-9+/=]+/g,      // Kerberos / SPNEGO tokens
  /Bearer\s+[A-Za-z0-9._\-]+/g,        // Bearer tokens
  /at\s+\S+\s+\(.*:\d+:\d+\)/g,        // Stack trace lines: at fn (file:line:col)
  /at\s+.*:\d+:\d+/g,                   // Stack trace lines: at file:line:col
  /password[=:]\s*\S+/gi,              // password= or password: values
];

const MAX_LENGTH = 256;

export function sanitizeErrorMessage(err: unknown, fallback = 'No details returned'): string {
  const raw = err instanceof Error ? err.message : typeof err === 'string' ? err : JSON.stringify(err);
  let sanitized = raw ?? '';

  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[redacted]');
  }

  if (sanitized.trim().length < 3) {
    return fallback;
  }

  if (sanitized.length > MAX_LENGTH) {
    sanitized = sanitized.slice(0, MAX_LENGTH) + '...';
  }

  return sanitized;
}

/**
 * One-line summary of a PI Web API error body. The server reports failures
 * as `{ Errors: [...] }` or `{ Message: ... }`; anything else is stringified.
 */
export function describeResponseBody(data: unknown): string {
  if (data !== null && typeof data === 'object') {
    if ('Errors' in data && Array.isArray(data.Errors)) {
      return sanitizeErrorMessage(data.Errors.map(String).join('; '));
    }
    if ('Message' in data && typeof data.Message === 'string') {
      return sanitizeErrorMessage(data.Message);
    }
  }
  if (data === undefined || data === null || data === '') {
    return 'No details returned';
  }
  return sanitizeErrorMessage(data);
}

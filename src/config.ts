import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';
import { PIClient } from './pi-client.js';
import { type PIAuth, type PIConnectionConfig, PIConnection } from './pi-connection.js';

export interface PIClientConfig extends PIConnectionConfig {
  dataServer?: string;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PI_SERVER: z.string().min(1, 'PI_SERVER must not be empty'),
  PI_DATA_SERVER: z.string().min(1).optional(),
  PI_AUTH: z.enum(['basic', 'negotiate']).optional(),
  PI_USERNAME: z.string().min(1).optional(),
  PI_PASSWORD: z.string().optional(),
  PI_NEGOTIATE_TOKEN: z.string().min(1).optional(),
  PI_VERIFY_TLS: booleanFlag.default('true'),
  PI_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

/** Format a ZodError into a concise `path: message; ...` string. */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}

/**
 * Read the client configuration from the environment. The CLI loads `.env` into it first.
 *
 * Auth defaults to basic when PI_USERNAME is set and to negotiate otherwise.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PIClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid PI client configuration: ${formatZodError(parsed.error)}`);
  }
  const vars = parsed.data;

  let auth: PIAuth;
  const kind = vars.PI_AUTH ?? (vars.PI_USERNAME ? 'basic' : 'negotiate');
  if (kind === 'basic') {
    if (!vars.PI_USERNAME || vars.PI_PASSWORD === undefined) {
      throw new InvalidArgumentError('PI_USERNAME and PI_PASSWORD are required for basic auth');
    }
    auth = { kind: 'basic', username: vars.PI_USERNAME, password: vars.PI_PASSWORD };
  } else {
    const token = vars.PI_NEGOTIATE_TOKEN;
    if (!token) {
      throw new InvalidArgumentError('PI_NEGOTIATE_TOKEN is required for negotiate auth');
    }
    auth = { kind: 'negotiate', getToken: () => token };
  }

  return {
    server: vars.PI_SERVER,
    dataServer: vars.PI_DATA_SERVER,
    auth,
    verifyTls: vars.PI_VERIFY_TLS,
    timeoutMs: vars.PI_TIMEOUT_MS,
  };
}

export function createClientFromConfig(config: PIClientConfig): PIClient {
  const connection = new PIConnection(config);
  return new PIClient(connection, { dataServer: config.dataServer });
}

import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import https from 'https';
import { z } from 'zod';
import {
  ConnectionFailedError,
  InvalidArgumentError,
  TimeoutError,
} from './errors.js';
import {
  type PIDataServer,
  type PIResponse,
  type PIResponseHeaders,
  dataServerSchema,
  isSuccess,
  itemsEnvelope,
} from './pi-types.js';
import { buildBaseUrl, validateUrlMatchesHost } from './url-validator.js';

export type PIAuth =
  | { kind: 'basic'; username: string; password: string }
  | {
      /** Kerberos/SPNEGO. The token provider returns the base64 ticket for the host. */
      kind: 'negotiate';
      getToken: (host: string) => string | Promise<string>;
    };

export interface PIConnectionConfig {
  /** Host (optionally with port) of the PI Web API server, or its full URL. */
  server: string;
  auth?: PIAuth;
  verifyTls?: boolean;
  /** Abort a request after this many milliseconds. Unset: no client-side timeout. */
  timeoutMs?: number;
}

export type QueryParams = Record<string, string | number | undefined>;

const rootSchema = z
  .object({
    Links: z.object({ DataServers: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

const dataServersSchema = itemsEnvelope(dataServerSchema);

/**
 * Immutable connection to one PI Web API server. Shared read-only by every
 * operation issued through it; holds no per-call state.
 */
export class PIConnection {
  readonly baseUrl: string;
  readonly host: string;
  readonly verifyTls: boolean;
  readonly timeoutMs?: number;
  private readonly auth: PIAuth;
  private readonly client: AxiosInstance;

  constructor(config: PIConnectionConfig) {
    if (!config.auth) {
      throw new InvalidArgumentError(
        'No credentials supplied: pass basic credentials or a negotiate token provider'
      );
    }
    if (config.timeoutMs !== undefined && !(config.timeoutMs > 0)) {
      throw new InvalidArgumentError(`timeoutMs must be positive, got ${config.timeoutMs}`);
    }

    this.baseUrl = buildBaseUrl(config.server);
    this.host = new URL(this.baseUrl).host;
    this.verifyTls = config.verifyTls ?? true;
    this.timeoutMs = config.timeoutMs;
    this.auth = config.auth;

    this.client = axios.create({
      baseURL: this.baseUrl,
      auth:
        config.auth.kind === 'basic'
          ? { username: config.auth.username, password: config.auth.password }
          : undefined,
      headers: {
        'Content-Type': 'application/json',
        'X-Requested-With': 'XMLHttpRequest',
      },
      httpsAgent: new https.Agent({ rejectUnauthorized: this.verifyTls }),
      timeout: config.timeoutMs,
      // Status handling belongs to the callers; every status resolves.
      validateStatus: () => true,
    });

    if (!this.verifyTls) {
      console.warn(
        `[PI Connection] TLS certificate verification disabled for ${this.host}`
      );
    }
  }

  async get(path: string, params?: QueryParams): Promise<PIResponse> {
    return this.send(path, (config) => this.client.get(path, config), params);
  }

  async post(path: string, body: unknown, params?: QueryParams): Promise<PIResponse> {
    return this.send(path, (config) => this.client.post(path, body, config), params);
  }

  /** List every data server, starting from the root document's `Links.DataServers`. */
  async getAllDataServers(): Promise<PIDataServer[]> {
    const root = await this.get('/');
    if (!isSuccess(root.status)) {
      throw new ConnectionFailedError(
        `Connection to PI Web API at ${this.baseUrl} failed`,
        root.status
      );
    }

    const link = rootSchema.safeParse(root.data);
    const dataServersUrl = link.success ? link.data.Links?.DataServers : undefined;
    if (!dataServersUrl) {
      throw new ConnectionFailedError(
        `PI Web API at ${this.baseUrl} did not advertise a DataServers link`,
        root.status
      );
    }
    validateUrlMatchesHost(dataServersUrl, this.baseUrl);

    const res = await this.get(dataServersUrl);
    if (!isSuccess(res.status)) {
      throw new ConnectionFailedError(`Listing data servers failed`, res.status);
    }
    const parsed = dataServersSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new ConnectionFailedError(`Unexpected data server listing from ${dataServersUrl}`, res.status);
    }
    return parsed.data.Items ?? [];
  }

  async getDataServer(name: string): Promise<PIDataServer> {
    const res = await this.get('/dataservers', { name });
    if (!isSuccess(res.status)) {
      throw new ConnectionFailedError(
        `Connection to PI Web API failed while looking up data server "${name}"`,
        res.status
      );
    }
    const parsed = dataServerSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new ConnectionFailedError(`Unexpected response for data server "${name}"`, res.status);
    }
    return parsed.data;
  }

  private async send(
    path: string,
    request: (config: AxiosRequestConfig) => Promise<AxiosResponse<unknown>>,
    params?: QueryParams
  ): Promise<PIResponse> {
    const config: AxiosRequestConfig = {};
    if (params) config.params = params;
    if (this.auth.kind === 'negotiate') {
      const token = await this.auth.getToken(this.host);
      config.headers = { Authorization: `Negotiate ${token}` };
    }

    let res: AxiosResponse<unknown>;
    try {
      res = await request(config);
    } catch (err) {
      if (isTimeout(err)) {
        const after = this.timeoutMs !== undefined ? ` after ${this.timeoutMs}ms` : '';
        throw new TimeoutError(`PI Web API request ${path} timed out${after}`, this.timeoutMs ?? 0);
      }
      throw err;
    }

    return { status: res.status, data: res.data, headers: normalizeHeaders(res.headers) };
  }
}

function isTimeout(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT')
  );
}

/** Flatten axios headers into lower-case string pairs. */
function normalizeHeaders(headers: AxiosResponse['headers'] | undefined): PIResponseHeaders {
  const out: PIResponseHeaders = {};
  if (!headers) return out;
  const entries: Array<[string, unknown]> = Object.entries(headers);
  for (const [key, value] of entries) {
    if (typeof value === 'string') out[key.toLowerCase()] = value;
    else if (typeof value === 'number' || typeof value === 'boolean') out[key.toLowerCase()] = String(value);
    else if (Array.isArray(value)) out[key.toLowerCase()] = value.map(String).join(', ');
  }
  return out;
}

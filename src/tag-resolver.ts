import { AmbiguousTagError, EmptyResultError, InvalidArgumentError, NotFoundError } from './errors.js';
import type { PIConnection } from './pi-connection.js';
import {
  type PIPointItem,
  type PIResponse,
  isSuccess,
  itemsEnvelope,
  pointItemSchema,
} from './pi-types.js';

/** Tag name → WebId, in the order the server listed the matches. */
export type WebIdMap = Map<string, string>;

export interface ResolvedTag {
  name: string;
  webId: string;
}

const pointListSchema = itemsEnvelope(pointItemSchema);

/**
 * Resolve a tag name or wildcard pattern to the WebIds of every matching point.
 *
 * With a data server the point list of that server is filtered by name;
 * without one the catalog-less search endpoint is queried. Zero matches is an
 * error, never an empty map.
 */
export async function resolveTag(
  connection: PIConnection,
  pattern: string,
  dataServer?: string
): Promise<WebIdMap> {
  const items = await lookupPoints(connection, pattern, dataServer);
  const map: WebIdMap = new Map();
  for (const item of items) {
    if (map.has(item.Name)) {
      console.warn(`[PI Resolver] "${item.Name}" listed twice for "${pattern}"; keeping ${map.get(item.Name)}`);
      continue;
    }
    map.set(item.Name, item.WebId);
  }
  return map;
}

/** Resolve a tag that must match exactly one point. */
export async function resolveSingleTag(
  connection: PIConnection,
  pattern: string,
  dataServer?: string
): Promise<ResolvedTag> {
  const items = await lookupPoints(connection, pattern, dataServer);
  const [first, ...rest] = items;
  if (!first) {
    throw new EmptyResultError(`No PI point matches "${pattern}". Please check the tag name`);
  }
  if (rest.length > 0) {
    throw new AmbiguousTagError(pattern, items.map((item) => item.Name));
  }
  return { name: first.Name, webId: first.WebId };
}

async function lookupPoints(
  connection: PIConnection,
  pattern: string,
  dataServer?: string
): Promise<PIPointItem[]> {
  if (!pattern.trim()) {
    throw new InvalidArgumentError('Tag pattern must not be empty');
  }

  let res: PIResponse;
  if (dataServer) {
    const server = await connection.getDataServer(dataServer);
    res = await connection.get(`/dataservers/${encodeURIComponent(server.WebId)}/points`, {
      nameFilter: pattern,
    });
  } else {
    res = await connection.get('/search/query', { q: `name:${pattern}` });
  }

  if (!isSuccess(res.status)) {
    throw new NotFoundError(`Point lookup for "${pattern}" failed`, res);
  }

  const parsed = pointListSchema.safeParse(res.data);
  if (!parsed.success) {
    throw new NotFoundError(`Point lookup for "${pattern}" returned malformed items`, res);
  }

  const items = parsed.data.Items ?? [];
  if (items.length === 0) {
    throw new EmptyResultError(`No PI point matches "${pattern}". Please check the tag name`);
  }
  return items;
}

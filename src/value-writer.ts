import { InvalidArgumentError, WriteFailedError } from './errors.js';
import type { PIConnection } from './pi-connection.js';
import type { BufferOption, UpdateOption } from './pi-consts.js';
import { type PIValue, toPayload } from './pi-value.js';
import { resolveSingleTag } from './tag-resolver.js';

/** Where to write: a WebId directly, or a tag resolved to exactly one point. */
export interface WriteTarget {
  webId?: string;
  tag?: string;
  /** Data server to search when resolving `tag`. */
  dataServer?: string;
}

/**
 * Write one value to a PI point. Resolves to the `Location` header of the
 * created or updated value.
 */
export async function writeValue(
  connection: PIConnection,
  value: PIValue,
  updateOption: UpdateOption,
  bufferOption: BufferOption,
  target: WriteTarget
): Promise<string> {
  if (target.webId !== undefined && target.tag !== undefined) {
    throw new InvalidArgumentError('Cannot pass both webId and tag at the same time');
  }

  let webId: string;
  if (target.webId !== undefined) {
    webId = target.webId;
  } else if (target.tag !== undefined) {
    webId = (await resolveSingleTag(connection, target.tag, target.dataServer)).webId;
  } else {
    throw new InvalidArgumentError('Either webId or tag is required to write a value');
  }

  const res = await connection.post(`/streams/${encodeURIComponent(webId)}/value`, toPayload(value), {
    updateOption,
    bufferOption,
  });

  // 204 No Content is how the server acknowledges most accepted writes.
  if (res.status !== 200 && res.status !== 204) {
    throw new WriteFailedError(`Failed to write value to WebId ${webId}`, res);
  }

  const location = res.headers['location'];
  if (!location) {
    throw new WriteFailedError(`Write to WebId ${webId} returned no Location header`, res);
  }
  return location;
}

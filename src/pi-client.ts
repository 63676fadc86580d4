import type { PIConnection } from './pi-connection.js';
import type { BufferOption, RetrievalMode, UpdateOption } from './pi-consts.js';
import type { PIDataServer } from './pi-types.js';
import type { PIValue } from './pi-value.js';
import { type WebIdMap, resolveSingleTag, resolveTag } from './tag-resolver.js';
import {
  type InterpolatedQuery,
  type RecordedValue,
  type ValueTable,
  fetchInterpolated,
  fetchRecordedAtTime,
} from './value-fetchers.js';
import { type WriteTarget, writeValue } from './value-writer.js';

export interface PIClientOptions {
  /** Data server searched for tags. Unset: the catalog-less search endpoint is used. */
  dataServer?: string;
}

export interface WriteOptions {
  updateOption?: UpdateOption;
  bufferOption?: BufferOption;
}

/**
 * Tag-level operations over one PI Web API connection.
 *
 * Single-tag methods require the tag to match exactly one point. The plural
 * variants read every match, one request at a time, and fail fast: the first
 * failing point rejects the whole call.
 */
export class PIClient {
  private connection: PIConnection;
  private dataServer?: string;

  constructor(connection: PIConnection, options: PIClientOptions = {}) {
    this.connection = connection;
    this.dataServer = options.dataServer;
  }

  async getAllDataServers(): Promise<PIDataServer[]> {
    return this.connection.getAllDataServers();
  }

  async getDataServer(name: string): Promise<PIDataServer> {
    return this.connection.getDataServer(name);
  }

  async resolve(pattern: string, dataServer = this.dataServer): Promise<WebIdMap> {
    return resolveTag(this.connection, pattern, dataServer);
  }

  async getValue(tag: string, query?: InterpolatedQuery, dataServer = this.dataServer): Promise<ValueTable> {
    const { webId } = await resolveSingleTag(this.connection, tag, dataServer);
    return fetchInterpolated(this.connection, webId, query);
  }

  async getValues(
    pattern: string,
    query?: InterpolatedQuery,
    dataServer = this.dataServer
  ): Promise<Map<string, ValueTable>> {
    const webIds = await resolveTag(this.connection, pattern, dataServer);
    return this.collect(webIds, (webId) => fetchInterpolated(this.connection, webId, query));
  }

  async getRecordedValue(
    tag: string,
    time: string,
    mode: RetrievalMode,
    dataServer = this.dataServer
  ): Promise<RecordedValue> {
    const { webId } = await resolveSingleTag(this.connection, tag, dataServer);
    return fetchRecordedAtTime(this.connection, webId, time, mode);
  }

  async getRecordedValues(
    pattern: string,
    time: string,
    mode: RetrievalMode,
    dataServer = this.dataServer
  ): Promise<Map<string, RecordedValue>> {
    const webIds = await resolveTag(this.connection, pattern, dataServer);
    return this.collect(webIds, (webId) => fetchRecordedAtTime(this.connection, webId, time, mode));
  }

  async updateValue(value: PIValue, options: WriteOptions, target: WriteTarget): Promise<string> {
    return writeValue(
      this.connection,
      value,
      options.updateOption ?? 'Replace',
      options.bufferOption ?? 'BufferIfPossible',
      { ...target, dataServer: target.dataServer ?? this.dataServer }
    );
  }

  private async collect<T>(
    webIds: WebIdMap,
    fetch: (webId: string) => Promise<T>
  ): Promise<Map<string, T>> {
    const results = new Map<string, T>();
    for (const [tag, webId] of webIds) {
      try {
        results.set(tag, await fetch(webId));
      } catch (err) {
        console.error(`[PI Client] Reading "${tag}" failed; aborting batch of ${webIds.size}`);
        throw err;
      }
    }
    return results;
  }
}

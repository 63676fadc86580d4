export { PIConnection } from './pi-connection.js';
export type { PIAuth, PIConnectionConfig, QueryParams } from './pi-connection.js';
export { PIClient } from './pi-client.js';
export type { PIClientOptions, WriteOptions } from './pi-client.js';
export { resolveTag, resolveSingleTag } from './tag-resolver.js';
export type { ResolvedTag, WebIdMap } from './tag-resolver.js';
export { fetchInterpolated, fetchRecordedAtTime, toTable } from './value-fetchers.js';
export type { InterpolatedQuery, RecordedValue, TableRow, ValueTable } from './value-fetchers.js';
export { writeValue } from './value-writer.js';
export type { WriteTarget } from './value-writer.js';
export { MIN_TIMESTAMP, serializePIValue, toPayload } from './pi-value.js';
export type { PIValue, PIValuePayload } from './pi-value.js';
export {
  BufferOption,
  RetrievalMode,
  SummaryType,
  UpdateOption,
  bufferOptionSchema,
  parseBufferOption,
  parseRetrievalMode,
  parseSummaryType,
  parseUpdateOption,
  retrievalModeSchema,
  summaryTypeSchema,
  updateOptionSchema,
} from './pi-consts.js';
export type { PIDataServer, PIDigitalState, PIResponse, PIScalar, PITimedValue } from './pi-types.js';
export {
  AmbiguousTagError,
  ConnectionFailedError,
  EmptyResultError,
  InvalidArgumentError,
  NotFoundError,
  PIClientError,
  TimeoutError,
  WriteFailedError,
} from './errors.js';
export { createClientFromConfig, loadConfig } from './config.js';
export type { PIClientConfig } from './config.js';

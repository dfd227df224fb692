/**
 * Basecamp connector public API
 */

export { BasecampClient } from './clients/BasecampClient.js';
export type { BasecampClientConfig, BasecampClientOptions, RequestOptions } from './clients/BasecampClient.js';
export * from './connectors/index.js';
export type {
  ConfigField,
  FailedUnit,
  HtmlInputType,
  IndexQueue,
  IngestionRunSummary,
  NormalizedDocument,
  SkippedRecord,
} from './contracts/types.js';
export { DocumentType } from './contracts/types.js';
export { htmlToText } from './extraction/html/htmlToText.js';
export {
  BullIndexQueue,
  InMemoryIndexQueue,
  documentJobId,
  serializeDocument,
} from './services/infrastructure/IndexQueue.js';
export type { BullIndexQueueConfig, IndexDocumentJobData, SerializedDocument } from './services/infrastructure/IndexQueue.js';
export {
  AppError,
  ErrorCode,
  InvalidConfigurationError,
  MalformedRecordError,
  RemoteHttpError,
  TimestampParseError,
  UnitTimeoutError,
} from './types/errors.js';
export { parseRemoteTimestamp } from './utils/dateUtils.js';
export { metricsRegistry } from './utils/metrics.js';
export type { ProjectRef, RawComment, RawTaskItemDetail, RawTaskItemSummary } from './validation/basecampSchemas.js';

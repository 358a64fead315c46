/**
 * @histsync/core - Reconciliation engine for timestamp-ordered remote collections
 *
 * This package provides:
 * - Contracts for local storage, remote collection clients, scratchpads and gates
 * - The history record codec
 * - The incoming applier and the outgoing batcher
 * - HistorySynchronizer, which runs one pass per call
 *
 * Core never imports storage or client implementations; the CLI wires them together.
 */

export type {
  GUID,
  Timestamp,
  MicrosecondTimestamp,
  Visit,
  Place,
  PlaceWithVisits,
  Envelope,
  HistoryPayload,
  HistoryLivePayload,
  HistoryTombstonePayload,
  DecodedHistoryRecord,
  RecordCodec,
  SyncableHistory,
  FetchResponse,
  BatchResult,
  CollectionClient,
  StorageClient,
  Scratchpad,
  SyncNotStartedReason,
  SyncGate,
} from "./types.js";
export { VisitType } from "./types.js";

export {
  SyncError,
  ClientUnavailableError,
  CodecError,
  StorageError,
  NetworkError,
  PreconditionFailedError,
  SyncInProgressError,
  UnexpectedError,
  describeError,
  type SyncErrorKind,
} from "./errors.js";

export { createLogger, type Logger } from "./logger.js";

export {
  HistoryCodec,
  HISTORY_TTL_SECONDS,
  DELETED_SORTINDEX,
  LIVE_SORTINDEX,
} from "./history-codec.js";

export {
  applyIncomingRecord,
  applyIncomingPage,
  type PageApplyResult,
} from "./history-applier.js";

export {
  HistoryUploader,
  uploadRecords,
  chunk,
  DEFAULT_BATCHING,
  type BatchingConfig,
  type HistoryUploaderOptions,
  type OnBatchUploaded,
  type OutgoingResult,
} from "./batcher.js";

export {
  CollectionGate,
  formatNotStartedReason,
  type CollectionGateOptions,
} from "./gate.js";

export {
  CollectionSynchronizer,
  HistorySynchronizer,
  type SyncState,
  type SyncStats,
  type SyncResult,
  type CollectionSynchronizerOptions,
  type HistorySynchronizerOptions,
} from "./synchronizer.js";

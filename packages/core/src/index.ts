/**
 * @rowsync/core - Resilient synchronization core for rowsync
 *
 * This package provides:
 * - Type definitions and contracts (RemoteTable, RemoteGrid, RemoteRecord, LocalRow, Clock)
 * - Retry and rate-limit strategies and the RequestController composing them
 * - ChunkedTransport for bounded writes with bisection of oversized chunks
 * - Reconciliation (planSync) and the engines orchestrating a run against a
 *   record table (SyncEngine) or a grid (GridSyncEngine)
 *
 * Core never imports adapters; the CLI wires everything together at runtime.
 */

export type {
  RecordID,
  Fields,
  RemoteRecord,
  LocalRow,
  RecordPatch,
  FieldTypeHint,
  FieldDescriptor,
  SearchPage,
  BatchLimits,
  RemoteTable,
  CellValue,
  GridRow,
  GridOrigin,
  GridRange,
  GridLimits,
  RemoteGrid,
  Clock,
} from "./types.js";

export {
  RemoteError,
  BatchLimitError,
  ProtocolError,
  RetryExhaustedError,
  PayloadTooLargeError,
  ConfigurationError,
  classifyFailure,
  isTransient,
  assertWithinLimit,
  describeError,
  type FailureKind,
  type RemoteErrorDetails,
} from "./errors.js";

export { systemClock, ManualClock } from "./clock.js";

export {
  createLogger,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";

export {
  ExponentialBackoffRetry,
  LinearGrowthRetry,
  FixedWaitRetry,
  createRetryStrategy,
  DEFAULT_RETRY_CONFIG,
  RETRY_STRATEGY_TYPES,
  type RetryConfig,
  type RetryStrategy,
  type RetryStrategyType,
  type RetryStrategyOptions,
} from "./retry.js";

export {
  FixedWaitRateLimit,
  SlidingWindowRateLimit,
  FixedWindowRateLimit,
  createRateLimitStrategy,
  RATE_LIMIT_STRATEGY_TYPES,
  type RateLimitStrategy,
  type RateLimitStrategyType,
  type RateLimitStrategyOptions,
  type FixedWaitRateConfig,
  type WindowRateConfig,
} from "./rate-limit.js";

export {
  RequestController,
  type RequestControllerOptions,
  type ControllerStats,
} from "./controller.js";

export {
  ChunkedTransport,
  partition,
  partitionGrid,
  bisect,
  describeChunk,
  type WindowBounds,
  type ColumnOptions,
  type WriteOperation,
  type Chunk,
  type ChunkStatus,
  type ChunkReport,
  type BisectionEvent,
  type SendResult,
  type SendOptions,
  type Dispatch,
  type ChunkedTransportOptions,
} from "./transport.js";

export {
  planSync,
  buildRemoteIndex,
  indexKeyOf,
  needsRemoteRead,
  hasIndexColumn,
  isSyncPolicy,
  SYNC_POLICIES,
  type SyncPolicy,
  type SyncPlan,
  type PlannedRow,
  type PlannedUpdate,
  type IndexKey,
  type RemoteIndex,
} from "./reconcile.js";

export { fetchAllRecords } from "./remote-index.js";

export {
  rowToFields,
  collectColumns,
  selectColumns,
  toCellValue,
  inferFieldType,
  isBlank,
} from "./fields.js";

export {
  BaseSyncEngine,
  SyncEngine,
  DEFAULT_BATCH_SIZE,
  type JobOptions,
  type JobConfig,
  type RunStatus,
  type RunStats,
  type RunSummary,
} from "./engine.js";

export {
  GridSyncEngine,
  DEFAULT_COLUMN_BATCH_SIZE,
  type GridJobConfig,
  type GridSnapshot,
} from "./grid-engine.js";

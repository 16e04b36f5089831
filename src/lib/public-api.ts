/**
 * Public API for using mailrecall as a library.
 */

// Configuration
export { loadConfig, resolveDataDir, resolveDataPath, DEFAULT_CONFIG } from './config.js';
export type { LoadConfigOptions, MailRecallConfig } from './config.js';

// Errors
export {
  MailRecallError,
  ConfigError,
  StorageError,
  ValidationError,
  NetworkError,
  NotFoundError,
  FetchError,
  TransformError,
  DimensionMismatchError,
  RunInProgressError,
  isMailRecallError,
} from './errors.js';

// Storage
export {
  createStorageBackend,
  openStorage,
  IndexedBackend,
  RelationalBackend,
  FlatFileVectorIndex,
  SqliteClient,
  PostgresClient,
  isRebuildable,
  NO_RESULTS,
  SEARCH_ERROR,
  EPOCH,
  isSentinel,
} from './storage/index.js';
export type {
  StorageBackend,
  RebuildableBackend,
  VectorIndex,
  SqlClient,
  MailDocument,
  VectorRecord,
  NewVectorRecord,
  StoreOutcome,
  RankedRecord,
  StorageInfo,
} from './storage/index.js';

// Vectors
export { normalizeVector, l2Distance } from './vectors.js';

// Collaborators
export { createApiEmbedder } from './embeddings.js';
export type { EmbedFn } from './embeddings.js';
export { createChatClient, createSummarizer, createAnswerGenerator } from './llm.js';
export type { ChatMessage, ChatFn, SummarizeFn, AnswerGenerator } from './llm.js';

// Mail sources
export { JsonMailSource, parseMailQuery } from './mail/json-source.js';
export { normalizeTimestamp } from './mail/timestamps.js';
export { normalizeMessage } from './mail/normalize.js';
export type { MailSource, RawMailMessage, CandidateRef, FetchWindow } from './mail/source.js';

// Ingestion
export { IngestionPipeline } from './ingest/pipeline.js';
export type { RunReport, RunFailure, RunOptions, IngestionPipelineOptions } from './ingest/pipeline.js';
export { resolveWindow, inWindow } from './ingest/window.js';
export { createRelevancePredicate } from './ingest/filters.js';
export { formatFallbackSummary } from './ingest/summary.js';

// Retrieval
export { ContextAssembler } from './retrieval/context.js';
export type { AskResult, ContextAssemblerOptions } from './retrieval/context.js';

// Application
export { createAppContext } from './app.js';
export type { AppContext } from './app.js';
export { withLock } from './lock.js';
